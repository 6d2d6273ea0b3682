import axios, { AxiosError, type AxiosInstance } from "axios";

/** Desktop browser identification; the target site turns away bare clients */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:54.0) Gecko/20100101 Firefox/54.0";

/**
 * Create a configured axios instance with realistic browser headers.
 * @param timeout - Request timeout in milliseconds, 0 for none
 * @param userAgent - Fixed User-Agent sent with every request
 */
export function createHttpClient(
  timeout: number,
  userAgent: string = DEFAULT_USER_AGENT
): AxiosInstance {
  return axios.create({
    timeout,
    headers: {
      "User-Agent": userAgent,
      Accept:
        "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      "Accept-Language": "en-US,en;q=0.9",
    },
    maxRedirects: 5,
  });
}

/**
 * Sleep for the given number of milliseconds.
 * @param ms - Milliseconds to wait
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Resolves when the caller may issue its next request */
export type Pacer = () => Promise<void>;

/**
 * Politeness gate shared by every request of a run.
 * Each call reserves a slot `intervalMs` after the later of now and the
 * previous slot, then waits for it. With one worker this is a plain delay
 * before each request; with several, request starts stay `intervalMs` apart.
 * @param intervalMs - Minimum spacing between request starts
 * @param wait - Injected for tests
 * @param now - Injected for tests
 */
export function createPacer(
  intervalMs: number,
  wait: (ms: number) => Promise<void> = sleep,
  now: () => number = Date.now
): Pacer {
  let lastSlot = 0;
  return async () => {
    if (intervalMs <= 0) return;
    const current = now();
    const slot = Math.max(current, lastSlot) + intervalMs;
    lastSlot = slot;
    await wait(slot - current);
  };
}

/**
 * Process items with a fixed number of workers pulling from one queue.
 * @param items - Array of items to process
 * @param concurrency - Number of workers (at least 1)
 * @param processor - Async function to run on each item
 * @param onItemDone - Callback after each item completes
 * @returns Array of results in input order
 */
export async function runPool<T, R>(
  items: T[],
  concurrency: number,
  processor: (item: T, index: number) => Promise<R>,
  onItemDone?: (completed: number, total: number, item: T, result: R) => void
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let nextIndex = 0;
  let completed = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      const item = items[index];
      const result = await processor(item, index);
      results[index] = result;
      completed++;
      onItemDone?.(completed, items.length, item, result);
    }
  };

  const workerCount = Math.min(Math.max(1, concurrency), items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return results;
}

/**
 * Extract a human-readable error message from an unknown error.
 * @param err - The caught error
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof AxiosError) {
    if (err.code === "ECONNABORTED") return "Request timed out";
    if (err.code === "ENOTFOUND")
      return `DNS lookup failed: ${err.config?.url ?? "unknown host"}`;
    if (err.code === "ERR_TLS_CERT_ALTNAME_INVALID")
      return "SSL certificate error";
    if (err.code === "ECONNRESET") return "Connection reset by server";
    if (err.code === "ECONNREFUSED") return "Connection refused";
    if (err.response)
      return `HTTP ${err.response.status}: ${err.response.statusText}`;
    return err.message;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Extract the HTTP status code from an error, if available.
 * @param err - The caught error
 */
export function getErrorStatus(err: unknown): number | null {
  if (err instanceof AxiosError && err.response) {
    return err.response.status;
  }
  return null;
}

/**
 * Format a duration in milliseconds to a human-readable string like "2m 30s".
 * @param ms - Duration in milliseconds
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes === 0) return `${seconds}s`;
  return `${minutes}m ${seconds}s`;
}
