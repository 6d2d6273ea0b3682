import type { CrawlError, FetchResult, ProductCrawlResult, ProductRecord } from "../types";
import { extractProduct, unavailableRecord } from "../product/extractor";
import { FetchError, StructuralUrlError } from "./errors";
import { runPool, getErrorMessage } from "./utils";

export interface BatchDeps {
  /** Paced single-attempt fetch; failures come back as values */
  fetchPage: (url: string) => Promise<FetchResult>;
  extract?: (markup: string, url: string) => ProductRecord;
}

export interface BatchOptions {
  /** Parallel workers; 1 keeps requests strictly sequential */
  concurrency?: number;
  onItemDone?: (
    completed: number,
    total: number,
    url: string,
    result: ProductCrawlResult
  ) => void;
}

function toCrawlError(url: string, err: unknown): CrawlError {
  if (err instanceof FetchError) {
    return { url, kind: "fetch", status_code: err.statusCode, error_message: err.message };
  }
  return {
    url,
    kind: err instanceof StructuralUrlError ? "structure" : "unexpected",
    status_code: null,
    error_message: getErrorMessage(err),
  };
}

/**
 * Scrape a single URL. Every failure is contained here and degraded to an
 * all-sentinel record carrying the URL.
 */
async function scrapeOne(
  url: string,
  deps: BatchDeps
): Promise<ProductCrawlResult> {
  const extract = deps.extract ?? extractProduct;
  try {
    const fetched = await deps.fetchPage(url);
    if (!fetched.ok) {
      return { success: false, record: unavailableRecord(url), error: toCrawlError(url, fetched.error) };
    }
    return { success: true, record: extract(fetched.markup, url) };
  } catch (err) {
    return { success: false, record: unavailableRecord(url), error: toCrawlError(url, err) };
  }
}

/**
 * Scrape every URL and return one result per URL in input order.
 * Individual failures never abort the batch.
 */
export async function runBatch(
  urls: string[],
  deps: BatchDeps,
  options: BatchOptions = {}
): Promise<ProductCrawlResult[]> {
  return runPool(
    urls,
    options.concurrency ?? 1,
    (url) => scrapeOne(url, deps),
    options.onItemDone
  );
}
