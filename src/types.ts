import type { FetchError } from "./core/errors";

/** Sentinel written in place of any field that could not be extracted */
export const NOT_AVAILABLE = "Not Available";

/** Runtime configuration assembled from CLI arguments */
export interface ScrapeConfig {
  inputFile: string;
  urlColumn: string;
  outputFile: string;
  overwrite: boolean;
  concurrency: number;
  delayMs: number;
  timeout: number;
  userAgent: string;
}

/** One output row: a product page reduced to its tabular fields */
export interface ProductRecord {
  readonly sourceUrl: string;
  readonly productName: string;
  readonly catalogId: string | null;
  readonly originalPrice: string;
  readonly discountedPrice: string;
  readonly rating: string;
}

/** Record for a URL that failed to fetch or extract */
export interface CrawlError {
  url: string;
  kind: "fetch" | "structure" | "unexpected";
  status_code: number | null;
  error_message: string;
}

/** Result of scraping a single URL; a record is present either way */
export type ProductCrawlResult =
  | { success: true; record: ProductRecord }
  | { success: false; record: ProductRecord; error: CrawlError };

/** Outcome of a single page fetch */
export type FetchResult =
  | { ok: true; markup: string }
  | { ok: false; error: FetchError };
