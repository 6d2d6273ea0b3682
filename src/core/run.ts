import type { AxiosInstance } from "axios";
import type { CrawlError, ScrapeConfig } from "../types";
import { readUrlsFromFile } from "./file-reader";
import { resolveOutputPath } from "./output-path";
import { fetchPage } from "./fetcher";
import { runBatch } from "./batch";
import type { Ask } from "./prompt";
import { exportProductsCsv } from "../product/exporter";
import { createHttpClient, createPacer, formatDuration } from "./utils";

export interface RunDeps {
  ask: Ask;
  /** Defaults to a client built from the config's timeout and User-Agent */
  http?: AxiosInstance;
}

export interface RunSummary {
  outputFile: string;
  total: number;
  failures: CrawlError[];
  elapsedMs: number;
}

/**
 * Read the URL list, resolve the output path, scrape every URL and write the CSV.
 * Input problems throw before any output file is touched.
 */
export async function runScraper(
  config: ScrapeConfig,
  deps: RunDeps
): Promise<RunSummary> {
  // ── Step 1: Load URLs ─────────────────────────────────────────────
  console.log(`Step 1: Reading URLs from file: ${config.inputFile}...`);
  const urls = readUrlsFromFile(config.inputFile, config.urlColumn);
  console.log(`   Found ${urls.length} URLs\n`);

  const outputFile = await resolveOutputPath(config.outputFile, {
    overwrite: config.overwrite,
    confirmOverwrite: async (filePath) => {
      const choice = await deps.ask(
        `'${filePath}' already exists. Do you want to overwrite it? (y/n): `
      );
      return choice.toLowerCase() === "y";
    },
  });

  // ── Step 2: Scrape product pages ──────────────────────────────────
  console.log(
    `Step 2: Scraping ${urls.length} product pages (concurrency: ${config.concurrency}, delay: ${config.delayMs}ms)...`
  );
  const startTime = Date.now();

  const http = deps.http ?? createHttpClient(config.timeout, config.userAgent);
  const pace = createPacer(config.delayMs);

  const results = await runBatch(
    urls,
    { fetchPage: (url) => fetchPage(url, http, pace) },
    {
      concurrency: config.concurrency,
      onItemDone: (completed, total, url, result) => {
        const icon = result.success ? "+" : "x";
        console.log(`   [${completed}/${total}]  ${icon} ${url}`);
      },
    }
  );

  const elapsed = Date.now() - startTime;
  const failures: CrawlError[] = [];
  for (const r of results) {
    if (!r.success) failures.push(r.error);
  }

  // ── Step 3: Export ────────────────────────────────────────────────
  console.log("\nStep 3: Exporting...");
  const csvPath = exportProductsCsv(
    results.map((r) => r.record),
    outputFile
  );
  console.log(`   ${csvPath} (${results.length} rows)`);

  if (failures.length > 0) {
    console.log(`\n   Failed URLs (${failures.length}):`);
    for (const f of failures) {
      console.log(`     x ${f.url}: ${f.error_message}`);
    }
  }

  console.log(`\nDone in ${formatDuration(elapsed)}`);
  console.log(`   Success: ${results.length - failures.length}/${urls.length}`);
  console.log(`   Errors:  ${failures.length}/${urls.length}`);

  return { outputFile: csvPath, total: urls.length, failures, elapsedMs: elapsed };
}
