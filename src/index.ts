#!/usr/bin/env node
import { parseArgs, buildConfig } from "./core/config";
import { createPrompt } from "./core/prompt";
import { runScraper } from "./core/run";
import { getErrorMessage } from "./core/utils";

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const ask = createPrompt();

  const inputFile =
    args.inputFile ??
    (await ask("Enter the path to the CSV file containing product URLs: "));
  const config = buildConfig(args, inputFile);

  console.log("Product Page Scraper v1.0\n");

  const summary = await runScraper(config, { ask });
  console.log(`Scraping completed. Results saved in '${summary.outputFile}'.`);
}

main().catch((err: unknown) => {
  console.error(`\n   Error: ${getErrorMessage(err)}`);
  process.exitCode = 1;
});
