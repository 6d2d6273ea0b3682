import * as path from "path";
import type { ScrapeConfig } from "../types";
import { ConfigError } from "./errors";
import { DEFAULT_URL_COLUMN } from "./file-reader";
import { DEFAULT_USER_AGENT } from "./utils";

export const DEFAULT_OUTPUT_FILE = "output_details.csv";
export const DEFAULT_DELAY_MS = 2000;

export interface CliArgs {
  inputFile?: string;
  urlColumn?: string;
  outputFile?: string;
  overwrite: boolean;
  concurrency?: string;
  delayMs?: string;
  timeout?: string;
  userAgent?: string;
}

/**
 * Parse CLI arguments.
 * Supports --input, --column, --output, --delay, --timeout,
 * --concurrency, --user-agent and the -y switch.
 */
export function parseArgs(argv: string[]): CliArgs {
  const opts: Record<string, string> = {};
  let overwrite = false;

  for (const arg of argv) {
    if (arg === "-y" || arg === "--yes") { overwrite = true; continue; }
    const eqIdx = arg.indexOf("=");
    if (arg.startsWith("--") && eqIdx !== -1) {
      const key = arg.slice(2, eqIdx);
      const value = arg.slice(eqIdx + 1);
      opts[key] = value;
    }
  }

  return {
    inputFile: opts.input,
    urlColumn: opts.column,
    outputFile: opts.output,
    overwrite,
    concurrency: opts.concurrency,
    delayMs: opts.delay,
    timeout: opts.timeout,
    userAgent: opts["user-agent"],
  };
}

function parseInteger(
  flag: string,
  raw: string | undefined,
  fallback: number,
  min: number
): number {
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(`--${flag} must be a whole number, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < min) {
    throw new ConfigError(`--${flag} must be at least ${min}, got ${value}`);
  }
  return value;
}

/** Strip surrounding double quotes, as pasted from a file manager */
export function cleanInputPath(raw: string): string {
  return raw.trim().replace(/^"+|"+$/g, "");
}

/**
 * Validate parsed arguments and apply defaults.
 * @param args - Output of parseArgs
 * @param inputFile - Input path, already prompted for if the flag was absent
 */
export function buildConfig(args: CliArgs, inputFile: string): ScrapeConfig {
  const cleaned = cleanInputPath(inputFile);
  if (!cleaned) {
    throw new ConfigError("No input file provided.");
  }

  return {
    inputFile: cleaned,
    urlColumn: args.urlColumn || DEFAULT_URL_COLUMN,
    outputFile: path.resolve(args.outputFile || DEFAULT_OUTPUT_FILE),
    overwrite: args.overwrite,
    concurrency: parseInteger("concurrency", args.concurrency, 1, 1),
    delayMs: parseInteger("delay", args.delayMs, DEFAULT_DELAY_MS, 0),
    timeout: parseInteger("timeout", args.timeout, 0, 0),
    userAgent: args.userAgent || DEFAULT_USER_AGENT,
  };
}
