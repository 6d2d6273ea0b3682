import * as fs from "fs";
import * as path from "path";

/**
 * First free name among `file.ext`, `file_1.ext`, `file_2.ext`, …
 * @param filePath - Desired output path
 * @param exists - Injected for tests; defaults to fs.existsSync
 */
export function uniqueOutputPath(
  filePath: string,
  exists: (p: string) => boolean = fs.existsSync
): string {
  const ext = path.extname(filePath);
  const base = filePath.slice(0, filePath.length - ext.length);
  let candidate = filePath;
  let count = 1;
  while (exists(candidate)) {
    candidate = `${base}_${count}${ext}`;
    count++;
  }
  return candidate;
}

export interface ResolveOutputOptions {
  /** Overwrite an existing file without asking */
  overwrite?: boolean;
  /** Asked only when the file exists; true means overwrite */
  confirmOverwrite: (filePath: string) => Promise<boolean>;
  exists?: (p: string) => boolean;
}

/**
 * Pick the output path for a run. An existing file is only replaced when
 * the operator agrees; otherwise a numeric suffix is appended.
 */
export async function resolveOutputPath(
  filePath: string,
  options: ResolveOutputOptions
): Promise<string> {
  const exists = options.exists ?? fs.existsSync;
  if (!exists(filePath) || options.overwrite) return filePath;
  if (await options.confirmOverwrite(filePath)) return filePath;
  return uniqueOutputPath(filePath, exists);
}
