/**
 * Network or transport failure for a single URL.
 * Recovered by the batch driver; never fatal to a run.
 */
export class FetchError extends Error {
  readonly url: string;
  readonly statusCode: number | null;

  constructor(url: string, message: string, statusCode: number | null, cause?: unknown) {
    super(message, { cause });
    this.name = "FetchError";
    this.url = url;
    this.statusCode = statusCode;
  }
}

/** The URL lacks the path segment the product name is derived from. */
export class StructuralUrlError extends Error {
  readonly url: string;

  constructor(url: string, message: string) {
    super(message);
    this.name = "StructuralUrlError";
    this.url = url;
  }
}

/** Input file missing, unreadable, or without the URL column. Fatal. */
export class InputFileError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(message);
    this.name = "InputFileError";
    this.filePath = filePath;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
