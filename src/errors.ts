/**
 * Error classes surfaced to the operator.
 *
 * Each carries a literal `code` for logs and the process exit code the CLI
 * reports for it.
 */

export class LocalFileMissingError extends Error {
  code = "LOCAL_FILE_MISSING" as const;
  exitCode = 2;
  readonly path: string;

  constructor(path: string) {
    super(`Dataset file not found: ${path}`);
    this.name = "LocalFileMissingError";
    this.path = path;
  }
}

export class DatasetFormatError extends Error {
  code = "DATASET_FORMAT" as const;
  exitCode = 1;

  constructor(message: string) {
    super(message);
    this.name = "DatasetFormatError";
  }
}

export class InvalidConfigError extends Error {
  code = "INVALID_CONFIG" as const;
  exitCode = 1;
  details: string[];

  constructor(message: string, details: string[] = []) {
    super(message);
    this.name = "InvalidConfigError";
    this.details = details;
  }
}

export class CrawlAbortedError extends Error {
  code = "CRAWL_ABORTED" as const;
  exitCode = 1;
  readonly page: number;

  constructor(page: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Crawl aborted on page ${String(page)}: ${reason}`, { cause });
    this.name = "CrawlAbortedError";
    this.page = page;
  }
}

export type OperatorError =
  | LocalFileMissingError
  | DatasetFormatError
  | InvalidConfigError
  | CrawlAbortedError;

export function isOperatorError(error: unknown): error is OperatorError {
  return (
    error instanceof LocalFileMissingError ||
    error instanceof DatasetFormatError ||
    error instanceof InvalidConfigError ||
    error instanceof CrawlAbortedError
  );
}

/** Exit code when a crawl never extracted a single record */
export const EXIT_NO_DATA = 3;
