export type ErrorCode =
  | "STORAGE_ERROR"
  | "CONFIGURATION_ERROR"
  | "FETCH_ERROR"
  | "EXTRACTION_ERROR"
  | "OUTPUT_ERROR";

export class ScoutError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ScoutError";
  }

  /** Fatal errors end the run; everything else is scoped to one item. */
  get fatal(): boolean {
    return this.code === "STORAGE_ERROR" || this.code === "CONFIGURATION_ERROR";
  }
}

export class StorageError extends ScoutError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super("STORAGE_ERROR", message, details, { cause });
    this.name = "StorageError";
  }
}

export class ConfigurationError extends ScoutError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("CONFIGURATION_ERROR", message, details);
    this.name = "ConfigurationError";
  }
}

export class FetchError extends ScoutError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super("FETCH_ERROR", message, details, { cause });
    this.name = "FetchError";
  }
}

export class ExtractionError extends ScoutError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super("EXTRACTION_ERROR", message, details, { cause });
    this.name = "ExtractionError";
  }
}

export class OutputError extends ScoutError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super("OUTPUT_ERROR", message, details, { cause });
    this.name = "OutputError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isFatalError(error: unknown): error is StorageError | ConfigurationError {
  return error instanceof StorageError || error instanceof ConfigurationError;
}
