/**
 * Error taxonomy for log ingestion.
 *
 * Line-level malformation is never an error: the parser degrades to "skip"
 * or a best-effort INFO record. Everything here is file-, argument- or
 * lifecycle-level and propagates to the caller.
 */

export type IngestErrorCode =
  | "INVALID_ARGUMENT"
  | "FILE_NOT_FOUND"
  | "IO_FAILURE"
  | "POOL_DISPOSED"
  | "CANCELLED"
  | "CONFIG_INVALID";

/**
 * Base class for all ingestion errors.
 */
export class IngestError extends Error {
  readonly code: IngestErrorCode;

  constructor(code: IngestErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IngestError";
    this.code = code;
  }

  toJSON(): { name: string; code: IngestErrorCode; message: string } {
    return { name: this.name, code: this.code, message: this.message };
  }
}

export class InvalidArgumentError extends IngestError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
    this.name = "InvalidArgumentError";
  }

  static emptyPath(argument: string): InvalidArgumentError {
    return new InvalidArgumentError(`${argument} cannot be null or empty`);
  }
}

export class FileNotFoundError extends IngestError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super("FILE_NOT_FOUND", `Log file not found: ${path}`, options);
    this.name = "FileNotFoundError";
    this.path = path;
  }
}

export class IoFailureError extends IngestError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super("IO_FAILURE", `I/O error reading ${path}: ${describeCause(cause)}`, { cause });
    this.name = "IoFailureError";
    this.path = path;
  }
}

export class PoolDisposedError extends IngestError {
  constructor() {
    super("POOL_DISPOSED", "Record pool has been disposed");
    this.name = "PoolDisposedError";
  }
}

export class CancelledError extends IngestError {
  constructor(reason?: unknown) {
    super("CANCELLED", "Operation was cancelled", reason === undefined ? undefined : { cause: reason });
    this.name = "CancelledError";
  }
}

export class ConfigError extends IngestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_INVALID", message, options);
    this.name = "ConfigError";
  }
}

/**
 * Narrows an unknown value to an IngestError, optionally of a given code.
 */
export function isIngestError(value: unknown, code?: IngestErrorCode): value is IngestError {
  return value instanceof IngestError && (code === undefined || value.code === code);
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Node's fs errors carry a string `code` such as "ENOENT".
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Maps a failed open/stat to FileNotFoundError for ENOENT and IoFailureError
 * for everything else.
 */
export function toFileError(path: string, err: unknown): IngestError {
  if (isIngestError(err)) {
    return err;
  }
  if (errnoCode(err) === "ENOENT") {
    return new FileNotFoundError(path, { cause: err });
  }
  return new IoFailureError(path, err);
}
