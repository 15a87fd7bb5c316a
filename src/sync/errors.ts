/**
 * @fileoverview Error taxonomy for the sync engine.
 * Unit-level errors are caught by the worker pool and recorded per unit;
 * only systemic failures escape a batch run.
 */

/**
 * Raised by a Fetcher. Only transient failures are retried.
 */
export class FetchError extends Error {
  readonly transient: boolean;
  /** HTTP status, when the failure came from a response. */
  readonly status?: number;

  constructor(
    message: string,
    options: { transient: boolean; status?: number; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = "FetchError";
    this.transient = options.transient;
    this.status = options.status;
  }
}

/**
 * A fetched record that cannot be canonically serialized.
 * Retrying will not fix it.
 */
export class MalformedRecordError extends Error {
  /** Location inside the record, e.g. `$.players[3].era`. */
  readonly path: string;

  constructor(message: string, path: string) {
    super(`${message} at ${path}`);
    this.name = "MalformedRecordError";
    this.path = path;
  }
}

/**
 * I/O failure while writing or reading an artifact or hash sidecar.
 */
export class PersistenceError extends Error {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(`${message}: ${path}${cause ? ` (${describeError(cause)})` : ""}`, {
      cause,
    });
    this.name = "PersistenceError";
    this.path = path;
  }
}

/**
 * A sidecar file exists but does not parse. Treated as "no prior hash".
 */
export class CorruptHashFileError extends Error {
  readonly path: string;

  constructor(path: string, detail: string) {
    super(`Corrupt hash file ${path}: ${detail}`);
    this.name = "CorruptHashFileError";
    this.path = path;
  }
}

/**
 * A unit key that does not match its collector's key layout.
 */
export class InvalidUnitKeyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidUnitKeyError";
  }
}

/**
 * Whether an error should be retried by the worker pool.
 * Anything that is not a transient FetchError is terminal for the unit.
 */
export function isTransient(error: unknown): boolean {
  return error instanceof FetchError && error.transient;
}

/**
 * Renders an unknown thrown value as a single line.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Node filesystem error code, if the value carries one.
 */
export function errorCode(error: unknown): string | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    return error.code;
  }
  return undefined;
}
