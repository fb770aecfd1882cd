/* =========================================================================================
 * Error types
 * =======================================================================================*/

/** Base error for all cache-related exceptions. */
export class CacheError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CacheError";
  }
}

/** Thrown when provided options are invalid or contradictory. */
export class OptionValidationError extends CacheError {
  constructor(message: string) {
    super(message);
    this.name = "OptionValidationError";
  }
}

/** Thrown before any store interaction for an empty key, a bad TTL or an unencodable value. */
export class InvalidArgumentError extends CacheError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

/**
 * The backing store could not be reached or rejected the command.
 * Never converted into a miss by the cache itself.
 */
export class BackingStoreUnavailableError extends CacheError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "BackingStoreUnavailableError";
  }
}

/** A backing-store call did not settle within its timeout. */
export class CacheTimeoutError extends CacheError {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`Cache operation "${operation}" timed out after ${timeoutMs}ms`);
    this.name = "CacheTimeoutError";
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/** Thrown when encryption/decryption fails or pre-conditions are not met. */
export class EncryptionError extends CacheError {
  constructor(message: string) {
    super(message);
    this.name = "EncryptionError";
  }
}

/** Message of an unknown thrown value. */
export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
