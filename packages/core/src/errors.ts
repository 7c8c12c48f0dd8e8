/**
 * seqflow Error Types
 *
 * Every error the library throws is a SeqflowError, so callers can recover
 * from library failures with a single `instanceof` check and branch on
 * `code` for the details.
 */

/** Discriminant carried by every SeqflowError. */
export type SeqflowErrorCode =
  | "allocation"
  | "double-release"
  | "stale-view"
  | "placeholder"
  | "curry"
  | "config";

/**
 * Base class for all seqflow errors.
 */
export class SeqflowError extends Error {
  constructor(
    message: string,
    readonly code: SeqflowErrorCode,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "SeqflowError";
  }
}

/**
 * Thrown when a combinator cannot allocate its output buffer.
 */
export class AllocationError extends SeqflowError {
  constructor(
    readonly operation: string,
    readonly requested: number,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, "allocation", options);
    this.name = "AllocationError";
  }
}

/**
 * Thrown when an owning buffer is released (or detached) a second time.
 */
export class DoubleReleaseError extends SeqflowError {
  constructor(readonly storageId: number) {
    super(`storage #${storageId} was already released`, "double-release");
    this.name = "DoubleReleaseError";
  }
}

/**
 * Thrown when a sequence is read after its backing storage was released.
 */
export class StaleViewError extends SeqflowError {
  constructor(
    readonly storageId: number,
    readonly operation: string
  ) {
    super(`${operation}: storage #${storageId} was released`, "stale-view");
    this.name = "StaleViewError";
  }
}

/** Thrown when a pipe stage is built without a placeholder argument. */
export class PlaceholderError extends SeqflowError {
  constructor(message: string) {
    super(message, "placeholder");
    this.name = "PlaceholderError";
  }
}

/** Thrown when a function cannot be curried at the requested arity. */
export class CurryError extends SeqflowError {
  constructor(
    readonly arity: number,
    message: string
  ) {
    super(message, "curry");
    this.name = "CurryError";
  }
}

export class ConfigError extends SeqflowError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "config", options);
    this.name = "ConfigError";
  }
}
