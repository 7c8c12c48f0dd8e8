/**
 * Backing storage shared by a sequence and every view borrowed from it.
 *
 * Owned storage is ended exactly once (release or detach); afterwards every
 * read through any sequence aliasing it throws StaleViewError. Borrowed
 * storage wraps a caller array and is never ended by the library.
 */

import {
  AllocationError,
  DoubleReleaseError,
  StaleViewError,
  allocationLimit,
  tracer,
} from "@seqflow/core";

let nextStorageId = 1;

export class Storage<T, A extends readonly T[] = readonly T[]> {
  readonly id: number;
  private items: A | undefined;
  private readonly size: number;

  constructor(
    items: A,
    readonly owned: boolean
  ) {
    this.id = nextStorageId++;
    this.items = items;
    this.size = items.length;
  }

  get live(): boolean {
    return this.items !== undefined;
  }

  /** Element count of the storage when it was created. */
  get capacity(): number {
    return this.size;
  }

  /**
   * Checked access to the elements.
   * @throws StaleViewError once the storage has been ended
   */
  read(operation: string): A {
    if (this.items === undefined) {
      tracer.record("stale-access", this.id, this.size, operation);
      throw new StaleViewError(this.id, operation);
    }
    return this.items;
  }

  /**
   * End the storage and hand its elements to the caller.
   * @throws DoubleReleaseError if it was already ended
   */
  end(kind: "release" | "detach"): A {
    const items = this.items;
    if (items === undefined) {
      tracer.record("double-release", this.id, this.size, kind);
      throw new DoubleReleaseError(this.id);
    }
    this.items = undefined;
    tracer.record(kind, this.id, this.size, kind);
    return items;
  }
}

/**
 * Validate a requested element count against the configured allocation
 * limit.
 * @throws AllocationError
 */
export function checkLength(length: number, operation: string): number {
  if (!Number.isSafeInteger(length) || length < 0) {
    throw new AllocationError(operation, length, `${operation}: cannot allocate ${length} elements`);
  }
  const limit = allocationLimit();
  if (length > limit) {
    throw new AllocationError(
      operation,
      length,
      `${operation}: ${length} elements exceeds the allocation limit of ${limit}`
    );
  }
  return length;
}

/**
 * Allocate an output array of exactly `length` slots. Every slot must be
 * written before the array is wrapped in a buffer.
 * @throws AllocationError
 */
export function allocate<T>(length: number, operation: string): T[] {
  checkLength(length, operation);
  try {
    return new Array<T>(length);
  } catch (error) {
    throw new AllocationError(operation, length, `${operation}: allocation failed`, {
      cause: error,
    });
  }
}

/**
 * Clamp an index into `[0, length]`: NaN and negatives become 0, fractions
 * truncate toward zero.
 */
export function clampIndex(index: number, length: number): number {
  if (Number.isNaN(index) || index <= 0) return 0;
  if (index >= length) return length;
  return Math.trunc(index);
}

/**
 * Normalise a count argument: NaN and negatives become 0, fractions
 * truncate toward zero. No upper bound; allocation enforces the limit.
 */
export function toCount(n: number): number {
  if (Number.isNaN(n) || n <= 0) return 0;
  return Math.trunc(n);
}
