/**
 * Sequence handles.
 *
 * A Seq<T> describes a contiguous run of elements of one static type T over
 * a Storage. It comes in two lifecycle modes with distinct types:
 *
 * - SeqBuffer<T> owns fresh storage and must be released (or detached)
 *   exactly once.
 * - SeqView<T> borrows storage owned by a buffer or by the caller. It has no
 *   release method; reading it after the owner is released throws.
 */

import { tracer } from "@seqflow/core";
import { Storage } from "./storage.js";

/** Checked window over the backing elements of a sequence. */
export interface Window<T> {
  readonly items: readonly T[];
  /** Index of the first element in `items` */
  readonly start: number;
  /** One past the last element in `items` */
  readonly end: number;
}

export abstract class Seq<T> implements Iterable<T> {
  /** @internal */
  readonly storage: Storage<T>;
  readonly offset: number;
  readonly length: number;

  protected constructor(storage: Storage<T>, offset: number, length: number) {
    if (offset < 0 || length < 0 || offset + length > storage.capacity) {
      throw new RangeError(
        `window [${offset}, ${offset + length}) exceeds storage #${storage.id} of ${storage.capacity}`
      );
    }
    this.storage = storage;
    this.offset = offset;
    this.length = length;
  }

  /** False once the backing storage has been released. */
  get isLive(): boolean {
    return this.storage.live;
  }

  /**
   * Element at `index`, or undefined outside `[0, length)`.
   * @throws StaleViewError
   */
  at(index: number): T | undefined {
    const items = this.storage.read("at");
    if (!Number.isInteger(index) || index < 0 || index >= this.length) return undefined;
    return items[this.offset + index];
  }

  /**
   * Copy the elements into a fresh array.
   * @throws StaleViewError
   */
  toArray(): T[] {
    return this.storage.read("toArray").slice(this.offset, this.offset + this.length);
  }

  *[Symbol.iterator](): IterableIterator<T> {
    for (let i = 0; i < this.length; i++) {
      yield this.storage.read("iterate")[this.offset + i];
    }
  }

  /**
   * @internal Checked access for combinators.
   * @throws StaleViewError
   */
  read(operation: string): Window<T> {
    const items = this.storage.read(operation);
    return { items, start: this.offset, end: this.offset + this.length };
  }

  /**
   * @internal Borrow `count` elements starting at `start` (relative to this
   * sequence). Bounds must already be clamped.
   * @throws StaleViewError
   */
  borrow(start: number, count: number, operation: string): SeqView<T> {
    this.storage.read(operation);
    return new SeqView(this.storage, this.offset + start, count, operation);
  }
}

/**
 * An owning sequence. Produced by every eager combinator.
 */
export class SeqBuffer<T> extends Seq<T> {
  private readonly owned: Storage<T, T[]>;

  /** @internal Takes ownership of `items`; the caller must not keep it. */
  constructor(items: T[], operation: string) {
    const storage = new Storage<T, T[]>(items, true);
    super(storage, 0, items.length);
    this.owned = storage;
    tracer.record("allocate", storage.id, items.length, operation);
  }

  get released(): boolean {
    return !this.owned.live;
  }

  /**
   * Release the storage. Views borrowed from this buffer become stale.
   * @throws DoubleReleaseError on a second call
   */
  release(): void {
    this.owned.end("release");
  }

  /**
   * Move the elements out as a plain array and release the buffer.
   * @throws DoubleReleaseError if the buffer was already released
   */
  detach(): T[] {
    return this.owned.end("detach");
  }

  /** Borrow the whole buffer. */
  view(): SeqView<T> {
    return this.borrow(0, this.length, "view");
  }
}

/**
 * A borrowing sequence: a window into storage someone else owns.
 */
export class SeqView<T> extends Seq<T> {
  /** @internal */
  constructor(storage: Storage<T>, offset: number, length: number, operation: string) {
    super(storage, offset, length);
    tracer.record("borrow", storage.id, length, operation);
  }
}

/** Element type of a sequence type. */
export type ElementOf<S> = S extends Seq<infer T> ? T : never;
