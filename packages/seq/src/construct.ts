/**
 * Entry points for creating sequences.
 *
 * `fromArray()` borrows any array without copying; `range()` allocates an
 * owned run of consecutive integers.
 */

import { SeqBuffer, SeqView } from "./seq.js";
import { Storage, allocate } from "./storage.js";

/** Borrow a whole array as a sequence (zero-copy). */
export function fromArray<T>(items: readonly T[]): SeqView<T> {
  return new SeqView(new Storage<T>(items, false), 0, items.length, "fromArray");
}

/**
 * Owned sequence `start, start + 1, ...` of every value below `end`.
 * Empty when `end <= start`.
 */
export function range(start: number, end: number): SeqBuffer<number> {
  const span = end - start;
  const count = span > 0 ? Math.ceil(span) : 0;
  const out = allocate<number>(count, "range");
  for (let i = 0; i < count; i++) {
    out[i] = start + i;
  }
  return new SeqBuffer(out, "range");
}
