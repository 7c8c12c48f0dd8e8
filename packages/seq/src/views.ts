/**
 * Borrowing combinators. Each returns a SeqView aliasing the source's
 * storage; no elements are copied. Out-of-range arguments are clamped into
 * `[0, length]`, never reported.
 */

import type { Seq, SeqView } from "./seq.js";
import { clampIndex } from "./storage.js";

/** The first `min(n, length)` elements. */
export function take<T>(src: Seq<T>, n: number): SeqView<T> {
  return src.borrow(0, clampIndex(n, src.length), "take");
}

/** Everything after the first `min(n, length)` elements. */
export function drop<T>(src: Seq<T>, n: number): SeqView<T> {
  const skipped = clampIndex(n, src.length);
  return src.borrow(skipped, src.length - skipped, "drop");
}

/**
 * Elements `[start, end)` after clamping both bounds into `[0, length]`;
 * empty when `start >= end`.
 */
export function slice<T>(src: Seq<T>, start: number, end: number): SeqView<T> {
  const from = clampIndex(start, src.length);
  const to = clampIndex(end, src.length);
  return src.borrow(from, to > from ? to - from : 0, "slice");
}
