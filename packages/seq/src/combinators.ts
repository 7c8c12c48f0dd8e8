/**
 * Eager combinators.
 *
 * Each reads its inputs once, runs to completion and returns a fresh
 * SeqBuffer (or a pair of them) that the caller owns. Inputs are never
 * modified. Element order is always the source order unless the combinator
 * says otherwise.
 */

import { HashSet } from "@seqflow/collections";
import type { Eq, Hash } from "@seqflow/std";
import { SeqBuffer, type Seq } from "./seq.js";
import { allocate, toCount } from "./storage.js";
import type { Pair, PartitionResult, Primitive } from "./types.js";

// ---------------------------------------------------------------------------
// Element-wise
// ---------------------------------------------------------------------------

/** Apply `f` to every element; the output type may differ. */
export function map<T, U>(src: Seq<T>, f: (value: T, index: number) => U): SeqBuffer<U> {
  const { items, start } = src.read("map");
  const out = allocate<U>(src.length, "map");
  for (let i = 0; i < src.length; i++) {
    out[i] = f(items[start + i], i);
  }
  return new SeqBuffer(out, "map");
}

/** Keep the elements satisfying `predicate`. */
export function filter<T, S extends T>(
  src: Seq<T>,
  predicate: (value: T, index: number) => value is S
): SeqBuffer<S>;
export function filter<T>(src: Seq<T>, predicate: (value: T, index: number) => boolean): SeqBuffer<T>;
export function filter<T>(src: Seq<T>, predicate: (value: T, index: number) => boolean): SeqBuffer<T> {
  const { items, start } = src.read("filter");
  const out: T[] = [];
  for (let i = 0; i < src.length; i++) {
    const value = items[start + i];
    if (predicate(value, i)) out.push(value);
  }
  return new SeqBuffer(out, "filter");
}

/** Elements in reverse order. */
export function reverse<T>(src: Seq<T>): SeqBuffer<T> {
  const { items, end } = src.read("reverse");
  const out = allocate<T>(src.length, "reverse");
  for (let i = 0; i < src.length; i++) {
    out[i] = items[end - 1 - i];
  }
  return new SeqBuffer(out, "reverse");
}

/**
 * Drop repeated elements, keeping the first occurrence of each in source
 * order.
 *
 * - `unique(src)`: primitives only, SameValueZero (so NaN matches NaN), O(n)
 * - `unique(src, eq)`: any type, O(n²) comparisons
 * - `unique(src, eq, hash)`: any type, O(n) expected
 */
export function unique<T extends Primitive>(src: Seq<T>): SeqBuffer<T>;
export function unique<T>(src: Seq<T>, eq: Eq<T>, hash?: Hash<T>): SeqBuffer<T>;
export function unique<T>(src: Seq<T>, eq?: Eq<T>, hash?: Hash<T>): SeqBuffer<T> {
  const { items, start, end } = src.read("unique");
  const out: T[] = [];

  if (eq === undefined) {
    const seen = new Set<T>();
    for (let i = start; i < end; i++) {
      if (seen.has(items[i])) continue;
      seen.add(items[i]);
      out.push(items[i]);
    }
  } else if (hash !== undefined) {
    const seen = new HashSet(eq, hash);
    for (let i = start; i < end; i++) {
      if (seen.insert(items[i])) out.push(items[i]);
    }
  } else {
    // Quadratic: without a Hash there is nothing to bucket by
    for (let i = start; i < end; i++) {
      const value = items[i];
      if (!out.some((kept) => eq.equals(value, kept))) out.push(value);
    }
  }

  return new SeqBuffer(out, "unique");
}

// ---------------------------------------------------------------------------
// Joining and resizing
// ---------------------------------------------------------------------------

/** Elements of `a` followed by elements of `b`. */
export function concat<T>(a: Seq<T>, b: Seq<T>): SeqBuffer<T> {
  const left = a.read("concat");
  const right = b.read("concat");
  const out = allocate<T>(a.length + b.length, "concat");
  for (let i = 0; i < a.length; i++) {
    out[i] = left.items[left.start + i];
  }
  for (let i = 0; i < b.length; i++) {
    out[a.length + i] = right.items[right.start + i];
  }
  return new SeqBuffer(out, "concat");
}

/**
 * Resize to `newLength`: truncate when shorter, otherwise copy everything
 * and fill the rest with `value`.
 */
export function pad<T>(src: Seq<T>, newLength: number, value: T): SeqBuffer<T> {
  const { items, start } = src.read("pad");
  const length = toCount(newLength);
  const out = allocate<T>(length, "pad");
  const copied = Math.min(src.length, length);
  for (let i = 0; i < copied; i++) {
    out[i] = items[start + i];
  }
  for (let i = copied; i < length; i++) {
    out[i] = value;
  }
  return new SeqBuffer(out, "pad");
}

/** `src` concatenated with itself `times` times. */
export function repeat<T>(src: Seq<T>, times: number): SeqBuffer<T> {
  const { items, start } = src.read("repeat");
  const count = src.length === 0 ? 0 : toCount(times);
  const out = allocate<T>(src.length * count, "repeat");
  for (let r = 0; r < count; r++) {
    const base = r * src.length;
    for (let i = 0; i < src.length; i++) {
      out[base + i] = items[start + i];
    }
  }
  return new SeqBuffer(out, "repeat");
}

/** Concatenate inner sequences in order. */
export function flatten<T>(src: Seq<Seq<T>>): SeqBuffer<T> {
  const { items: inners, start, end } = src.read("flatten");

  let total = 0;
  for (let i = start; i < end; i++) {
    inners[i].read("flatten");
    total += inners[i].length;
  }

  const out = allocate<T>(total, "flatten");
  let pos = 0;
  for (let i = start; i < end; i++) {
    const inner = inners[i].read("flatten");
    for (let j = inner.start; j < inner.end; j++) {
      out[pos++] = inner.items[j];
    }
  }
  return new SeqBuffer(out, "flatten");
}

// ---------------------------------------------------------------------------
// Accumulating and pairing
// ---------------------------------------------------------------------------

/**
 * Inclusive prefix scan: `out[0] = f(init, x0)`, `out[i] = f(out[i-1], xi)`.
 */
export function scan<T, A>(src: Seq<T>, init: A, f: (acc: A, value: T) => A): SeqBuffer<A> {
  const { items, start } = src.read("scan");
  const out = allocate<A>(src.length, "scan");
  let acc = init;
  for (let i = 0; i < src.length; i++) {
    acc = f(acc, items[start + i]);
    out[i] = acc;
  }
  return new SeqBuffer(out, "scan");
}

/** Pair elements by position; the longer input is cut to the shorter. */
export function zip<A, B>(a: Seq<A>, b: Seq<B>): SeqBuffer<Pair<A, B>> {
  return zipWith(a, b, (x, y) => ({ a: x, b: y }));
}

/** Combine elements by position with `f`; length is the shorter input's. */
export function zipWith<A, B, C>(a: Seq<A>, b: Seq<B>, f: (a: A, b: B) => C): SeqBuffer<C> {
  const left = a.read("zip");
  const right = b.read("zip");
  const len = Math.min(a.length, b.length);
  const out = allocate<C>(len, "zip");
  for (let i = 0; i < len; i++) {
    out[i] = f(left.items[left.start + i], right.items[right.start + i]);
  }
  return new SeqBuffer(out, "zip");
}

/**
 * Stable split: `yes` holds the elements satisfying `predicate`, `no` the
 * rest, both in source order.
 */
export function partition<T>(
  src: Seq<T>,
  predicate: (value: T, index: number) => boolean
): PartitionResult<T> {
  const { items, start } = src.read("partition");
  const yes: T[] = [];
  const no: T[] = [];
  for (let i = 0; i < src.length; i++) {
    const value = items[start + i];
    if (predicate(value, i)) yes.push(value);
    else no.push(value);
  }
  return { yes: new SeqBuffer(yes, "partition"), no: new SeqBuffer(no, "partition") };
}
