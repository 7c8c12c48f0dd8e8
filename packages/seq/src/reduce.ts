/**
 * Terminal operations: fold a sequence into a single value, or visit it for
 * side effects. Empty inputs return the monoid identity (`sum`), the initial
 * accumulator (`foldl`, `foldr`), false (`any`) or true (`all`).
 */

import { monoidNumber, type Monoid } from "@seqflow/std";
import type { Seq, ElementOf } from "./seq.js";

/**
 * Call `op` on every element in order and return `src` unchanged, so it can
 * sit in the middle of a pipeline.
 */
export function forEach<S extends Seq<unknown>>(
  src: S,
  op: (value: ElementOf<S>, index: number) => void
): S;
export function forEach<T>(src: Seq<T>, op: (value: T, index: number) => void): Seq<T> {
  const { items, start, end } = src.read("forEach");
  for (let i = start; i < end; i++) {
    op(items[i], i - start);
  }
  return src;
}

/** Left fold: `acc = f(acc, x)` from first to last. */
export function foldl<T, A>(src: Seq<T>, init: A, f: (acc: A, value: T) => A): A {
  const { items, start, end } = src.read("foldl");
  let acc = init;
  for (let i = start; i < end; i++) {
    acc = f(acc, items[i]);
  }
  return acc;
}

/** Right fold: `acc = f(x, acc)` from last to first. Note the argument order. */
export function foldr<T, A>(src: Seq<T>, init: A, f: (value: T, acc: A) => A): A {
  const { items, start, end } = src.read("foldr");
  let acc = init;
  for (let i = end - 1; i >= start; i--) {
    acc = f(items[i], acc);
  }
  return acc;
}

/**
 * Sum of a numeric sequence (0 when empty), or of any sequence whose element
 * type has a Monoid (`M.empty()` when empty).
 */
export function sum(src: Seq<number>): number;
export function sum<T>(src: Seq<T>, M: Monoid<T>): T;
export function sum(src: Seq<unknown>, M: Monoid<unknown> = monoidNumber): unknown {
  return foldl(src, M.empty(), (acc, value) => M.combine(acc, value));
}

/** True at the first element satisfying `predicate`; false when empty. */
export function any<T>(src: Seq<T>, predicate: (value: T) => boolean): boolean {
  const { items, start, end } = src.read("any");
  for (let i = start; i < end; i++) {
    if (predicate(items[i])) return true;
  }
  return false;
}

/** False at the first element failing `predicate`; true when empty. */
export function all<T>(src: Seq<T>, predicate: (value: T) => boolean): boolean {
  const { items, start, end } = src.read("all");
  for (let i = start; i < end; i++) {
    if (!predicate(items[i])) return false;
  }
  return true;
}
