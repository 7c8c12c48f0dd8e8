/**
 * seqflow - typed sequences with explicit ownership, plus the composition
 * helpers that string them together.
 *
 * Re-exports every @seqflow/* package:
 *
 * - @seqflow/core: config, errors, ownership tracing
 * - @seqflow/std: Eq, Hash, Semigroup, Monoid instances
 * - @seqflow/collections: HashSet
 * - @seqflow/seq: Seq, SeqBuffer, SeqView and the combinators
 * - @seqflow/fp: chain, pipe, stage, curry
 *
 * ```ts
 * import { fromArray, repeat, reverse, unique, pad, slice, sum, chain } from "seqflow";
 *
 * const total = chain(
 *   fromArray([1, 2, 2, 3, 4]),
 *   (src) => repeat(src, 2),
 *   (xs) => reverse(xs),
 *   (xs) => unique(xs),
 *   (xs) => pad(xs, 10, 99),
 *   (xs) => slice(xs, 2, 7),
 *   (xs) => sum(xs),
 * ); // 2 + 1 + 99 * 3 = 300
 * ```
 */

export * from "@seqflow/core";
export * from "@seqflow/std";
export * from "@seqflow/collections";
export * from "@seqflow/seq";
export * from "@seqflow/fp";
