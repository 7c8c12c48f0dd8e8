/**
 * @seqflow/seq — typed sequences with explicit ownership
 *
 * A Seq<T> is a run of elements of one static type. Eager combinators
 * return owned buffers (SeqBuffer) that must be released exactly once;
 * `take`, `drop` and `slice` return borrowed views (SeqView) that alias
 * their source and fail loudly once that source is released.
 *
 * @example
 * ```typescript
 * import { fromArray, repeat, reverse, unique, pad, slice, sum } from "@seqflow/seq";
 *
 * const src = fromArray([1, 2, 2, 3, 4]);
 * const twice = repeat(src, 2);
 * const deduped = unique(reverse(twice)); // [4, 3, 2, 1]
 * const padded = pad(deduped, 6, 0);      // [4, 3, 2, 1, 0, 0]
 * sum(slice(padded, 1, 4));               // 6
 * ```
 */

export { Seq, SeqBuffer, SeqView } from "./seq.js";
export type { ElementOf, Window } from "./seq.js";
export type { Pair, PartitionResult, Primitive } from "./types.js";

export { fromArray, range } from "./construct.js";

export {
  map,
  filter,
  reverse,
  unique,
  concat,
  pad,
  repeat,
  flatten,
  scan,
  zip,
  zipWith,
  partition,
} from "./combinators.js";

export { take, drop, slice } from "./views.js";

export { forEach, foldl, foldr, sum, any, all } from "./reduce.js";

export { Scope, scoped } from "./scope.js";
