/**
 * Element and result types for seqflow combinators.
 */

import type { SeqBuffer } from "./seq.js";

/** Element type of a zipped sequence. */
export interface Pair<A, B> {
  readonly a: A;
  readonly b: B;
}

/** The two halves of a stable partition, both owned by the caller. */
export interface PartitionResult<T> {
  /** Elements that satisfied the predicate, in source order */
  readonly yes: SeqBuffer<T>;
  /** Elements that did not, in source order */
  readonly no: SeqBuffer<T>;
}

/** Types `unique` can deduplicate without an explicit Eq. */
export type Primitive = string | number | bigint | boolean | symbol | null | undefined;
