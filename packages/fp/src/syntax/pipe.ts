/**
 * Pipe - one accumulator, many stages
 *
 * Every stage reads the accumulator and returns its replacement, so the type
 * never changes along the way. `stage()` turns a call of any arity into such
 * a stage by marking where the accumulator goes with `_`.
 *
 * @example
 * ```typescript
 * const add = (a: number, b: number) => a + b;
 * const sub = (a: number, b: number) => a - b;
 *
 * pipe(add(3, 2), stage(sub, 4, _), stage(add, _, _)); // -2
 * ```
 */

import { PlaceholderError } from "@seqflow/core";

// ============================================================================
// Placeholder
// ============================================================================

/** Marks the argument positions a stage fills with the accumulator. */
export const _ = Symbol("seqflow.placeholder");
export type Placeholder = typeof _;
export const placeholder: Placeholder = _;

export function isPlaceholder(value: unknown): value is Placeholder {
  return value === _;
}

/**
 * Arguments for `stage(f, ...)`: each position takes its own parameter type,
 * or `_` where the accumulator type `A` fits that parameter.
 */
export type StageArgs<P extends readonly unknown[], A> = {
  [K in keyof P]: P[K] | ([A] extends [P[K]] ? Placeholder : never);
};

// ============================================================================
// pipe / stage
// ============================================================================

/** A stage of `pipe`: read the accumulator, return the next one. */
export type Stage<A> = (acc: A) => A;

/**
 * Thread `a` through `stages` in order.
 *
 * @example
 * ```typescript
 * pipe(5, acc => acc - 2, acc => acc * 3); // 9
 * ```
 */
export function pipe<A>(a: A, ...stages: Array<Stage<A>>): A {
  return stages.reduce((acc, s) => s(acc), a);
}

/**
 * Build a stage that calls `f` with `args`, every `_` replaced by the
 * accumulator. The argument list is fixed when the stage is built.
 *
 * @throws PlaceholderError when no argument is `_`
 */
export function stage<P extends readonly unknown[], A>(
  f: (...args: P) => A,
  ...args: StageArgs<P, A>
): Stage<A>;
export function stage(
  f: (...args: unknown[]) => unknown,
  ...args: unknown[]
): Stage<unknown> {
  if (!args.some(isPlaceholder)) {
    throw new PlaceholderError(
      `stage(${f.name || "anonymous"}): at least one argument must be the placeholder _`,
    );
  }
  const bound = [...args];
  return (acc) => f(...bound.map((arg) => (isPlaceholder(arg) ? acc : arg)));
}
