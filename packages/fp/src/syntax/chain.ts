/**
 * Chain - type-changing, value-first composition
 *
 * Feeds a value through a series of functions left to right; each stage may
 * change the type of the value.
 *
 * Up to ten stages, untyped lambdas get their parameter type from the
 * previous stage. Past that, every stage is still checked against the
 * result of the one before it, but has to annotate its own parameter.
 */

// ============================================================================
// Stage checking
// ============================================================================

/** Any single-argument function, whatever it accepts. */
export type AnyStage = (x: never) => unknown;

/**
 * The stage list `Fs` as it must be for input `A`: each stage accepts the
 * previous result. A mismatching stage is replaced by the type it should
 * have had, so the error points at it.
 */
export type ChainStages<A, Fs extends readonly unknown[]> = Fs extends readonly []
  ? readonly []
  : Fs extends readonly [infer F, ...infer Rest]
    ? F extends (x: A) => infer B
      ? readonly [F, ...ChainStages<B, Rest>]
      : readonly [(x: A) => unknown, ...ChainStages<unknown, Rest>]
    : readonly ((x: unknown) => unknown)[];

/** Result of running the stages `Fs` on an `A`; `unknown` for a spread array. */
export type ChainResult<A, Fs extends readonly unknown[]> = Fs extends readonly []
  ? A
  : Fs extends readonly [infer F, ...infer Rest]
    ? F extends (x: never) => infer B
      ? ChainResult<B, Rest>
      : never
    : unknown;

// ============================================================================
// chain
// ============================================================================

/**
 * Pass a value through a series of functions
 *
 * @example
 * ```typescript
 * const result = chain(
 *   2,
 *   x => x + 1,
 *   x => String(x),
 *   s => s.length
 * );
 * // result: 1
 * ```
 */
export function chain<A>(a: A): A;
export function chain<A, B>(
  a: A,
  s1: (x: A) => B,
): B;
export function chain<A, B, C>(
  a: A,
  s1: (x: A) => B,
  s2: (x: B) => C,
): C;
export function chain<A, B, C, D>(
  a: A,
  s1: (x: A) => B,
  s2: (x: B) => C,
  s3: (x: C) => D,
): D;
export function chain<A, B, C, D, E>(
  a: A,
  s1: (x: A) => B,
  s2: (x: B) => C,
  s3: (x: C) => D,
  s4: (x: D) => E,
): E;
export function chain<A, B, C, D, E, F>(
  a: A,
  s1: (x: A) => B,
  s2: (x: B) => C,
  s3: (x: C) => D,
  s4: (x: D) => E,
  s5: (x: E) => F,
): F;
export function chain<A, B, C, D, E, F, G>(
  a: A,
  s1: (x: A) => B,
  s2: (x: B) => C,
  s3: (x: C) => D,
  s4: (x: D) => E,
  s5: (x: E) => F,
  s6: (x: F) => G,
): G;
export function chain<A, B, C, D, E, F, G, H>(
  a: A,
  s1: (x: A) => B,
  s2: (x: B) => C,
  s3: (x: C) => D,
  s4: (x: D) => E,
  s5: (x: E) => F,
  s6: (x: F) => G,
  s7: (x: G) => H,
): H;
export function chain<A, B, C, D, E, F, G, H, I>(
  a: A,
  s1: (x: A) => B,
  s2: (x: B) => C,
  s3: (x: C) => D,
  s4: (x: D) => E,
  s5: (x: E) => F,
  s6: (x: F) => G,
  s7: (x: G) => H,
  s8: (x: H) => I,
): I;
export function chain<A, B, C, D, E, F, G, H, I, J>(
  a: A,
  s1: (x: A) => B,
  s2: (x: B) => C,
  s3: (x: C) => D,
  s4: (x: D) => E,
  s5: (x: E) => F,
  s6: (x: F) => G,
  s7: (x: G) => H,
  s8: (x: H) => I,
  s9: (x: I) => J,
): J;
export function chain<A, B, C, D, E, F, G, H, I, J, K>(
  a: A,
  s1: (x: A) => B,
  s2: (x: B) => C,
  s3: (x: C) => D,
  s4: (x: D) => E,
  s5: (x: E) => F,
  s6: (x: F) => G,
  s7: (x: G) => H,
  s8: (x: H) => I,
  s9: (x: I) => J,
  s10: (x: J) => K,
): K;
export function chain<A, Fs extends readonly AnyStage[]>(
  a: A,
  ...stages: Fs & ChainStages<A, Fs>
): ChainResult<A, Fs>;
export function chain(a: unknown, ...stages: Array<(x: unknown) => unknown>): unknown {
  let value = a;
  for (const s of stages) {
    value = s(value);
  }
  return value;
}

// ============================================================================
// Chain - fluent form
// ============================================================================

/**
 * A value waiting for its next stage. Typed for any number of stages.
 *
 * @example
 * ```typescript
 * chainFrom([3, 1, 2])
 *   .andThen(xs => xs.length)
 *   .andThen(n => n * 2)
 *   .value; // 6
 * ```
 */
export class Chain<A> {
  constructor(readonly value: A) {}

  andThen<B>(f: (a: A) => B): Chain<B> {
    return new Chain(f(this.value));
  }
}

export function chainFrom<A>(value: A): Chain<A> {
  return new Chain(value);
}
