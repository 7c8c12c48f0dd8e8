/**
 * Currying
 *
 * `curry` turns an n-ary function into a chain of unary ones; `uncurry`
 * goes the other way.
 */

import { CurryError } from "@seqflow/core";

/**
 * Unary chain over the parameter list `P` ending in `R`. Optional
 * parameters count like required ones, since `f.length` includes them.
 *
 * @example
 * ```typescript
 * type T = Curried<[number, string?], boolean>;
 * // (arg: number) => (arg: string) => boolean
 * ```
 */
export type Curried<P extends readonly unknown[], R> = CurriedRequired<Required<P>, R>;

type CurriedRequired<P extends readonly unknown[], R> = P extends readonly [
  infer H,
  ...infer T,
]
  ? (arg: H) => CurriedRequired<T, R>
  : R;

/**
 * Arities `f` can be curried at: `1 | 2 | ... | P["length"]`. Unbounded
 * (any number) once a rest parameter is involved.
 */
export type Arity<
  P extends readonly unknown[],
  Acc extends unknown[] = [],
> = number extends Required<P>["length"]
  ? number
  : Required<P> extends readonly [unknown, ...infer T]
    ? [...Acc, unknown]["length"] | Arity<T, [...Acc, unknown]>
    : never;

/**
 * The first `N` parameter types of `P`. Rest elements repeat their element
 * type.
 */
export type TakeParams<
  P extends readonly unknown[],
  N extends number,
  Acc extends unknown[] = [],
> = Acc["length"] extends N
  ? Acc
  : P extends readonly [infer H, ...infer T]
    ? TakeParams<T, N, [...Acc, H]>
    : P extends readonly []
      ? Acc
      : P extends readonly (infer E)[]
        ? TakeParams<P, N, [...Acc, E]>
        : Acc;

/**
 * Parameter types consumed by applying `F` `N` times. A step typed `unknown`
 * may still be a function at run time, so it accepts anything further.
 */
export type UncurriedParams<
  F,
  N extends number,
  Acc extends unknown[] = [],
> = Acc["length"] extends N
  ? Acc
  : F extends (arg: infer H) => infer R
    ? UncurriedParams<R, N, [...Acc, H]>
    : unknown extends F
      ? [...Acc, ...unknown[]]
      : never;

/** Result of applying `F` `N` times. */
export type UncurriedResult<
  F,
  N extends number,
  Depth extends unknown[] = [],
> = Depth["length"] extends N
  ? F
  : F extends (arg: never) => infer R
    ? UncurriedResult<R, N, [...Depth, unknown]>
    : unknown extends F
      ? unknown
      : never;

function isUnary(value: unknown): value is (arg: unknown) => unknown {
  return typeof value === "function";
}

function checkArity(arity: number, operation: string): void {
  if (!Number.isInteger(arity) || arity < 1) {
    throw new CurryError(arity, `${operation}: arity must be a positive integer, got ${arity}`);
  }
}

/**
 * Curry `f` over `arity` arguments (default `f.length`). Once `arity`
 * arguments have been applied one at a time, `f` is called with all of them
 * in order.
 *
 * Partial applications can be shared: applying one never changes another.
 *
 * @example
 * ```typescript
 * const add = curry((a: number, b: number, c: number) => a + b + c);
 * const add1 = add(1);
 * add1(2)(3); // 6
 * add1(10)(20); // 31
 *
 * const total = curry((...xs: number[]) => xs.reduce((s, x) => s + x, 0), 3);
 * total(1)(2)(3); // 6
 * ```
 *
 * A parameter with a default value is not counted by `f.length`; pass
 * `arity` explicitly for such functions.
 *
 * @throws CurryError when `arity` is not a positive integer
 */
export function curry<P extends readonly unknown[], R>(
  f: (...args: P) => R,
): Curried<P, R>;
export function curry<P extends readonly unknown[], R, N extends number>(
  f: (...args: P) => R,
  arity: N extends Arity<P> ? N : Arity<P>,
): number extends N ? (arg: P[number]) => unknown : Curried<TakeParams<Required<P>, N>, R>;
export function curry(
  f: (...args: unknown[]) => unknown,
  arity: number = f.length,
): unknown {
  checkArity(arity, "curry");

  const collect =
    (captured: readonly unknown[]) =>
    (arg: unknown): unknown => {
      const args = [...captured, arg];
      return args.length === arity ? f(...args) : collect(args);
    };

  return collect([]);
}

/**
 * Turn a curried function back into one taking `arity` arguments at once.
 *
 * @example
 * ```typescript
 * const add = uncurry((a: number) => (b: number) => a + b, 2);
 * add(1, 2); // 3
 * ```
 *
 * @throws CurryError when `arity` is not a positive integer, or when a step
 * of the chain returns something other than a function before `arity`
 * arguments are applied
 */
export function uncurry<F extends (arg: never) => unknown, N extends number>(
  curried: F,
  arity: N,
): (...args: UncurriedParams<F, N>) => UncurriedResult<F, N>;
export function uncurry(
  curried: (arg: unknown) => unknown,
  arity: number,
): (...args: unknown[]) => unknown {
  checkArity(arity, "uncurry");

  return (...args) => {
    let acc: unknown = curried;
    for (let i = 0; i < arity; i++) {
      if (!isUnary(acc)) {
        throw new CurryError(arity, `uncurry: expected a function after ${i} argument(s)`);
      }
      acc = acc(args[i]);
    }
    return acc;
  };
}
