/**
 * @seqflow/fp — composition helpers
 *
 * - `chain` / `chainFrom`: left-to-right composition where each stage may
 *   change the type
 * - `pipe` / `stage` / `_`: one accumulator threaded through stages of any
 *   arity
 * - `curry` / `uncurry`: arbitrary-arity currying
 *
 * @example
 * ```typescript
 * import { chain, pipe, stage, _, curry } from '@seqflow/fp';
 *
 * chain(3, x => x * 2, String); // "6"
 *
 * const sub = (a: number, b: number) => a - b;
 * pipe(10, stage(sub, _, 4), acc => acc * 2); // 12
 *
 * const add3 = curry((a: number, b: number, c: number) => a + b + c);
 * add3(1)(2)(3); // 6
 * ```
 */

export { chain, chainFrom, Chain } from "./syntax/chain.js";

export {
  pipe,
  stage,
  _,
  placeholder,
  isPlaceholder,
  type Placeholder,
  type Stage,
  type StageArgs,
} from "./syntax/pipe.js";

export {
  curry,
  uncurry,
  type Arity,
  type Curried,
  type TakeParams,
  type UncurriedParams,
  type UncurriedResult,
} from "./syntax/curry.js";
