/**
 * @seqflow/std — Standard Typeclasses
 *
 * Explicit equality, hashing and combining capabilities for seqflow's
 * combinators:
 * - Eq, Hash: `unique` and HashSet compare values through these, never by
 *   memory representation
 * - Semigroup, Monoid: `sum` folds any monoid from its identity
 *
 * @example
 * ```ts
 * import { eqBy, hashBy, eqString, hashString } from "@seqflow/std";
 *
 * interface User { id: string; name: string }
 * const eqUser = eqBy((u: User) => u.id, eqString);
 * const hashUser = hashBy((u: User) => u.id, hashString);
 * ```
 */

export * from "./typeclasses/index.js";
