/**
 * Standard Typeclasses
 *
 * The capabilities seqflow's combinators ask for explicitly instead of
 * comparing values by their representation:
 * - Eq: equality (Haskell Eq, Rust PartialEq/Eq)
 * - Hash: hashing consistent with an Eq (Swift Hashable, Rust Hash)
 * - Semigroup / Monoid: combining values with an identity (used by `sum`)
 */

// ============================================================================
// Eq — Haskell Eq, Rust PartialEq/Eq, Scala CanEqual
// Types supporting equality comparison.
// ============================================================================

/**
 * Eq typeclass - equality comparison.
 *
 * Laws:
 * - Reflexivity: `equals(x, x) === true`
 * - Symmetry: `equals(x, y) === equals(y, x)`
 * - Transitivity: `equals(x, y) && equals(y, z) => equals(x, z)`
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean;
  notEquals(a: A, b: A): boolean;
}

/**
 * Create an Eq instance from a custom equality function.
 */
export function makeEq<A>(eq: (a: A, b: A) => boolean): Eq<A> {
  return {
    equals: eq,
    notEquals: (a, b) => !eq(a, b),
  };
}

/**
 * Eq using strict equality (===).
 */
export function eqStrict<A>(): Eq<A> {
  return makeEq((a, b) => a === b);
}

export const eqNumber: Eq<number> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

export const eqString: Eq<string> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

export const eqDate: Eq<Date> = {
  equals: (a, b) => a.getTime() === b.getTime(),
  notEquals: (a, b) => a.getTime() !== b.getTime(),
};

/**
 * Create an Eq instance by mapping to a comparable value.
 */
export function eqBy<A, B>(f: (a: A) => B, E: Eq<B> = eqStrict()): Eq<A> {
  return makeEq((a, b) => E.equals(f(a), f(b)));
}

/**
 * Eq for arrays (element-wise comparison).
 */
export function eqArray<A>(E: Eq<A>): Eq<readonly A[]> {
  return makeEq((xs, ys) => {
    if (xs.length !== ys.length) return false;
    return xs.every((x, i) => E.equals(x, ys[i]));
  });
}

// ============================================================================
// Hash — Swift Hashable, Rust Hash
// Types that can be bucketed by an integer hash.
// ============================================================================

/**
 * Hash typeclass - a 32-bit integer hash.
 *
 * Law (with the paired Eq):
 * - `equals(a, b) => hash(a) === hash(b)`
 */
export interface Hash<A> {
  hash(a: A): number;
}

/**
 * Create a Hash instance from a hashing function.
 */
export function makeHash<A>(hash: (a: A) => number): Hash<A> {
  return { hash };
}

/** FNV-1a over UTF-16 code units. */
export const hashString: Hash<string> = makeHash((s) => {
  let h = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
});

export const hashNumber: Hash<number> = makeHash((n) => {
  // 0 and -0 are equal, so they must hash alike
  if (n === 0) return 0;
  if (Number.isInteger(n) && n >= -0x80000000 && n <= 0x7fffffff) return n >>> 0;
  return hashString.hash(String(n));
});

export const hashBoolean: Hash<boolean> = makeHash((b) => (b ? 1 : 0));

/**
 * Mix two hashes into one (boost::hash_combine).
 */
export function hashCombine(seed: number, h: number): number {
  return (seed ^ (h + 0x9e3779b9 + (seed << 6) + (seed >>> 2))) >>> 0;
}

/**
 * Create a Hash instance by mapping to a hashable value.
 */
export function hashBy<A, B>(f: (a: A) => B, H: Hash<B>): Hash<A> {
  return makeHash((a) => H.hash(f(a)));
}

export function hashArray<A>(H: Hash<A>): Hash<readonly A[]> {
  return makeHash((xs) => xs.reduce((seed, x) => hashCombine(seed, H.hash(x)), xs.length));
}

// ============================================================================
// Semigroup — Haskell Semigroup, Scala cats Semigroup
// Types with an associative combine operation.
// ============================================================================

/**
 * Semigroup typeclass - types with an associative combine operation.
 *
 * Law:
 * - Associativity: `combine(combine(a, b), c) === combine(a, combine(b, c))`
 */
export interface Semigroup<A> {
  combine(a: A, b: A): A;
}

// ============================================================================
// Monoid — Haskell Monoid, Scala cats Monoid
// Semigroup with an identity element.
// ============================================================================

/**
 * Monoid typeclass - Semigroup with an identity element.
 *
 * Laws (in addition to Semigroup laws):
 * - Left identity: `combine(empty(), a) === a`
 * - Right identity: `combine(a, empty()) === a`
 */
export interface Monoid<A> extends Semigroup<A> {
  empty(): A;
}

export const monoidString: Monoid<string> = {
  combine: (a, b) => a + b,
  empty: () => "",
};

export const monoidNumber: Monoid<number> = {
  combine: (a, b) => a + b,
  empty: () => 0,
};

export const monoidBigInt: Monoid<bigint> = {
  combine: (a, b) => a + b,
  empty: () => 0n,
};

/** Multiplicative monoid over numbers. */
export const monoidProduct: Monoid<number> = {
  combine: (a, b) => a * b,
  empty: () => 1,
};

export function monoidArray<A>(): Monoid<A[]> {
  return {
    combine: (a, b) => [...a, ...b],
    empty: () => [],
  };
}
