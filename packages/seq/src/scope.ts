/**
 * Scope-based release of owned buffers.
 *
 * @example
 * ```typescript
 * const total = scoped((scope) => {
 *   const evens = scope.own(filter(range(0, 10), (x) => x % 2 === 0));
 *   const squares = scope.own(map(evens, (x) => x * x));
 *   return sum(squares);
 * }); // both buffers released here
 * ```
 */

import type { SeqBuffer } from "./seq.js";

export class Scope {
  private readonly owned: Array<SeqBuffer<unknown>> = [];

  /** Register `buffer` for release when the scope ends, and return it. */
  own<T>(buffer: SeqBuffer<T>): SeqBuffer<T> {
    this.owned.push(buffer);
    return buffer;
  }

  /** Number of buffers registered so far. */
  get size(): number {
    return this.owned.length;
  }

  /**
   * @internal Release every registered buffer that is still live, newest
   * first. Buffers the body released or detached itself are skipped.
   */
  close(): void {
    for (let i = this.owned.length - 1; i >= 0; i--) {
      const buffer = this.owned[i];
      if (!buffer.released) buffer.release();
    }
    this.owned.length = 0;
  }
}

/**
 * Run `body` with a fresh Scope and release everything it owns when `body`
 * returns or throws. Return plain values (or `detach()`ed arrays), not
 * buffers registered with the scope.
 */
export function scoped<R>(body: (scope: Scope) => R): R {
  const scope = new Scope();
  try {
    return body(scope);
  } finally {
    scope.close();
  }
}
