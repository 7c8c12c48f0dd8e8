/**
 * End-to-end pipelines across every package.
 */
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  chain,
  chainFrom,
  pipe,
  stage,
  _,
  curry,
  fromArray,
  range,
  map,
  filter,
  repeat,
  concat,
  reverse,
  unique,
  pad,
  slice,
  drop,
  sum,
  foldl,
  foldr,
  scan,
  zip,
  zipWith,
  flatten,
  partition,
  any,
  all,
  forEach,
  scoped,
  tracer,
  StaleViewError,
  type Seq,
} from "../src/index.js";

describe("golden pipeline", () => {
  it("repeat, concat, reverse, unique, pad, slice, sum", () => {
    const src = fromArray([1, 2, 2, 3, 4]);

    const repeated = repeat(src, 2);
    expect(repeated.toArray()).toEqual([1, 2, 2, 3, 4, 1, 2, 2, 3, 4]);

    const joined = concat(repeated, src);
    expect(joined.length).toBe(15);

    const reversed = reverse(joined);
    expect(reversed.toArray().slice(0, 5)).toEqual([4, 3, 2, 2, 1]);

    const deduped = unique(reversed);
    expect(deduped.toArray()).toEqual([4, 3, 2, 1]);

    const padded = pad(deduped, 10, 99);
    expect(padded.toArray()).toEqual([4, 3, 2, 1, 99, 99, 99, 99, 99, 99]);

    const window = slice(padded, 2, 7);
    expect(window.toArray()).toEqual([2, 1, 99, 99, 99]);

    expect(sum(window)).toBe(300);
  });

  it("gives the same answer as a single chain", () => {
    const total = chain(
      fromArray([1, 2, 2, 3, 4]),
      (src) => concat(repeat(src, 2), src),
      (xs) => reverse(xs),
      (xs) => unique(xs),
      (xs) => pad(xs, 10, 99),
      (xs) => slice(xs, 2, 7),
      (xs) => sum(xs),
    );
    expect(total).toBe(300);
  });

  it("releases every intermediate inside a scope", () => {
    tracer.reset();
    tracer.enable();
    try {
      const total = scoped((scope) => {
        const src = fromArray([1, 2, 2, 3, 4]);
        const deduped = scope.own(unique(scope.own(reverse(scope.own(concat(scope.own(repeat(src, 2)), src))))));
        return sum(slice(scope.own(pad(deduped, 10, 99)), 2, 7));
      });
      expect(total).toBe(300);
      expect(tracer.getLeaks()).toEqual([]);
    } finally {
      tracer.reset();
    }
  });
});

describe("composition demos", () => {
  it("chain changes type at every stage", () => {
    const result = chain(
      7,
      (x) => x * 1.26,
      (d) => d.toFixed(2),
      (s) => s.length,
      (n) => n * 10,
    );
    expect(result).toBe(40);
  });

  it("pipe with placeholder stages", () => {
    const add = (a: number, b: number) => a + b;
    const mul = (a: number, b: number) => a * b;
    const sub = (a: number, b: number) => a - b;
    expect(pipe(add(3, 2), stage(sub, 4, _), stage(mul, 5, _), stage(sub, _, 1), stage(add, _, _))).toBe(-12);
  });

  it("pipe over sequences", () => {
    const seen: number[] = [];
    const result = pipe<Seq<number>>(
      fromArray([1, 2, 3, 4, 5, 6, 7]),
      (acc) => map(acc, (x) => x * 7),
      (acc) => forEach(acc, (x) => seen.push(x)),
      (acc) => drop(acc, 2),
    );
    expect(seen).toEqual([7, 14, 21, 28, 35, 42, 49]);
    expect(result.toArray()).toEqual([21, 28, 35, 42, 49]);
  });

  it("curried five-argument add", () => {
    const add5 = curry((a: number, b: number, c: number, d: number, e: number) => a + b + c + d + e);
    const add10 = add5(10);
    expect(add10(1)(2)(4)(5)).toBe(22);
    expect(add10(0)(0)(0)(0)).toBe(10);
  });

  it("fluent chain over a sequence", () => {
    const evens = chainFrom(range(0, 10))
      .andThen((xs) => filter(xs, (x) => x % 2 === 0))
      .andThen((xs) => foldl(xs, "", (acc, x) => acc + x)).value;
    expect(evens).toBe("02468");
  });
});

describe("combinator demos", () => {
  const a = fromArray([10, 20, 30, 40]);
  const b = fromArray([1, 2, 3, 4]);

  it("folds, zips and scans", () => {
    expect(foldl(a, 0, (acc, x) => acc + x)).toBe(100);
    expect(foldr(a, 0, (x, acc) => x - acc)).toBe(-20);
    expect(zip(a, b).toArray().map((p) => `(${p.a},${p.b})`)).toEqual(["(10,1)", "(20,2)", "(30,3)", "(40,4)"]);
    expect(zipWith(a, b, (x, y) => x + y).toArray()).toEqual([11, 22, 33, 44]);
    expect(map(zip(a, b), (p) => p.a * p.b).toArray()).toEqual([10, 40, 90, 160]);
    expect(scan(a, 0, (acc, x) => acc + x).toArray()).toEqual([10, 30, 60, 100]);
  });

  it("flattens, partitions and tests", () => {
    expect(flatten(fromArray([a, b])).toArray()).toEqual([10, 20, 30, 40, 1, 2, 3, 4]);
    const { yes, no } = partition(a, (x) => x % 3 === 0);
    expect([yes.toArray(), no.toArray()]).toEqual([[30], [10, 20, 40]]);
    expect(any(a, (x) => x === 20)).toBe(true);
    expect(all(a, (x) => x > 0)).toBe(true);
    expect(range(5, 10).toArray()).toEqual([5, 6, 7, 8, 9]);
  });

  it("views fail after their owner is released", () => {
    const owned = map(a, (x) => x / 10);
    const tail = drop(owned, 2);
    owned.release();
    expect(() => sum(tail)).toThrow(StaleViewError);
  });
});

describe("tracing", () => {
  beforeEach(() => {
    tracer.reset();
  });

  afterEach(() => {
    tracer.reset();
  });

  it("records nothing unless enabled", () => {
    map(fromArray([1]), (x) => x).release();
    expect(tracer.getAllRecords()).toEqual([]);
    expect(tracer.formatForCLI()).toBe("No ownership events recorded.");
  });
});
