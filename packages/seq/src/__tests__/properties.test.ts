import { describe, it, expect } from "vitest";
import { fromArray, range } from "../construct.js";
import { concat, map, reverse, unique } from "../combinators.js";
import { take, drop } from "../views.js";
import { sum } from "../reduce.js";

const samples: number[][] = [
  [],
  [7],
  [3, 1, 4, 1, 5, 9, 2, 6],
  [0, -0, -5, 5, 2.5, 2.5],
  [...Array.from({ length: 40 }, (_, i) => (i * 17) % 11)],
];

describe("algebraic properties", () => {
  it.each(samples.map((s) => [s]))("reverse is an involution for %j", (items) => {
    expect(reverse(reverse(fromArray(items))).toArray()).toEqual(items);
  });

  it.each(samples.map((s) => [s]))("take(n) ++ drop(n) rebuilds %j", (items) => {
    const src = fromArray(items);
    for (const n of [0, 1, 3, items.length, items.length + 2]) {
      expect(concat(take(src, n), drop(src, n)).toArray()).toEqual(items);
    }
  });

  it.each(samples.map((s) => [s]))("map(identity) preserves %j", (items) => {
    expect(map(fromArray(items), (x) => x).toArray()).toEqual(items);
  });

  it.each(samples.map((s) => [s]))("unique is idempotent on %j", (items) => {
    const once = unique(fromArray(items));
    expect(unique(once).toArray()).toEqual(once.toArray());
    expect(once.length).toBe(new Set(items).size);
  });

  it("sum of range(0, n) is n(n-1)/2", () => {
    for (const n of [0, 1, 2, 10, 1000]) {
      expect(sum(range(0, n))).toBe(n === 0 ? 0 : (n * (n - 1)) / 2);
    }
  });

  it("length of concat is the sum of lengths", () => {
    for (const a of samples) {
      for (const b of samples) {
        expect(concat(fromArray(a), fromArray(b)).length).toBe(a.length + b.length);
      }
    }
  });
});
