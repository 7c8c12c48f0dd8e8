import { describe, it, expect } from "vitest";
import { PlaceholderError, SeqflowError } from "@seqflow/core";
import { pipe, stage, _, placeholder, isPlaceholder } from "./pipe.js";

const add = (a: number, b: number) => a + b;
const sub = (a: number, b: number) => a - b;
const mul = (a: number, b: number) => a * b;

describe("pipe", () => {
  it("returns the initial value with no stages", () => {
    expect(pipe("seed")).toBe("seed");
  });

  it("threads the accumulator through each stage", () => {
    expect(pipe(5, (acc) => acc - 2, (acc) => acc * 3)).toBe(9);
  });

  it("accepts any number of stages", () => {
    const stages = Array.from({ length: 100 }, () => (acc: number) => acc + 1);
    expect(pipe(0, ...stages)).toBe(100);
  });
});

describe("stage", () => {
  it("fills the placeholder with the accumulator", () => {
    expect(stage(sub, 4, _)(10)).toBe(-6);
    expect(stage(sub, _, 4)(10)).toBe(6);
  });

  it("fills every placeholder position", () => {
    expect(stage(add, _, _)(-6)).toBe(-12);
  });

  it("works with functions of any arity", () => {
    const clamp = (lo: number, x: number, hi: number) => Math.min(hi, Math.max(lo, x));
    const join = (sep: string, a: string, b: string, c: string) => [a, b, c].join(sep);
    expect(pipe(42, stage(clamp, 0, _, 10))).toBe(10);
    expect(pipe("x", stage(join, "-", "a", _, "c"))).toBe("a-x-c");
  });

  it("runs the placeholder pipeline", () => {
    expect(pipe(add(3, 2), stage(sub, 4, _), stage(mul, 5, _), stage(sub, _, 1), stage(add, _, _))).toBe(
      -12,
    );
  });

  it("keeps its arguments across calls", () => {
    const subFrom100 = stage(sub, 100, _);
    expect(subFrom100(1)).toBe(99);
    expect(subFrom100(50)).toBe(50);
  });

  it("throws PlaceholderError without a placeholder", () => {
    expect(() => stage(add, 1, 2)).toThrow(PlaceholderError);
    expect(() => stage(add, 1, 2)).toThrow(SeqflowError);
    expect(() => stage(add, 1, 2)).toThrow("stage(add): at least one argument must be the placeholder _");
  });
});

describe("placeholder", () => {
  it("is the same token as _", () => {
    expect(placeholder).toBe(_);
    expect(isPlaceholder(_)).toBe(true);
    expect(isPlaceholder(Symbol("seqflow.placeholder"))).toBe(false);
  });
});
