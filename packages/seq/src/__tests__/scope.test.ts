import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { tracer } from "@seqflow/core";
import { range } from "../construct.js";
import { filter, map } from "../combinators.js";
import { sum } from "../reduce.js";
import { scoped, Scope } from "../scope.js";
import type { SeqBuffer } from "../seq.js";

describe("scoped", () => {
  beforeEach(() => {
    tracer.reset();
    tracer.enable();
  });

  afterEach(() => {
    tracer.reset();
  });

  it("releases owned buffers when the body returns", () => {
    const created: SeqBuffer<number>[] = [];
    const total = scoped((scope) => {
      const evens = scope.own(filter(range(0, 10), (x) => x % 2 === 0));
      const squares = scope.own(map(evens, (x) => x * x));
      created.push(evens, squares);
      return sum(squares);
    });

    expect(total).toBe(0 + 4 + 16 + 36 + 64);
    expect(created.map((b) => b.released)).toEqual([true, true]);
  });

  it("releases owned buffers when the body throws", () => {
    const created: SeqBuffer<number>[] = [];
    expect(() =>
      scoped((scope) => {
        created.push(scope.own(range(0, 3)));
        throw new Error("boom");
      })
    ).toThrow("boom");
    expect(created[0].released).toBe(true);
  });

  it("releases newest first", () => {
    const ids: number[] = [];
    scoped((scope) => {
      ids.push(scope.own(range(0, 1)).storage.id);
      ids.push(scope.own(range(0, 2)).storage.id);
    });
    const releases = tracer
      .getAllRecords()
      .filter((r) => r.kind === "release")
      .map((r) => r.storageId);
    expect(releases).toEqual([ids[1], ids[0]]);
  });

  it("skips buffers the body already released or detached", () => {
    const result = scoped((scope) => {
      scope.own(range(0, 2)).release();
      return scope.own(range(5, 8)).detach();
    });
    expect(result).toEqual([5, 6, 7]);
    expect(tracer.getAllRecords().some((r) => r.kind === "double-release")).toBe(false);
  });

  it("leaves nothing leaked", () => {
    scoped((scope) => {
      scope.own(map(scope.own(range(0, 4)), (x) => x + 1));
    });
    expect(tracer.getLeaks()).toEqual([]);
  });
});

describe("Scope", () => {
  it("counts registered buffers and empties on close", () => {
    const scope = new Scope();
    const a = scope.own(range(0, 1));
    scope.own(range(0, 1));
    expect(scope.size).toBe(2);
    scope.close();
    expect(scope.size).toBe(0);
    expect(a.released).toBe(true);
  });
});
