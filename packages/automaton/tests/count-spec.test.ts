import { describe, expect, it } from "vitest";
import { COUNT_MASK_LENGTH, maskToCounts, normalizeCountSpec } from "../src";

function counts(spec: Parameters<typeof normalizeCountSpec>[0]): number[] {
  return maskToCounts(normalizeCountSpec(spec, "survival").getOrThrow());
}

describe("normalizeCountSpec", () => {
  it("produces a frozen 9-entry mask", () => {
    const mask = normalizeCountSpec([2, 3], "survival").getOrThrow();
    expect(mask).toHaveLength(COUNT_MASK_LENGTH);
    expect(mask).toEqual([false, false, true, true, false, false, false, false, false]);
    expect(Object.isFrozen(mask)).toBe(true);
  });

  it("accepts a single count", () => {
    expect(counts(3)).toEqual([3]);
  });

  it("accepts half-open ranges", () => {
    expect(counts({ start: 2, end: 4 })).toEqual([2, 3]);
    expect(counts({ start: 0, end: 9 })).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8]);
    expect(counts({ start: 5, end: 5 })).toEqual([]);
  });

  it("accepts lists with duplicates and the empty list", () => {
    expect(counts([3, 2, 3])).toEqual([2, 3]);
    expect(counts([])).toEqual([]);
  });

  it("accepts raw masks", () => {
    expect(counts([true, false, false, false, false, false, false, false, true])).toEqual([
      0, 8,
    ]);
  });

  it("rejects counts outside 0..8", () => {
    const res = normalizeCountSpec([2, 9], "birth");
    expect(res.isErr()).toBe(true);
    expect(res.error.code).toBe("RULE_COUNT_OUT_OF_RANGE");
    expect(res.error.message).toBe("birth: count 9 is not in [0, 8]");
    expect(normalizeCountSpec(-1, "birth").error.code).toBe("RULE_COUNT_OUT_OF_RANGE");
    expect(normalizeCountSpec(1.5, "birth").error.code).toBe("RULE_COUNT_OUT_OF_RANGE");
  });

  it("rejects ranges that leave 0..8 or run backwards", () => {
    expect(normalizeCountSpec({ start: 5, end: 10 }, "birth").isErr()).toBe(true);
    expect(normalizeCountSpec({ start: 4, end: 2 }, "birth").isErr()).toBe(true);
  });

  it("rejects masks of the wrong length", () => {
    const res = normalizeCountSpec([true, false, true], "survival");
    expect(res.error.message).toBe("survival: raw masks need 9 entries, got 3");
  });
});
