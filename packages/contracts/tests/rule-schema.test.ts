import { describe, expect, it } from "vitest";
import { CountSpecSchema, RuleConfigSchema } from "../src";

describe("CountSpecSchema", () => {
  it("accepts every count spelling", () => {
    expect(CountSpecSchema.safeParse(3).success).toBe(true);
    expect(CountSpecSchema.safeParse([2, 3]).success).toBe(true);
    expect(CountSpecSchema.safeParse([]).success).toBe(true);
    expect(CountSpecSchema.safeParse({ start: 2, end: 4 }).success).toBe(true);
    expect(
      CountSpecSchema.safeParse([false, false, true, true, false, false, false, false, false])
        .success,
    ).toBe(true);
  });

  it("rejects counts outside 0..8", () => {
    expect(CountSpecSchema.safeParse(9).success).toBe(false);
    expect(CountSpecSchema.safeParse(-1).success).toBe(false);
    expect(CountSpecSchema.safeParse([2, 9]).success).toBe(false);
    expect(CountSpecSchema.safeParse(2.5).success).toBe(false);
  });

  it("rejects inverted ranges and short masks", () => {
    expect(CountSpecSchema.safeParse({ start: 4, end: 2 }).success).toBe(false);
    expect(CountSpecSchema.safeParse([true, false]).success).toBe(false);
  });
});

describe("RuleConfigSchema", () => {
  it("accepts a minimal rule", () => {
    const res = RuleConfigSchema.safeParse({ survival: [2, 3], birth: 3 });
    expect(res.success).toBe(true);
  });

  it("accepts a full rule", () => {
    const res = RuleConfigSchema.safeParse({
      survival: { start: 1, end: 5 },
      birth: [3],
      maxState: 4,
      neighborhood: "moore",
    });
    expect(res.success).toBe(true);
  });

  it("rejects maxState outside [1, 255]", () => {
    expect(
      RuleConfigSchema.safeParse({ survival: [], birth: [], maxState: 0 }).success,
    ).toBe(false);
    expect(
      RuleConfigSchema.safeParse({ survival: [], birth: [], maxState: 256 }).success,
    ).toBe(false);
  });

  it("rejects Von Neumann counts above 4", () => {
    const res = RuleConfigSchema.safeParse({
      survival: [1, 2],
      birth: [5],
      neighborhood: "von-neumann",
    });
    expect(res.success).toBe(false);
    if (!res.success) {
      expect(res.error.issues[0]?.path).toEqual(["birth"]);
    }
  });

  it("allows counts above 4 for Moore", () => {
    const res = RuleConfigSchema.safeParse({ survival: [8], birth: [5], neighborhood: "moore" });
    expect(res.success).toBe(true);
  });

  it("rejects unknown neighborhoods", () => {
    const res = RuleConfigSchema.safeParse({ survival: [], birth: [], neighborhood: "hex" });
    expect(res.success).toBe(false);
  });
});
