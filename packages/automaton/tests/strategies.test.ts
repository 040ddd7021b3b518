import { describe, expect, it } from "vitest";
import {
  createStrategy,
  nextState,
  paddedLength,
  parseStrategyName,
  Rule,
  SpectralStrategy,
  StateGrid,
  STRATEGY_NAMES,
  type StepStrategy,
} from "../src";
import { filled, gridOf, thrownBy } from "./helpers";

function strategy(name: string): StepStrategy {
  return createStrategy(name).getOrThrow();
}

describe("nextState", () => {
  it("applies Life to two-state cells", () => {
    const life = Rule.standard();
    expect(nextState(1, 2, life)).toBe(1);
    expect(nextState(1, 3, life)).toBe(1);
    expect(nextState(1, 4, life)).toBe(0);
    expect(nextState(0, 3, life)).toBe(1);
    expect(nextState(0, 2, life)).toBe(0);
  });

  it("decays, survives only when alive, and births from any state", () => {
    const rule = Rule.standard(3);
    expect(nextState(3, 2, rule)).toBe(3);
    expect(nextState(3, 4, rule)).toBe(2);
    expect(nextState(2, 2, rule)).toBe(1);
    expect(nextState(2, 3, rule)).toBe(3);
    expect(nextState(0, 0, rule)).toBe(0);
  });
});

describe.each(STRATEGY_NAMES)("%s strategy", (name) => {
  it("reports its name", () => {
    expect(strategy(name).name).toBe(name);
  });

  it("keeps only the corners of a full 3x3 grid under Life", () => {
    const next = strategy(name).step(filled(3, 3, 1), Rule.standard());
    expect(next.toRows()).toEqual([
      [1, 0, 1],
      [0, 0, 0],
      [1, 0, 1],
    ]);
  });

  it("decays instead of dying when maxState is 2", () => {
    const next = strategy(name).step(filled(3, 3, 2), Rule.standard(2));
    expect(next.toRows()).toEqual([
      [2, 1, 2],
      [1, 1, 1],
      [2, 1, 2],
    ]);
  });

  it("keeps the edge cells of a full 3x3 grid under Von Neumann survival on 3", () => {
    const rule = Rule.of({ survival: [3], birth: [], neighborhood: "von-neumann" });
    const next = strategy(name).step(filled(3, 3, 1), rule);
    expect(next.toRows()).toEqual([
      [0, 1, 0],
      [1, 0, 1],
      [0, 1, 0],
    ]);
  });

  it("counts down from maxState to 0 and then stays dead", () => {
    const step = strategy(name);
    const rule = Rule.standard(3);
    let grid = gridOf([[3]]);
    const states: number[] = [];
    for (let i = 0; i < 5; i++) {
      grid = step.step(grid, rule);
      states.push(grid.getUnsafe(0, 0));
    }
    expect(states).toEqual([2, 1, 0, 0, 0]);
  });

  it("rebirths dead and decaying cells", () => {
    const step = strategy(name);
    const rule = Rule.of({ survival: [], birth: [1], maxState: 2 });
    const first = step.step(gridOf([[2, 0, 0]]), rule);
    expect(first.toRows()).toEqual([[1, 2, 0]]);
    const second = step.step(first, rule);
    expect(second.toRows()).toEqual([[2, 1, 2]]);
  });

  it("gives border cells no phantom neighbors", () => {
    const rule = Rule.of({ survival: [], birth: [1] });
    const next = strategy(name).step(
      gridOf([
        [1, 0, 0],
        [0, 0, 0],
        [0, 0, 0],
      ]),
      rule,
    );
    expect(next.toRows()).toEqual([
      [0, 1, 0],
      [1, 1, 0],
      [0, 0, 0],
    ]);
  });

  it("leaves a block unchanged", () => {
    const block = gridOf([
      [0, 0, 0, 0],
      [0, 1, 1, 0],
      [0, 1, 1, 0],
      [0, 0, 0, 0],
    ]);
    expect(strategy(name).step(block, Rule.standard()).equals(block)).toBe(true);
  });

  it("flips a blinker with period 2", () => {
    const horizontal = gridOf([
      [0, 0, 0, 0, 0],
      [0, 0, 0, 0, 0],
      [0, 1, 1, 1, 0],
      [0, 0, 0, 0, 0],
      [0, 0, 0, 0, 0],
    ]);
    const vertical = gridOf([
      [0, 0, 0, 0, 0],
      [0, 0, 1, 0, 0],
      [0, 0, 1, 0, 0],
      [0, 0, 1, 0, 0],
      [0, 0, 0, 0, 0],
    ]);
    const step = strategy(name);
    const once = step.step(horizontal, Rule.standard());
    expect(once.equals(vertical)).toBe(true);
    expect(step.step(once, Rule.standard()).equals(horizontal)).toBe(true);
  });

  it("does not modify its input", () => {
    const grid = filled(3, 3, 1);
    strategy(name).step(grid, Rule.standard());
    expect(grid.countCells(1)).toBe(9);
  });

  it("writes into a caller-supplied target", () => {
    const target = new StateGrid(3, 3, 1);
    strategy(name).computeInto(filled(3, 3, 1), target, Rule.standard());
    expect(target.toRows()).toEqual([
      [1, 0, 1],
      [0, 0, 0],
      [1, 0, 1],
    ]);
  });

  it("rejects a target of another size", () => {
    const error = thrownBy(() =>
      strategy(name).computeInto(new StateGrid(3, 3), new StateGrid(4, 3), Rule.standard()),
    );
    expect(error.code).toBe("GRID_SIZE_MISMATCH");
  });

  it("rejects writing into its own source", () => {
    const grid = new StateGrid(3, 3);
    const error = thrownBy(() => strategy(name).computeInto(grid, grid, Rule.standard()));
    expect(error.code).toBe("GRID_SIZE_MISMATCH");
  });
});

describe("spectral strategy", () => {
  it("pads each axis to a power of two with room for one zero line", () => {
    expect(paddedLength(1)).toBe(2);
    expect(paddedLength(5)).toBe(8);
    expect(paddedLength(7)).toBe(8);
    expect(paddedLength(8)).toBe(16);
  });

  it("re-plans when the grid size changes", () => {
    const spectral = new SpectralStrategy();
    const direct = strategy("direct");
    const rule = Rule.standard();
    const small = gridOf([
      [0, 1, 0],
      [0, 1, 0],
      [0, 1, 0],
    ]);
    const wide = gridOf([
      [1, 1, 0, 1, 1, 0, 1],
      [0, 1, 1, 0, 1, 1, 0],
    ]);
    expect(spectral.step(small, rule).equals(direct.step(small, rule))).toBe(true);
    expect(spectral.step(wide, rule).equals(direct.step(wide, rule))).toBe(true);
    expect(spectral.step(small, rule).equals(direct.step(small, rule))).toBe(true);
  });
});

describe("strategy registry", () => {
  it("resolves names and aliases", () => {
    expect(parseStrategyName("direct")).toBe("direct");
    expect(parseStrategyName("std")).toBe("direct");
    expect(parseStrategyName(" Conv ")).toBe("convolution");
    expect(parseStrategyName("spatial")).toBe("convolution");
    expect(parseStrategyName("FFT")).toBe("spectral");
    expect(parseStrategyName("warp")).toBeUndefined();
  });

  it("creates a fresh instance per call", () => {
    expect(strategy("fft")).not.toBe(strategy("fft"));
    expect(strategy("fft").name).toBe("spectral");
  });

  it("fails for unknown strategies", () => {
    const res = createStrategy("warp");
    expect(res.error.code).toBe("STRATEGY_NOT_FOUND");
  });

  it("treats object prototype keys as unknown", () => {
    for (const name of ["constructor", "__proto__", "toString", "valueOf"]) {
      expect(parseStrategyName(name)).toBeUndefined();
      const res = createStrategy(name);
      expect(res.isErr()).toBe(true);
      expect(res.error.code).toBe("STRATEGY_NOT_FOUND");
    }
  });
});
