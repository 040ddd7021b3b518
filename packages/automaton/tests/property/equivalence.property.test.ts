/**
 * Property-Based Equivalence Tests
 *
 * Every strategy must produce the same generation, bit for bit, from the
 * same grid and rule, and that generation must match a cell-by-cell
 * evaluation of the rule.
 */

import { SeededRandom } from "@lifelike/contracts";
import { describe, expect, it } from "vitest";
import {
  createStrategy,
  neighborCounts,
  nextState,
  parseRuleString,
  randomGrid,
  type Rule,
  Simulation,
  StateGrid,
  STRATEGY_NAMES,
} from "../../src";

const SIZES: ReadonlyArray<readonly [number, number]> = [
  [1, 1],
  [1, 7],
  [7, 1],
  [2, 2],
  [5, 3],
  [16, 16],
  [17, 9],
  [33, 20],
  [64, 48],
];

const DENSITIES = [0.1, 0.3, 0.5, 0.8];

const RULES = [
  "B3/S23",
  "B36/S23",
  "B2/S",
  "B2/S/C3",
  "B3/S23/C5",
  "B1/S012V",
  "B2/S13/C4V",
  "B012345678/S012345678",
];

const GENERATIONS = 4;

function rule(text: string): Rule {
  return parseRuleString(text).getOrThrow();
}

/**
 * Next generation computed one cell at a time from explicit counts.
 */
function referenceStep(grid: StateGrid, r: Rule): StateGrid {
  const counts = neighborCounts(grid, r.maxState, r.neighborhood);
  const next = new StateGrid(grid.width, grid.height);
  grid.forEach((x, y, value) => {
    next.setUnsafe(x, y, nextState(value, counts.getUnsafe(x, y), r));
  });
  return next;
}

describe("property: strategies are interchangeable", () => {
  it("agree with each other on every generation", () => {
    const mismatches: string[] = [];
    let seed = 1;

    for (const ruleText of RULES) {
      const r = rule(ruleText);
      for (const [width, height] of SIZES) {
        for (const probability of DENSITIES) {
          const initial = randomGrid(width, height, {
            probability,
            maxState: r.maxState,
            rng: new SeededRandom(seed++),
          }).getOrThrow();

          const sims = STRATEGY_NAMES.map(
            (name) => new Simulation(initial, r, createStrategy(name).getOrThrow()),
          );

          for (let gen = 1; gen <= GENERATIONS; gen++) {
            for (const sim of sims) sim.step();
            const [first, ...rest] = sims.map((sim) => sim.snapshot());
            for (const other of rest) {
              if (first && !first.equals(other)) {
                mismatches.push(`${ruleText} ${width}x${height} p=${probability} gen ${gen}`);
              }
            }
          }
        }
      }
    }

    expect(mismatches).toEqual([]);
  });

  it("match a cell-by-cell evaluation of the rule", () => {
    const mismatches: string[] = [];
    let seed = 1000;

    for (const ruleText of RULES) {
      const r = rule(ruleText);
      for (const name of STRATEGY_NAMES) {
        const strategy = createStrategy(name).getOrThrow();
        for (const [width, height] of SIZES) {
          let grid = randomGrid(width, height, {
            probability: 0.4,
            maxState: r.maxState,
            rng: new SeededRandom(seed++),
          }).getOrThrow();

          for (let gen = 1; gen <= GENERATIONS; gen++) {
            const expected = referenceStep(grid, r);
            const actual = strategy.step(grid, r);
            if (!actual.equals(expected)) {
              mismatches.push(`${name} ${ruleText} ${width}x${height} gen ${gen}`);
            }
            grid = expected;
          }
        }
      }
    }

    expect(mismatches).toEqual([]);
  });

  it("keep every cell within [0, maxState]", () => {
    const r = rule("B3/S23/C5");
    const sim = new Simulation(
      randomGrid(32, 32, { probability: 0.5, maxState: 4, rng: new SeededRandom(3) }).getOrThrow(),
      r,
      createStrategy("spectral").getOrThrow(),
    );
    for (let gen = 0; gen < 10; gen++) {
      sim.step();
      expect(sim.snapshot().maxValue()).toBeLessThanOrEqual(4);
    }
  });
});

describe("property: open boundaries", () => {
  it("give a corner cell fewer candidate neighbors than an interior cell", () => {
    const full = new StateGrid(5, 5, 1);
    for (const neighborhood of ["moore", "von-neumann"] as const) {
      const counts = neighborCounts(full, 1, neighborhood);
      expect(counts.getUnsafe(0, 0)).toBeLessThan(counts.getUnsafe(2, 2));
    }
  });

  it("do not wrap patterns across opposite edges", () => {
    // Vertical blinker touching the left edge: a wrapping grid would feed the right column
    const grid = StateGrid.fromRows([
      [0, 0, 0, 0, 0],
      [1, 0, 0, 0, 0],
      [1, 0, 0, 0, 0],
      [1, 0, 0, 0, 0],
      [0, 0, 0, 0, 0],
    ]);
    for (const name of STRATEGY_NAMES) {
      const next = createStrategy(name).getOrThrow().step(grid, rule("B3/S23"));
      expect(next.getColumn(4)).toEqual([0, 0, 0, 0, 0]);
      expect(next.getRow(2)).toEqual([1, 1, 0, 0, 0]);
    }
  });
});
