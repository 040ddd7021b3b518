/**
 * Stepping strategy contract.
 */

import type { StrategyName } from "@lifelike/contracts";
import type { MutableStateGrid, ReadonlyStateGrid } from "../core/grid/types";
import type { StateGrid } from "../core/grid/grid";
import type { Rule } from "../rules/rule";

/**
 * One interchangeable algorithm for computing the next generation.
 *
 * Every implementation must produce the same grid as every other for the
 * same (grid, rule) input. Strategies may keep scratch buffers between
 * calls, so a single instance must not be driven by two callers at once.
 */
export interface StepStrategy {
  readonly name: StrategyName;

  /**
   * Write the generation after `source` into `target`.
   * `source` is never written; `target` must be a distinct grid of the same size.
   */
  computeInto(
    source: ReadonlyStateGrid,
    target: MutableStateGrid,
    rule: Rule,
  ): void;

  /**
   * Allocate and return the generation after `grid`.
   */
  step(grid: ReadonlyStateGrid, rule: Rule): StateGrid;
}
