import { AutomatonError, type StrategyName } from "@lifelike/contracts";
import { StateGrid } from "../core/grid/grid";
import type { MutableStateGrid, ReadonlyStateGrid } from "../core/grid/types";
import type { Rule } from "../rules/rule";
import type { StepStrategy } from "./types";

/**
 * Shared buffer checks and the allocating `step`.
 * Subclasses only implement `computeCells`.
 */
export abstract class BaseStrategy implements StepStrategy {
  abstract readonly name: StrategyName;

  protected abstract computeCells(
    source: Uint8Array,
    target: Uint8Array,
    width: number,
    height: number,
    rule: Rule,
  ): void;

  computeInto(
    source: ReadonlyStateGrid,
    target: MutableStateGrid,
    rule: Rule,
  ): void {
    if (source.width !== target.width || source.height !== target.height) {
      throw AutomatonError.gridInvalid(
        "GRID_SIZE_MISMATCH",
        `Target grid is ${target.width}x${target.height}, expected ${source.width}x${source.height}`,
        { source: source.getDimensions(), target: target.getDimensions() },
      );
    }
    const sourceData = source._unsafeGetInternalData();
    const targetData = target._unsafeGetInternalData();
    if (sourceData === targetData) {
      throw AutomatonError.gridInvalid(
        "GRID_SIZE_MISMATCH",
        "Source and target must be different buffers",
        { strategy: this.name },
      );
    }
    this.computeCells(sourceData, targetData, source.width, source.height, rule);
  }

  step(grid: ReadonlyStateGrid, rule: Rule): StateGrid {
    const next = new StateGrid(grid.width, grid.height);
    this.computeInto(grid, next, rule);
    return next;
  }
}
