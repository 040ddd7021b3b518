/**
 * Per-cell neighbor counting with open boundaries.
 *
 * Neighbors outside the grid are omitted, never wrapped around or treated
 * as virtual cells, so edge and corner cells simply see fewer candidates.
 */

import { DIRECTIONS_4, DIRECTIONS_8 } from "../core/geometry/types";
import type { ReadonlyStateGrid } from "../core/grid/types";
import { StateGrid } from "../core/grid/grid";
import type { Neighborhood } from "../rules/neighborhood";
import type { Rule } from "../rules/rule";

/**
 * Number of alive neighbors (state === aliveState) of cell (x, y).
 */
export function countAliveNeighbors(
  grid: ReadonlyStateGrid,
  x: number,
  y: number,
  aliveState: number,
  neighborhood: Neighborhood,
): number {
  const directions = neighborhood === "moore" ? DIRECTIONS_8 : DIRECTIONS_4;
  let count = 0;
  for (const dir of directions) {
    if (grid.get(x + dir.x, y + dir.y) === aliveState) count++;
  }
  return count;
}

/**
 * Neighbor count of every cell, as a grid of the same dimensions.
 */
export function neighborCounts(
  grid: ReadonlyStateGrid,
  aliveState: number,
  neighborhood: Neighborhood,
): StateGrid {
  const counts = new StateGrid(grid.width, grid.height);
  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      counts.setUnsafe(x, y, countAliveNeighbors(grid, x, y, aliveState, neighborhood));
    }
  }
  return counts;
}

/**
 * Alive neighbors of (x, y) under a rule's alive state and neighborhood.
 */
export function countLivingNeighbors(
  grid: ReadonlyStateGrid,
  x: number,
  y: number,
  rule: Rule,
): number {
  return countAliveNeighbors(grid, x, y, rule.maxState, rule.neighborhood);
}
