/**
 * Grid types for the automaton.
 */

import type { Dimensions, Point } from "../geometry/types";

/**
 * Read-only view of a state grid.
 *
 * Strategies receive the previous generation through this type, so the
 * compiler rejects any attempt to write into the generation being read.
 *
 * Storage is row-major: cell `(x, y)` is element `y * width + x`, where
 * `x` is the column and `y` the row.
 */
export interface ReadonlyStateGrid {
  readonly width: number;
  readonly height: number;

  isInBounds(x: number, y: number): boolean;
  containsPoint(p: Point): boolean;

  /** State at (x, y), or undefined outside the grid. */
  get(x: number, y: number): number | undefined;
  getAt(p: Point): number | undefined;
  getUnsafe(x: number, y: number): number;

  getRawDataCopy(): Uint8Array;
  getDimensions(): Dimensions;
  forEach(callback: (x: number, y: number, value: number) => void): void;
  countCells(value: number): number;
  maxValue(): number;
  getRow(y: number): number[];
  getColumn(x: number): number[];
  toRows(): number[][];
  equals(other: ReadonlyStateGrid): boolean;

  /**
   * @internal Direct view of the backing buffer for strategies.
   * Callers must not write through it.
   */
  _unsafeGetInternalData(): Uint8Array;
}

/**
 * Mutable state grid. Only the owner of a buffer (a strategy writing the
 * next generation, or the simulation publishing it) should hold this type.
 */
export interface MutableStateGrid extends ReadonlyStateGrid {
  set(x: number, y: number, value: number): void;
  setAt(p: Point, value: number): void;
  setUnsafe(x: number, y: number, value: number): void;
  fill(value: number): void;
  copyFrom(other: ReadonlyStateGrid): void;
}
