/**
 * Flat, byte-per-cell state grid.
 * Uses a single Uint8Array in row-major order for cache locality.
 */

import { AutomatonError, MAX_CELL_STATE } from "@lifelike/contracts";
import type { Dimensions, Point } from "../geometry/types";
import type { MutableStateGrid, ReadonlyStateGrid } from "./types";

const DEV_MODE = process.env.NODE_ENV !== "production";

function isCellState(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_CELL_STATE;
}

function assertCellState(value: number, at: string): void {
  if (!isCellState(value)) {
    throw AutomatonError.gridInvalid(
      "GRID_STATE_INVALID",
      `Invalid cell state ${value} ${at}`,
      { value },
    );
  }
}

function assertDimensions(width: number, height: number): void {
  if (
    !Number.isInteger(width) ||
    !Number.isInteger(height) ||
    width < 1 ||
    height < 1
  ) {
    throw AutomatonError.gridInvalid(
      "GRID_DIMENSION_INVALID",
      `Invalid grid dimensions: ${width}x${height}`,
      { width, height },
    );
  }
}

/**
 * 2D grid of cell states (0 = dead, maxState = alive, in between = decaying).
 *
 * Cell `(x, y)` is stored at index `y * width + x`: `x` selects the column,
 * `y` the row. Dimensions never change after construction.
 */
export class StateGrid implements MutableStateGrid {
  readonly width: number;
  readonly height: number;
  private readonly data: Uint8Array;

  constructor(width: number, height: number, initialValue = 0) {
    assertDimensions(width, height);
    assertCellState(initialValue, "as initial value");

    this.width = width;
    this.height = height;
    this.data = new Uint8Array(width * height);

    if (initialValue !== 0) {
      this.data.fill(initialValue);
    }
  }

  /**
   * Build a grid from a flat row-major sequence of states.
   * The sequence must hold exactly `width * height` values.
   */
  static fromCells(
    width: number,
    height: number,
    cells: ArrayLike<number>,
  ): StateGrid {
    assertDimensions(width, height);
    if (cells.length !== width * height) {
      throw AutomatonError.gridInvalid(
        "GRID_SIZE_MISMATCH",
        `Cannot shape ${cells.length} cells into a ${width}x${height} grid`,
        { width, height, cells: cells.length },
      );
    }

    const grid = new StateGrid(width, height);
    for (let i = 0; i < cells.length; i++) {
      const value = cells[i] ?? 0;
      if (!isCellState(value)) {
        throw AutomatonError.gridInvalid(
          "GRID_STATE_INVALID",
          `Invalid cell state ${value} at index ${i}`,
          { index: i, value },
        );
      }
      grid.data[i] = value;
    }
    return grid;
  }

  /**
   * Build a grid from rows, where `rows[y][x]` is the state of cell (x, y).
   */
  static fromRows(rows: ReadonlyArray<ReadonlyArray<number>>): StateGrid {
    const height = rows.length;
    const width = rows[0]?.length ?? 0;

    const cells: number[] = [];
    for (let y = 0; y < height; y++) {
      const row = rows[y] ?? [];
      if (row.length !== width) {
        throw AutomatonError.gridInvalid(
          "GRID_SIZE_MISMATCH",
          `Row ${y} has ${row.length} cells, expected ${width}`,
          { row: y, length: row.length, width },
        );
      }
      cells.push(...row);
    }

    return StateGrid.fromCells(width, height, cells);
  }

  // ===========================================================================
  // BOUNDS CHECKING
  // ===========================================================================

  isInBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  containsPoint(p: Point): boolean {
    return this.isInBounds(p.x, p.y);
  }

  // ===========================================================================
  // CELL ACCESS
  // ===========================================================================

  /**
   * Get cell state with bounds checking (undefined outside the grid)
   */
  get(x: number, y: number): number | undefined {
    if (!Number.isInteger(x) || !Number.isInteger(y)) return undefined;
    if (!this.isInBounds(x, y)) return undefined;
    return this.data[y * this.width + x];
  }

  getAt(p: Point): number | undefined {
    return this.get(p.x, p.y);
  }

  /**
   * Set cell state with bounds checking
   * @throws AutomatonError `GRID_STATE_INVALID` for a state outside [0, 255]
   */
  set(x: number, y: number, value: number): void {
    assertCellState(value, `at (${x}, ${y})`);
    if (!this.isInBounds(x, y)) {
      if (DEV_MODE) {
        console.warn(
          `StateGrid.set: out of bounds (${x}, ${y}) for grid ${this.width}x${this.height}`,
        );
      }
      return;
    }
    this.data[y * this.width + x] = value;
  }

  setAt(p: Point, value: number): void {
    this.set(p.x, p.y, value);
  }

  /**
   * Unsafe get (no bounds check) - use only when bounds are guaranteed
   */
  getUnsafe(x: number, y: number): number {
    return this.data[y * this.width + x] ?? 0;
  }

  /**
   * Unsafe set (no bounds check) - use only when bounds are guaranteed
   */
  setUnsafe(x: number, y: number, value: number): void {
    assertCellState(value, `at (${x}, ${y})`);
    this.data[y * this.width + x] = value;
  }

  // ===========================================================================
  // BULK OPERATIONS
  // ===========================================================================

  fill(value: number): void {
    assertCellState(value, "as fill value");
    this.data.fill(value);
  }

  /**
   * Overwrite every cell with the contents of a same-sized grid.
   */
  copyFrom(other: ReadonlyStateGrid): void {
    if (other.width !== this.width || other.height !== this.height) {
      throw AutomatonError.gridInvalid(
        "GRID_SIZE_MISMATCH",
        `Cannot copy a ${other.width}x${other.height} grid into ${this.width}x${this.height}`,
        { source: other.getDimensions(), target: this.getDimensions() },
      );
    }
    this.data.set(other._unsafeGetInternalData());
  }

  clone(): StateGrid {
    const result = new StateGrid(this.width, this.height);
    result.data.set(this.data);
    return result;
  }

  /**
   * Get a copy of the raw data array (safe for external use).
   */
  getRawDataCopy(): Uint8Array {
    return new Uint8Array(this.data);
  }

  /**
   * @internal For strategies and the simulation's double buffer only.
   * External code MUST use getRawDataCopy() to prevent mutation bugs.
   */
  _unsafeGetInternalData(): Uint8Array {
    return this.data;
  }

  getDimensions(): Dimensions {
    return { width: this.width, height: this.height };
  }

  /**
   * Iterate over all cells in row-major order
   */
  forEach(callback: (x: number, y: number, value: number) => void): void {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        callback(x, y, this.getUnsafe(x, y));
      }
    }
  }

  countCells(value: number): number {
    let count = 0;
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] === value) count++;
    }
    return count;
  }

  /**
   * Highest state present in the grid.
   */
  maxValue(): number {
    let max = 0;
    for (let i = 0; i < this.data.length; i++) {
      const value = this.data[i] ?? 0;
      if (value > max) max = value;
    }
    return max;
  }

  equals(other: ReadonlyStateGrid): boolean {
    if (this.width !== other.width || this.height !== other.height) {
      return false;
    }
    const otherData = other._unsafeGetInternalData();
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] !== otherData[i]) {
        return false;
      }
    }
    return true;
  }

  /**
   * @returns Cell states in row y, or empty if out of bounds
   */
  getRow(y: number): number[] {
    if (y < 0 || y >= this.height) return [];
    return Array.from(this.data.subarray(y * this.width, (y + 1) * this.width));
  }

  /**
   * @returns Cell states in column x, or empty if out of bounds
   */
  getColumn(x: number): number[] {
    if (x < 0 || x >= this.width) return [];
    const col: number[] = [];
    for (let y = 0; y < this.height; y++) {
      col.push(this.data[y * this.width + x] ?? 0);
    }
    return col;
  }

  /**
   * All rows, `rows[y][x]`; the inverse of `fromRows`.
   */
  toRows(): number[][] {
    const rows: number[][] = [];
    for (let y = 0; y < this.height; y++) {
      rows.push(this.getRow(y));
    }
    return rows;
  }
}
