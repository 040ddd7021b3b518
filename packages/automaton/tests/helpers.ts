import { AutomatonError } from "@lifelike/contracts";
import { StateGrid } from "../src";

/**
 * Run `fn` and return the AutomatonError it throws.
 */
export function thrownBy(fn: () => unknown): AutomatonError {
  try {
    fn();
  } catch (error) {
    if (AutomatonError.isAutomatonError(error)) return error;
    throw error;
  }
  throw new Error("Expected an AutomatonError to be thrown");
}

export function gridOf(rows: number[][]): StateGrid {
  return StateGrid.fromRows(rows);
}

export function filled(width: number, height: number, value: number): StateGrid {
  return new StateGrid(width, height, value);
}
