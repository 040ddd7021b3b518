/**
 * Random initial generations.
 */

import {
  AutomatonError,
  Err,
  MAX_CELL_STATE,
  type RandomSource,
  Result,
} from "@lifelike/contracts";
import { StateGrid } from "../core/grid/grid";

export interface RandomGridOptions {
  /** Chance that a cell starts alive, in [0, 1]. */
  readonly probability: number;
  /** State written into alive cells. */
  readonly maxState: number;
  readonly rng: RandomSource;
}

/**
 * Grid whose cells are independently alive (maxState) with the given
 * probability and dead otherwise. Cells are drawn in row-major order,
 * one RNG draw each.
 */
export function randomGrid(
  width: number,
  height: number,
  options: RandomGridOptions,
): Result<StateGrid, AutomatonError> {
  const { probability, maxState, rng } = options;
  if (!(probability >= 0 && probability <= 1)) {
    return Err(
      AutomatonError.configInvalid(
        `Alive probability must be in [0, 1], got ${probability}`,
        { probability },
      ),
    );
  }
  if (!Number.isInteger(maxState) || maxState < 1 || maxState > MAX_CELL_STATE) {
    return Err(
      AutomatonError.configInvalid(
        `Alive state must be an integer in [1, ${MAX_CELL_STATE}], got ${maxState}`,
        { maxState },
      ),
    );
  }

  return Result.fromThrowable(
    () => {
      const grid = new StateGrid(width, height);
      for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
          if (rng.next() < probability) grid.setUnsafe(x, y, maxState);
        }
      }
      return grid;
    },
    toAutomatonError,
  );
}

/**
 * Narrow a thrown value to an AutomatonError, wrapping anything else.
 */
export function toAutomatonError(error: unknown): AutomatonError {
  if (AutomatonError.isAutomatonError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return AutomatonError.configInvalid(message, { cause: error });
}
