/**
 * Grid Checksum Calculator
 *
 * Fingerprints a generation so runs can be compared across strategies and
 * replays without holding on to every grid.
 *
 * Format: "v{version}:{hash}"
 */

import type { ReadonlyStateGrid } from "../grid/types";
import { FNV32Hasher } from "./fnv32";

/**
 * Current checksum algorithm version.
 * Increment when changing what data is hashed or how.
 */
export const CHECKSUM_VERSION = 1;

/**
 * Checksum of a grid's dimensions and cell states.
 * Two grids with equal checksums are equal with overwhelming probability;
 * callers that need certainty follow up with `grid.equals()`.
 */
export function gridChecksum(grid: ReadonlyStateGrid): string {
  const hasher = new FNV32Hasher();

  hasher.updateInt32(CHECKSUM_VERSION);
  hasher.updateInt32(grid.width);
  hasher.updateInt32(grid.height);
  hasher.updateBytes(grid._unsafeGetInternalData());

  return `v${CHECKSUM_VERSION}:${hasher.digest()}`;
}
