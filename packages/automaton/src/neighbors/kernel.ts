/**
 * 3×3 adjacency kernels for convolution-based counting.
 */

import type { Neighborhood } from "../rules/neighborhood";

/**
 * Row-major 3×3 weights; index `(dy + 1) * 3 + (dx + 1)` holds the weight
 * of the neighbor at offset (dx, dy). The center is always 0.
 */
export type Kernel = readonly number[];

export const KERNEL_SIZE = 3;

export const MOORE_KERNEL: Kernel = Object.freeze([
  1, 1, 1,
  1, 0, 1,
  1, 1, 1,
]);

export const VON_NEUMANN_KERNEL: Kernel = Object.freeze([
  0, 1, 0,
  1, 0, 1,
  0, 1, 0,
]);

export function kernelFor(neighborhood: Neighborhood): Kernel {
  return neighborhood === "moore" ? MOORE_KERNEL : VON_NEUMANN_KERNEL;
}

/**
 * Non-zero kernel taps as (dx, dy) offsets.
 */
export function kernelOffsets(
  kernel: Kernel,
): ReadonlyArray<{ readonly dx: number; readonly dy: number }> {
  const offsets: { dx: number; dy: number }[] = [];
  for (let i = 0; i < kernel.length; i++) {
    if (kernel[i] !== 0) {
      offsets.push({ dx: (i % KERNEL_SIZE) - 1, dy: Math.floor(i / KERNEL_SIZE) - 1 });
    }
  }
  return offsets;
}
