/**
 * Spatial convolution strategy.
 *
 * Builds a 0/1 alive mask, convolves it with the neighborhood kernel under
 * zero padding, then applies the transition to the whole count buffer.
 * Zero padding contributes nothing outside the grid, which is exactly the
 * omission of out-of-bounds neighbors.
 */

import {
  KERNEL_SIZE,
  type Kernel,
  kernelFor,
  kernelOffsets,
} from "../neighbors/kernel";
import type { Rule } from "../rules/rule";
import { BaseStrategy } from "./base";
import { applyTransition } from "./transition";

/**
 * Zero-padded 3×3 convolution of a row-major `width × height` buffer.
 * `out` must hold `width * height` entries.
 */
export function convolve2d(
  input: ArrayLike<number>,
  width: number,
  height: number,
  kernel: Kernel,
  out: Uint8Array,
): void {
  const taps = kernelOffsets(kernel);
  out.fill(0);

  for (const { dx, dy } of taps) {
    const weight = kernel[(dy + 1) * KERNEL_SIZE + (dx + 1)] ?? 0;
    // Rows/columns whose shifted neighbor is still inside the grid
    const yStart = Math.max(0, -dy);
    const yEnd = Math.min(height, height - dy);
    const xStart = Math.max(0, -dx);
    const xEnd = Math.min(width, width - dx);

    for (let y = yStart; y < yEnd; y++) {
      const row = y * width;
      const shifted = (y + dy) * width + dx;
      for (let x = xStart; x < xEnd; x++) {
        out[row + x] = (out[row + x] ?? 0) + weight * (input[shifted + x] ?? 0);
      }
    }
  }
}

export class ConvolutionStrategy extends BaseStrategy {
  readonly name = "convolution";
  private mask = new Uint8Array(0);
  private counts = new Uint8Array(0);

  protected computeCells(
    source: Uint8Array,
    target: Uint8Array,
    width: number,
    height: number,
    rule: Rule,
  ): void {
    const size = width * height;
    if (this.mask.length !== size) {
      this.mask = new Uint8Array(size);
      this.counts = new Uint8Array(size);
    }

    const { maxState } = rule;
    const mask = this.mask;
    for (let i = 0; i < size; i++) {
      mask[i] = source[i] === maxState ? 1 : 0;
    }

    convolve2d(mask, width, height, kernelFor(rule.neighborhood), this.counts);
    applyTransition(source, this.counts, target, rule);
  }
}
