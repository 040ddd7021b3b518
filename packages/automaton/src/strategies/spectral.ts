/**
 * Spectral convolution strategy.
 *
 * The alive mask is embedded in a power-of-two buffer with at least one
 * column and one row of zero padding, so the circular convolution of the
 * FFT never lets counts wrap across an edge. Counts come back as floats
 * and are rounded to the nearest integer before the transition reads them.
 */

import { FFT2D, nextPowerOfTwo } from "../core/fft/fft";
import type { Neighborhood } from "../rules/neighborhood";
import type { Rule } from "../rules/rule";
import { KERNEL_SIZE, kernelFor } from "../neighbors/kernel";
import { BaseStrategy } from "./base";
import { applyTransition } from "./transition";

interface SpectralPlan {
  readonly fft: FFT2D;
  readonly re: Float64Array;
  readonly im: Float64Array;
  /** Kernel spectra by neighborhood, computed on first use. */
  readonly kernels: Map<Neighborhood, { re: Float64Array; im: Float64Array }>;
}

/**
 * Padded transform size for one grid axis.
 */
export function paddedLength(length: number): number {
  return nextPowerOfTwo(length + 1);
}

export class SpectralStrategy extends BaseStrategy {
  readonly name = "spectral";
  private plan: SpectralPlan | null = null;
  private counts = new Uint8Array(0);

  private planFor(width: number, height: number): SpectralPlan {
    const columns = paddedLength(width);
    const rows = paddedLength(height);
    if (this.plan && this.plan.fft.columns === columns && this.plan.fft.rows === rows) {
      return this.plan;
    }
    const size = columns * rows;
    this.plan = {
      fft: new FFT2D(columns, rows),
      re: new Float64Array(size),
      im: new Float64Array(size),
      kernels: new Map(),
    };
    return this.plan;
  }

  private kernelSpectrum(
    plan: SpectralPlan,
    neighborhood: Neighborhood,
  ): { re: Float64Array; im: Float64Array } {
    const cached = plan.kernels.get(neighborhood);
    if (cached) return cached;

    const { columns, rows } = plan.fft;
    const re = new Float64Array(columns * rows);
    const im = new Float64Array(columns * rows);
    const kernel = kernelFor(neighborhood);

    // Tap (dx, dy) lands at ((dx mod columns), (dy mod rows)), centering the kernel on the origin
    for (let i = 0; i < kernel.length; i++) {
      const weight = kernel[i] ?? 0;
      if (weight === 0) continue;
      const dx = (i % KERNEL_SIZE) - 1;
      const dy = Math.floor(i / KERNEL_SIZE) - 1;
      const px = (dx + columns) % columns;
      const py = (dy + rows) % rows;
      re[py * columns + px] = weight;
    }

    plan.fft.transform(re, im);
    const spectrum = { re, im };
    plan.kernels.set(neighborhood, spectrum);
    return spectrum;
  }

  protected computeCells(
    source: Uint8Array,
    target: Uint8Array,
    width: number,
    height: number,
    rule: Rule,
  ): void {
    const plan = this.planFor(width, height);
    const kernel = this.kernelSpectrum(plan, rule.neighborhood);
    const { columns } = plan.fft;
    const { re, im } = plan;
    const { maxState } = rule;

    re.fill(0);
    im.fill(0);
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        if (source[y * width + x] === maxState) re[y * columns + x] = 1;
      }
    }

    plan.fft.transform(re, im);
    for (let i = 0; i < re.length; i++) {
      const ar = re[i] ?? 0;
      const ai = im[i] ?? 0;
      const br = kernel.re[i] ?? 0;
      const bi = kernel.im[i] ?? 0;
      re[i] = ar * br - ai * bi;
      im[i] = ar * bi + ai * br;
    }
    plan.fft.transform(re, im, true);

    const size = width * height;
    if (this.counts.length !== size) {
      this.counts = new Uint8Array(size);
    }
    const maxCount = rule.maxCount;
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const count = Math.round(re[y * columns + x] ?? 0);
        this.counts[y * width + x] = Math.min(maxCount, Math.max(0, count));
      }
    }

    applyTransition(source, this.counts, target, rule);
  }
}
