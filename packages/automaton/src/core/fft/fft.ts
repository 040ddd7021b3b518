/**
 * Radix-2 complex FFT over split real/imaginary Float64Arrays.
 *
 * Plans precompute twiddle factors and the bit-reversal permutation for one
 * power-of-two length, so repeated transforms of the same size only pay
 * for the butterflies.
 */

export function isPowerOfTwo(n: number): boolean {
  return Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0;
}

/**
 * Smallest power of two >= n (1 for n <= 1).
 */
export function nextPowerOfTwo(n: number): number {
  let size = 1;
  while (size < n) size <<= 1;
  return size;
}

/**
 * Transform plan for a fixed power-of-two length.
 */
export class FFT {
  readonly size: number;
  private readonly cosTable: Float64Array;
  private readonly sinTable: Float64Array;
  private readonly reversed: Uint32Array;

  constructor(size: number) {
    if (!isPowerOfTwo(size)) {
      throw new RangeError(`FFT size must be a power of two, got ${size}`);
    }

    this.size = size;
    const half = size >>> 1;
    this.cosTable = new Float64Array(half);
    this.sinTable = new Float64Array(half);
    for (let k = 0; k < half; k++) {
      const angle = (2 * Math.PI * k) / size;
      this.cosTable[k] = Math.cos(angle);
      this.sinTable[k] = Math.sin(angle);
    }

    this.reversed = new Uint32Array(size);
    const bits = Math.log2(size);
    for (let i = 0; i < size; i++) {
      let r = 0;
      for (let b = 0; b < bits; b++) {
        r = (r << 1) | ((i >>> b) & 1);
      }
      this.reversed[i] = r;
    }
  }

  /**
   * In-place transform of `size` complex values.
   * The inverse transform includes the 1/size normalization.
   */
  transform(re: Float64Array, im: Float64Array, inverse = false): void {
    const n = this.size;

    for (let i = 0; i < n; i++) {
      const j = this.reversed[i] ?? i;
      if (j > i) {
        const tr = re[i] ?? 0;
        const ti = im[i] ?? 0;
        re[i] = re[j] ?? 0;
        im[i] = im[j] ?? 0;
        re[j] = tr;
        im[j] = ti;
      }
    }

    // Forward uses e^(-2πik/n), inverse e^(+2πik/n)
    const sign = inverse ? 1 : -1;

    for (let len = 2; len <= n; len <<= 1) {
      const half = len >>> 1;
      const step = n / len;
      for (let start = 0; start < n; start += len) {
        for (let j = 0; j < half; j++) {
          const wr = this.cosTable[j * step] ?? 1;
          const wi = sign * (this.sinTable[j * step] ?? 0);
          const a = start + j;
          const b = a + half;
          const br = re[b] ?? 0;
          const bi = im[b] ?? 0;
          const tr = br * wr - bi * wi;
          const ti = br * wi + bi * wr;
          const ar = re[a] ?? 0;
          const ai = im[a] ?? 0;
          re[b] = ar - tr;
          im[b] = ai - ti;
          re[a] = ar + tr;
          im[a] = ai + ti;
        }
      }
    }

    if (inverse) {
      for (let i = 0; i < n; i++) {
        re[i] = (re[i] ?? 0) / n;
        im[i] = (im[i] ?? 0) / n;
      }
    }
  }
}

/**
 * Plans and scratch space for 2-D transforms of one padded shape.
 */
export class FFT2D {
  readonly columns: number;
  readonly rows: number;
  private readonly rowPlan: FFT;
  private readonly columnPlan: FFT;
  private readonly scratchRe: Float64Array;
  private readonly scratchIm: Float64Array;

  constructor(columns: number, rows: number) {
    this.columns = columns;
    this.rows = rows;
    this.rowPlan = new FFT(columns);
    this.columnPlan = rows === columns ? this.rowPlan : new FFT(rows);
    this.scratchRe = new Float64Array(rows);
    this.scratchIm = new Float64Array(rows);
  }

  /**
   * In-place transform of a row-major `rows × columns` complex buffer.
   */
  transform(re: Float64Array, im: Float64Array, inverse = false): void {
    const { columns, rows } = this;

    for (let y = 0; y < rows; y++) {
      const offset = y * columns;
      this.rowPlan.transform(
        re.subarray(offset, offset + columns),
        im.subarray(offset, offset + columns),
        inverse,
      );
    }

    const colRe = this.scratchRe;
    const colIm = this.scratchIm;
    for (let x = 0; x < columns; x++) {
      for (let y = 0; y < rows; y++) {
        colRe[y] = re[y * columns + x] ?? 0;
        colIm[y] = im[y * columns + x] ?? 0;
      }
      this.columnPlan.transform(colRe, colIm, inverse);
      for (let y = 0; y < rows; y++) {
        re[y * columns + x] = colRe[y] ?? 0;
        im[y * columns + x] = colIm[y] ?? 0;
      }
    }
  }
}
