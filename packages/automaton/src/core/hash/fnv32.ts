/**
 * FNV-1a 32-bit hash implementation
 *
 * Uses Math.imul so every update stays in 32-bit integer arithmetic, which
 * keeps hashing a full grid cheap enough to run once per generation.
 */

import { FNV32_OFFSET_BASIS, FNV32_PRIME } from "../constants";

/**
 * FNV-1a 32-bit hasher for incremental hashing
 */
export class FNV32Hasher {
  private hash: number;

  constructor() {
    this.hash = FNV32_OFFSET_BASIS;
  }

  /**
   * Add a single byte to the hash
   */
  updateByte(byte: number): this {
    this.hash = Math.imul(this.hash ^ (byte & 0xff), FNV32_PRIME) >>> 0;
    return this;
  }

  /**
   * Add a Uint8Array to the hash
   */
  updateBytes(data: Uint8Array): this {
    let hash = this.hash;
    for (let i = 0; i < data.length; i++) {
      hash = Math.imul(hash ^ (data[i] ?? 0), FNV32_PRIME) >>> 0;
    }
    this.hash = hash;
    return this;
  }

  /**
   * Add a 32-bit integer to the hash (little-endian)
   */
  updateInt32(value: number): this {
    const v = value >>> 0;
    this.updateByte(v & 0xff);
    this.updateByte((v >> 8) & 0xff);
    this.updateByte((v >> 16) & 0xff);
    this.updateByte((v >> 24) & 0xff);
    return this;
  }

  /**
   * Get the final hash as an 8-character hex string
   */
  digest(): string {
    return this.hash.toString(16).padStart(8, "0");
  }
}
