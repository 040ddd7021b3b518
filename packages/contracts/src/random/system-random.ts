import { randomBytes } from "node:crypto";

/**
 * Return an unsigned 32-bit random integer, used as a seed when a
 * simulation config does not pin one.
 */
export function randomSeed(): number {
  return randomBytes(4).readUInt32LE(0);
}
