/**
 * Direct strategy: count each cell's neighbors by visiting them.
 */

import type { Rule } from "../rules/rule";
import { BaseStrategy } from "./base";
import { nextState } from "./transition";

export class DirectStrategy extends BaseStrategy {
  readonly name = "direct";

  protected computeCells(
    source: Uint8Array,
    target: Uint8Array,
    width: number,
    height: number,
    rule: Rule,
  ): void {
    const { maxState } = rule;
    const moore = rule.neighborhood === "moore";

    for (let y = 0; y < height; y++) {
      const yOff = y * width;
      const hasUp = y > 0;
      const hasDown = y < height - 1;

      for (let x = 0; x < width; x++) {
        const hasLeft = x > 0;
        const hasRight = x < width - 1;
        let count = 0;

        // Axis neighbors (both neighborhoods)
        if (hasUp && source[yOff - width + x] === maxState) count++;
        if (hasDown && source[yOff + width + x] === maxState) count++;
        if (hasLeft && source[yOff + x - 1] === maxState) count++;
        if (hasRight && source[yOff + x + 1] === maxState) count++;

        if (moore) {
          if (hasUp && hasLeft && source[yOff - width + x - 1] === maxState) count++;
          if (hasUp && hasRight && source[yOff - width + x + 1] === maxState) count++;
          if (hasDown && hasLeft && source[yOff + width + x - 1] === maxState) count++;
          if (hasDown && hasRight && source[yOff + width + x + 1] === maxState) count++;
        }

        target[yOff + x] = nextState(source[yOff + x] ?? 0, count, rule);
      }
    }
  }
}
