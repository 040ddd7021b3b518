/**
 * Birth, survival and decay applied to a known neighbor count.
 * Shared by every strategy so they only differ in how they count.
 */

import type { Rule } from "../rules/rule";

/**
 * Next state of one cell.
 *
 * Birth applies whatever the current state is; survival only to alive
 * cells. Anything else decays one step, and 0 stays 0.
 */
export function nextState(current: number, count: number, rule: Rule): number {
  if (rule.isBorn(count) || (current === rule.maxState && rule.survives(count))) {
    return rule.maxState;
  }
  return current > 0 ? current - 1 : 0;
}

/**
 * Pointwise transition over whole buffers:
 * `target[i] = nextState(source[i], counts[i])`.
 */
export function applyTransition(
  source: Uint8Array,
  counts: ArrayLike<number>,
  target: Uint8Array,
  rule: Rule,
): void {
  const { birth, survival, maxState } = rule;
  for (let i = 0; i < source.length; i++) {
    const current = source[i] ?? 0;
    const count = counts[i] ?? 0;
    if (birth[count] === true || (current === maxState && survival[count] === true)) {
      target[i] = maxState;
    } else {
      target[i] = current > 0 ? current - 1 : 0;
    }
  }
}
