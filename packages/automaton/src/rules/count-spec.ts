/**
 * Survival/birth set normalization.
 *
 * Every accepted spelling of a count set collapses to the same canonical
 * 9-entry mask, where `mask[n]` tells whether `n` neighbors trigger the rule.
 */

import {
  AutomatonError,
  Err,
  MAX_NEIGHBOR_COUNT,
  Ok,
  type Result,
} from "@lifelike/contracts";

/** Length of a canonical mask: one entry per count 0..8. */
export const COUNT_MASK_LENGTH = MAX_NEIGHBOR_COUNT + 1;

/**
 * Half-open range of neighbor counts: `start <= n < end`.
 */
export interface CountRange {
  readonly start: number;
  readonly end: number;
}

/**
 * Canonical representation: index = neighbor count.
 */
export type CountMask = readonly boolean[];

/**
 * Accepted forms: a single count, a range, a list of counts, or a raw mask.
 */
export type CountSpec = number | CountRange | readonly number[] | CountMask;

function isCountList(spec: CountSpec): spec is readonly number[] | CountMask {
  return Array.isArray(spec);
}

function isMask(spec: readonly number[] | CountMask): spec is CountMask {
  return spec.length > 0 && spec.every((entry) => typeof entry === "boolean");
}

function isCount(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_NEIGHBOR_COUNT;
}

function outOfRange(
  field: string,
  message: string,
  details: Record<string, unknown>,
): Result<CountMask, AutomatonError> {
  return Err(
    AutomatonError.ruleInvalid("RULE_COUNT_OUT_OF_RANGE", `${field}: ${message}`, {
      field,
      ...details,
    }),
  );
}

/**
 * Normalize a count spec into a frozen canonical mask.
 * @param field - Name used in error messages ("survival" or "birth")
 */
export function normalizeCountSpec(
  spec: CountSpec,
  field: string,
): Result<CountMask, AutomatonError> {
  const mask: boolean[] = new Array<boolean>(COUNT_MASK_LENGTH).fill(false);

  if (typeof spec === "number") {
    if (!isCount(spec)) {
      return outOfRange(field, `count ${spec} is not in [0, ${MAX_NEIGHBOR_COUNT}]`, {
        count: spec,
      });
    }
    mask[spec] = true;
  } else if (isCountList(spec)) {
    if (isMask(spec)) {
      if (spec.length !== COUNT_MASK_LENGTH) {
        return outOfRange(
          field,
          `raw masks need ${COUNT_MASK_LENGTH} entries, got ${spec.length}`,
          { length: spec.length },
        );
      }
      spec.forEach((active, count) => {
        mask[count] = active;
      });
    } else {
      for (const count of spec) {
        if (typeof count !== "number" || !isCount(count)) {
          return outOfRange(
            field,
            `count ${String(count)} is not in [0, ${MAX_NEIGHBOR_COUNT}]`,
            { count },
          );
        }
        mask[count] = true;
      }
    }
  } else {
    const { start, end } = spec;
    if (
      !Number.isInteger(start) ||
      !Number.isInteger(end) ||
      start < 0 ||
      end > COUNT_MASK_LENGTH ||
      start > end
    ) {
      return outOfRange(field, `range [${start}, ${end}) is not within [0, ${COUNT_MASK_LENGTH})`, {
        start,
        end,
      });
    }
    for (let count = start; count < end; count++) {
      mask[count] = true;
    }
  }

  return Ok(Object.freeze(mask));
}

/**
 * Counts selected by a canonical mask, ascending.
 */
export function maskToCounts(mask: CountMask): number[] {
  const counts: number[] = [];
  mask.forEach((active, count) => {
    if (active) counts.push(count);
  });
  return counts;
}
