/**
 * Rulestring parsing.
 *
 * Two notations are accepted:
 * - B/S: "B3/S23", optionally followed by "/C<states>" (or "/<states>")
 * - S/B: "23/3", optionally followed by "/<states>"
 *
 * A trailing "V" selects the Von Neumann neighborhood. The states suffix
 * counts every state including dead, so "/C3" means maxState = 2.
 */

import {
  AutomatonError,
  Err,
  MAX_CELL_STATE,
  type Result,
} from "@lifelike/contracts";
import { Rule } from "./rule";

const BS_NOTATION = /^B([0-8]*)\/S([0-8]*)(?:\/C?(\d+))?(V)?$/i;
const SB_NOTATION = /^([0-8]*)\/([0-8]*)(?:\/(\d+))?(V)?$/i;

function digits(part: string): number[] {
  return Array.from(part, (ch) => ch.charCodeAt(0) - 48);
}

function invalid(input: string, reason: string): Result<Rule, AutomatonError> {
  return Err(
    AutomatonError.ruleInvalid(
      "RULESTRING_INVALID",
      `Invalid rulestring "${input}": ${reason}`,
      { ruleString: input },
    ),
  );
}

/**
 * Parse a rulestring into a validated Rule.
 *
 * @example
 * ```typescript
 * parseRuleString("B3/S23");      // Conway's Life
 * parseRuleString("B2/S/C3");     // Brian's Brain
 * parseRuleString("B1/S012V");    // Von Neumann rule
 * ```
 */
export function parseRuleString(input: string): Result<Rule, AutomatonError> {
  const text = input.trim();

  let birth: string;
  let survival: string;
  let states: string | undefined;
  let vonNeumann: string | undefined;

  const bs = BS_NOTATION.exec(text);
  const sb = bs ? null : SB_NOTATION.exec(text);
  if (bs) {
    birth = bs[1] ?? "";
    survival = bs[2] ?? "";
    states = bs[3];
    vonNeumann = bs[4];
  } else if (sb) {
    survival = sb[1] ?? "";
    birth = sb[2] ?? "";
    states = sb[3];
    vonNeumann = sb[4];
  } else {
    return invalid(input, "expected B<digits>/S<digits> or <digits>/<digits>");
  }

  let maxState = 1;
  if (states !== undefined) {
    const count = Number.parseInt(states, 10);
    if (count < 2 || count > MAX_CELL_STATE + 1) {
      return invalid(
        input,
        `state count must be in [2, ${MAX_CELL_STATE + 1}], got ${count}`,
      );
    }
    maxState = count - 1;
  }

  return Rule.create({
    survival: digits(survival),
    birth: digits(birth),
    maxState,
    neighborhood: vonNeumann ? "von-neumann" : "moore",
  });
}

/**
 * Canonical B/S rulestring for a rule; `parseRuleString` reads it back.
 */
export function formatRuleString(rule: Rule): string {
  return rule.toString();
}
