/**
 * Rule model: survival set, birth set, decay depth and neighborhood.
 */

import {
  AutomatonError,
  Err,
  MAX_CELL_STATE,
  MAX_VON_NEUMANN_COUNT,
  Ok,
  type Result,
} from "@lifelike/contracts";
import {
  type CountMask,
  type CountSpec,
  maskToCounts,
  normalizeCountSpec,
} from "./count-spec";
import { maxNeighborCount, type Neighborhood } from "./neighborhood";

/**
 * Input accepted by `Rule.create`.
 */
export interface RuleInit {
  readonly survival: CountSpec;
  readonly birth: CountSpec;
  /** Alive state and decay depth (default 1: the classical two-state automaton). */
  readonly maxState?: number;
  /** Default "moore". */
  readonly neighborhood?: Neighborhood;
}

/**
 * Conway's Game of Life: survive on 2 or 3, born on 3.
 */
export const DEFAULT_RULE_INIT = {
  survival: [2, 3],
  birth: [3],
  maxState: 1,
  neighborhood: "moore",
} as const satisfies RuleInit;

/**
 * Immutable automaton rule.
 *
 * A cell in state `maxState` is alive, states `1..maxState-1` are decaying,
 * and 0 is dead. Instances are frozen, so one rule can be shared by any
 * number of strategies and simulations.
 *
 * @example
 * ```typescript
 * const brian = Rule.of({ survival: [], birth: 2, maxState: 2 });
 * const life = Rule.standard();
 * ```
 */
export class Rule {
  /** `survival[n]`: an alive cell with n alive neighbors stays alive. */
  readonly survival: CountMask;
  /** `birth[n]`: a cell with n alive neighbors becomes alive. */
  readonly birth: CountMask;
  readonly maxState: number;
  readonly neighborhood: Neighborhood;

  private constructor(
    survival: CountMask,
    birth: CountMask,
    maxState: number,
    neighborhood: Neighborhood,
  ) {
    this.survival = survival;
    this.birth = birth;
    this.maxState = maxState;
    this.neighborhood = neighborhood;
    Object.freeze(this);
  }

  /**
   * Validate and normalize a rule.
   *
   * Fails with `RULE_STATE_INVALID` when maxState is not an integer in
   * [1, 255], `RULE_COUNT_OUT_OF_RANGE` when a count leaves [0, 8], and
   * `RULE_NEIGHBORHOOD_MISMATCH` when a Von Neumann rule uses counts above 4.
   */
  static create(init: RuleInit): Result<Rule, AutomatonError> {
    const maxState = init.maxState ?? DEFAULT_RULE_INIT.maxState;
    const neighborhood = init.neighborhood ?? DEFAULT_RULE_INIT.neighborhood;

    if (!Number.isInteger(maxState) || maxState < 1 || maxState > MAX_CELL_STATE) {
      return Err(
        AutomatonError.ruleInvalid(
          "RULE_STATE_INVALID",
          `maxState must be an integer in [1, ${MAX_CELL_STATE}], got ${maxState}`,
          { maxState },
        ),
      );
    }

    const survival = normalizeCountSpec(init.survival, "survival");
    if (survival.isErr()) return Err(survival.error);
    const birth = normalizeCountSpec(init.birth, "birth");
    if (birth.isErr()) return Err(birth.error);

    if (neighborhood === "von-neumann") {
      const excess = [...maskToCounts(survival.value), ...maskToCounts(birth.value)]
        .filter((count) => count > MAX_VON_NEUMANN_COUNT);
      if (excess.length > 0) {
        return Err(
          AutomatonError.ruleInvalid(
            "RULE_NEIGHBORHOOD_MISMATCH",
            `Von Neumann neighborhoods have at most ${MAX_VON_NEUMANN_COUNT} neighbors; counts ${excess.join(", ")} can never occur`,
            { neighborhood, counts: excess },
          ),
        );
      }
    }

    return Ok(new Rule(survival.value, birth.value, maxState, neighborhood));
  }

  /**
   * Like `create`, but throws the AutomatonError instead of returning it.
   */
  static of(init: RuleInit): Rule {
    return Rule.create(init).getOrThrow();
  }

  /**
   * Conway's Life (B3/S23) with an optional decay depth and neighborhood.
   */
  static standard(maxState = 1, neighborhood: Neighborhood = "moore"): Rule {
    return Rule.of({ ...DEFAULT_RULE_INIT, maxState, neighborhood });
  }

  /**
   * Highest neighbor count this rule's neighborhood can report.
   */
  get maxCount(): number {
    return maxNeighborCount(this.neighborhood);
  }

  survives(count: number): boolean {
    return this.survival[count] === true;
  }

  isBorn(count: number): boolean {
    return this.birth[count] === true;
  }

  survivalCounts(): number[] {
    return maskToCounts(this.survival);
  }

  birthCounts(): number[] {
    return maskToCounts(this.birth);
  }

  equals(other: Rule): boolean {
    return (
      this.maxState === other.maxState &&
      this.neighborhood === other.neighborhood &&
      this.survival.every((active, i) => other.survival[i] === active) &&
      this.birth.every((active, i) => other.birth[i] === active)
    );
  }

  /**
   * Rulestring form, e.g. "B3/S23", "B2/S/C3" or "B2/S013V".
   */
  toString(): string {
    const states = this.maxState > 1 ? `/C${this.maxState + 1}` : "";
    const neighborhood = this.neighborhood === "von-neumann" ? "V" : "";
    return `B${this.birthCounts().join("")}/S${this.survivalCounts().join("")}${states}${neighborhood}`;
  }
}
