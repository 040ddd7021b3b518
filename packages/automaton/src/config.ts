/**
 * Simulation configuration defaults and resolution.
 *
 * Input is validated by `SimulationConfigSchema` before it gets here; this
 * module only fills in what the caller left out.
 */

import {
  randomSeed,
  type SimulationConfig,
  type StrategyName,
} from "@lifelike/contracts";
import { DEFAULT_RULE_INIT, type RuleInit } from "./rules/rule";

export type RuleSource =
  | { readonly kind: "rule"; readonly rule: RuleInit }
  | { readonly kind: "ruleString"; readonly ruleString: string };

export type InitialCells =
  | { readonly kind: "cells"; readonly cells: readonly number[] }
  | { readonly kind: "rows"; readonly rows: ReadonlyArray<readonly number[]> }
  | { readonly kind: "random"; readonly probability: number; readonly seed: number };

/**
 * Fully-resolved configuration: every choice made, nothing optional.
 */
export interface ResolvedSimulationConfig {
  readonly width: number;
  readonly height: number;
  readonly strategy: StrategyName;
  readonly rule: RuleSource;
  readonly initial: InitialCells;
  readonly trace: boolean;
}

export const DEFAULT_SIMULATION_CONFIG = {
  strategy: "convolution",
  probability: 0.2,
  rule: DEFAULT_RULE_INIT,
  trace: false,
} as const satisfies {
  strategy: StrategyName;
  probability: number;
  rule: RuleInit;
  trace: boolean;
};

/**
 * Fill defaults. A random grid without a seed gets a fresh one, which is
 * kept in the result so the run can be reproduced.
 */
export function resolveConfig(config: SimulationConfig): ResolvedSimulationConfig {
  const rule: RuleSource =
    config.ruleString !== undefined
      ? { kind: "ruleString", ruleString: config.ruleString }
      : { kind: "rule", rule: config.rule ?? DEFAULT_SIMULATION_CONFIG.rule };

  let initial: InitialCells;
  if (config.cells !== undefined) {
    initial = { kind: "cells", cells: config.cells };
  } else if (config.rows !== undefined) {
    initial = { kind: "rows", rows: config.rows };
  } else {
    initial = {
      kind: "random",
      probability: config.probability ?? DEFAULT_SIMULATION_CONFIG.probability,
      seed: config.seed ?? randomSeed(),
    };
  }

  return {
    width: config.width,
    height: config.height,
    strategy: config.strategy ?? DEFAULT_SIMULATION_CONFIG.strategy,
    rule,
    initial,
    trace: config.trace ?? DEFAULT_SIMULATION_CONFIG.trace,
  };
}
