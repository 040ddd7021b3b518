/**
 * Simulation API
 *
 * Builds a ready-to-step Simulation from an untrusted configuration object.
 */

import {
  AutomatonError,
  Err,
  Result,
  SeededRandom,
  SimulationConfigSchema,
} from "@lifelike/contracts";
import { type ResolvedSimulationConfig, resolveConfig } from "./config";
import { StateGrid } from "./core/grid/grid";
import { Rule } from "./rules/rule";
import { parseRuleString } from "./rules/rulestring";
import { randomGrid, toAutomatonError } from "./simulation/seed-grid";
import { Simulation } from "./simulation/simulation";
import { createTraceCollector, type TraceCollector } from "./simulation/trace";
import { createStrategy } from "./strategies/registry";

export interface CreateSimulationOptions {
  /** Overrides the collector selected by the config's `trace` flag. */
  readonly trace?: TraceCollector;
}

function buildRule(config: ResolvedSimulationConfig): Result<Rule, AutomatonError> {
  return config.rule.kind === "ruleString"
    ? parseRuleString(config.rule.ruleString)
    : Rule.create(config.rule.rule);
}

function buildGrid(
  config: ResolvedSimulationConfig,
  rule: Rule,
): Result<StateGrid, AutomatonError> {
  const { width, height, initial } = config;
  switch (initial.kind) {
    case "cells":
      return Result.fromThrowable(
        () => StateGrid.fromCells(width, height, initial.cells),
        toAutomatonError,
      );
    case "rows":
      return Result.fromThrowable(() => {
        const grid = StateGrid.fromRows(initial.rows);
        if (grid.width !== width || grid.height !== height) {
          throw AutomatonError.gridInvalid(
            "GRID_SIZE_MISMATCH",
            `Rows describe a ${grid.width}x${grid.height} grid, config says ${width}x${height}`,
            { expected: { width, height }, actual: grid.getDimensions() },
          );
        }
        return grid;
      }, toAutomatonError);
    case "random":
      return randomGrid(width, height, {
        probability: initial.probability,
        maxState: rule.maxState,
        rng: new SeededRandom(initial.seed),
      });
  }
}

/**
 * Validate a configuration and build the simulation it describes.
 *
 * @example
 * ```typescript
 * const sim = createSimulation({
 *   width: 64,
 *   height: 48,
 *   ruleString: "B3/S23",
 *   strategy: "spectral",
 *   seed: 42,
 * }).getOrThrow();
 *
 * sim.step();
 * console.log(sim.cell(0, 0), sim.numx(), sim.numy());
 * ```
 */
export function createSimulation(
  config: unknown,
  options: CreateSimulationOptions = {},
): Result<Simulation, AutomatonError> {
  const parsed = SimulationConfigSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    }));
    return Err(
      AutomatonError.configInvalid(
        `Invalid simulation config: ${issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join("; ")}`,
        { issues },
      ),
    );
  }

  const resolved = resolveConfig(parsed.data);
  const trace = options.trace ?? createTraceCollector(resolved.trace);

  return buildRule(resolved).flatMap((rule) =>
    createStrategy(resolved.strategy).flatMap((strategy) =>
      buildGrid(resolved, rule).flatMap((grid) => {
        if (resolved.initial.kind === "random") {
          trace.decision(
            "simulation.create",
            "Initial grid",
            [],
            resolved.initial.seed,
            `Random ${resolved.width}x${resolved.height} grid, alive probability ${resolved.initial.probability}`,
          );
        }
        return Result.fromThrowable(
          () => new Simulation(grid, rule, strategy, { trace }),
          toAutomatonError,
        );
      }),
    ),
  );
}
