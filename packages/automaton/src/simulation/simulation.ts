/**
 * Simulation: a rule, a strategy and a double-buffered pair of grids.
 *
 * This is the surface an external renderer drives: read cells between
 * steps, call `step()` to advance one generation.
 */

import { AutomatonError, type StrategyName } from "@lifelike/contracts";
import { StateGrid } from "../core/grid/grid";
import type { ReadonlyStateGrid } from "../core/grid/types";
import { gridChecksum } from "../core/hash/checksum";
import type { Rule } from "../rules/rule";
import type { StepStrategy } from "../strategies/types";
import { NoOpTraceCollector, type TraceCollector } from "./trace";

export interface SimulationOptions {
  /** Receives step and run events. Defaults to a no-op collector. */
  readonly trace?: TraceCollector;
}

export interface RunOptions {
  /** Stop after the first generation identical to the one before it. */
  readonly stopWhenStable?: boolean;
}

export interface RunSummary {
  readonly generationsRun: number;
  /** Whether the last step left the grid unchanged. */
  readonly stable: boolean;
  readonly population: number;
  readonly checksum: string;
}

export class Simulation {
  readonly rule: Rule;
  readonly trace: TraceCollector;
  private readonly strategy: StepStrategy;
  private current: StateGrid;
  private buffer: StateGrid;
  private generationCount = 0;

  /**
   * @param grid - Initial generation; copied, never mutated
   * @throws AutomatonError `GRID_STATE_INVALID` when a cell exceeds `rule.maxState`
   */
  constructor(
    grid: ReadonlyStateGrid,
    rule: Rule,
    strategy: StepStrategy,
    options: SimulationOptions = {},
  ) {
    const highest = grid.maxValue();
    if (highest > rule.maxState) {
      throw AutomatonError.gridInvalid(
        "GRID_STATE_INVALID",
        `Cell state ${highest} exceeds the rule's maxState ${rule.maxState}`,
        { maxState: rule.maxState, found: highest },
      );
    }

    this.rule = rule;
    this.strategy = strategy;
    this.trace = options.trace ?? new NoOpTraceCollector();
    this.current = StateGrid.fromCells(grid.width, grid.height, grid.getRawDataCopy());
    this.buffer = new StateGrid(grid.width, grid.height);
  }

  // ===========================================================================
  // RENDERER SURFACE
  // ===========================================================================

  /** State of cell (x, y), or undefined outside the grid. */
  cell(x: number, y: number): number | undefined {
    return this.current.get(x, y);
  }

  numx(): number {
    return this.current.width;
  }

  numy(): number {
    return this.current.height;
  }

  maxState(): number {
    return this.rule.maxState;
  }

  /**
   * Advance exactly one generation.
   */
  step(): void {
    const started = performance.now();
    this.trace.start("simulation.step");

    this.strategy.computeInto(this.current, this.buffer, this.rule);
    const previous = this.current;
    this.current = this.buffer;
    this.buffer = previous;
    this.generationCount++;

    if (this.trace.enabled) {
      const population = this.population();
      this.trace.decision(
        "simulation.step",
        `Generation ${this.generationCount}`,
        [],
        population,
        `${this.strategy.name} strategy: ${population} alive cells`,
      );
    }
    this.trace.end("simulation.step", performance.now() - started);
  }

  computeNextGeneration(): void {
    this.step();
  }

  // ===========================================================================
  // INSPECTION
  // ===========================================================================

  get generation(): number {
    return this.generationCount;
  }

  get strategyName(): StrategyName {
    return this.strategy.name;
  }

  /** Number of alive cells. */
  population(): number {
    return this.current.countCells(this.rule.maxState);
  }

  /** Copy of the current generation. */
  snapshot(): StateGrid {
    return this.current.clone();
  }

  checksum(): string {
    return gridChecksum(this.current);
  }

  /**
   * Cell states in row-major order.
   */
  *cells(): IterableIterator<number> {
    const data = this.current._unsafeGetInternalData();
    for (let i = 0; i < data.length; i++) {
      yield data[i] ?? 0;
    }
  }

  // ===========================================================================
  // BATCH
  // ===========================================================================

  /**
   * Advance up to `generations` steps.
   * @throws AutomatonError `CONFIG_INVALID` for a negative or fractional count
   */
  run(generations: number, options: RunOptions = {}): RunSummary {
    if (!Number.isInteger(generations) || generations < 0) {
      throw AutomatonError.configInvalid(
        `Generation count must be a non-negative integer, got ${generations}`,
        { generations },
      );
    }

    const started = performance.now();
    this.trace.start("simulation.run");

    let generationsRun = 0;
    let stable = false;
    let checksum = this.checksum();

    for (let i = 0; i < generations; i++) {
      this.step();
      generationsRun++;

      const next = this.checksum();
      // buffer holds the generation before the one just computed
      stable = next === checksum && this.current.equals(this.buffer);
      checksum = next;

      if (stable && options.stopWhenStable) {
        this.trace.decision(
          "simulation.run",
          "Stable state reached",
          [],
          this.generationCount,
          `No cell changed in generation ${this.generationCount}; stopping early`,
        );
        break;
      }
    }

    if (generationsRun < generations) {
      this.trace.warning(
        "simulation.run",
        `Stopped after ${generationsRun}/${generations} generations`,
      );
    }
    this.trace.end("simulation.run", performance.now() - started);

    return {
      generationsRun,
      stable,
      population: this.population(),
      checksum,
    };
  }
}
