/**
 * Strategy lookup by name.
 */

import {
  AutomatonError,
  Err,
  Ok,
  type Result,
  type StrategyName,
} from "@lifelike/contracts";
import { ConvolutionStrategy } from "./convolution";
import { DirectStrategy } from "./direct";
import { SpectralStrategy } from "./spectral";
import type { StepStrategy } from "./types";

export const STRATEGY_NAMES: readonly StrategyName[] = [
  "direct",
  "convolution",
  "spectral",
];

const STRATEGY_ALIASES: ReadonlyMap<string, StrategyName> = new Map<string, StrategyName>([
  ["direct", "direct"],
  ["std", "direct"],
  ["standard", "direct"],
  ["convolution", "convolution"],
  ["conv", "convolution"],
  ["spatial", "convolution"],
  ["spectral", "spectral"],
  ["fft", "spectral"],
]);

const STRATEGY_FACTORIES: Readonly<Record<StrategyName, () => StepStrategy>> = {
  direct: () => new DirectStrategy(),
  convolution: () => new ConvolutionStrategy(),
  spectral: () => new SpectralStrategy(),
};

/**
 * Resolve a strategy name or alias (case-insensitive).
 */
export function parseStrategyName(input: string): StrategyName | undefined {
  return STRATEGY_ALIASES.get(input.trim().toLowerCase());
}

/**
 * Create a fresh strategy instance. Each instance owns its scratch buffers.
 */
export function createStrategy(name: string): Result<StepStrategy, AutomatonError> {
  const resolved = parseStrategyName(name);
  if (resolved === undefined) {
    return Err(AutomatonError.strategyNotFound(name));
  }
  return Ok(STRATEGY_FACTORIES[resolved]());
}
