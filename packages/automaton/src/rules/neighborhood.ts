/**
 * Neighborhood definitions and name parsing.
 */

import {
  MAX_NEIGHBOR_COUNT,
  MAX_VON_NEUMANN_COUNT,
  type Neighborhood,
} from "@lifelike/contracts";

export type { Neighborhood };

const NEIGHBORHOOD_ALIASES: ReadonlyMap<string, Neighborhood> = new Map<string, Neighborhood>([
  ["m", "moore"],
  ["moore", "moore"],
  ["v", "von-neumann"],
  ["vn", "von-neumann"],
  ["vonneumann", "von-neumann"],
  ["von-neumann", "von-neumann"],
  ["von neumann", "von-neumann"],
]);

/**
 * Highest neighbor count the neighborhood can produce.
 */
export function maxNeighborCount(neighborhood: Neighborhood): number {
  return neighborhood === "moore" ? MAX_NEIGHBOR_COUNT : MAX_VON_NEUMANN_COUNT;
}

/**
 * Resolve a user-facing neighborhood name (case-insensitive).
 * @returns The neighborhood, or undefined for an unknown name
 */
export function parseNeighborhood(input: string): Neighborhood | undefined {
  return NEIGHBORHOOD_ALIASES.get(input.trim().toLowerCase());
}

/**
 * Human-readable name, e.g. for a renderer's status line.
 */
export function describeNeighborhood(neighborhood: Neighborhood): string {
  return neighborhood === "moore" ? "Moore" : "von Neumann";
}
