/**
 * Grid module - state grid storage and access.
 */

export { StateGrid } from "./grid";
export * from "./types";
