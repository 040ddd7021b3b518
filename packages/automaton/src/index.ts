/**
 * @lifelike/automaton
 *
 * Generalized Life-like cellular automaton engine with interchangeable
 * direct, spatial-convolution and spectral stepping strategies.
 */

export * from "./api";
export * from "./config";
export * from "./core";
export * from "./neighbors";
export * from "./rules";
export * from "./simulation";
export * from "./strategies";
