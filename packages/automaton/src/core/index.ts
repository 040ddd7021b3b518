/**
 * Core module - foundational primitives for the automaton.
 */

export * from "./constants";
export * from "./fft";
export * from "./geometry";
export * from "./grid";
export * from "./hash";
