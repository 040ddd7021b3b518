export * from "./base";
export * from "./convolution";
export * from "./direct";
export * from "./registry";
export * from "./spectral";
export * from "./transition";
export type { StepStrategy } from "./types";
