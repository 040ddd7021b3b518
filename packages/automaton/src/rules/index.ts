/**
 * Rules module - rule model, count sets, neighborhoods and rulestrings.
 */

export * from "./count-spec";
export * from "./neighborhood";
export * from "./rule";
export * from "./rulestring";
