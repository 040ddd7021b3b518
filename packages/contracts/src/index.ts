export * from "./random/rng";
export * from "./random/seeded-random";
export * from "./random/system-random";
export * from "./schemas/rule";
export * from "./schemas/simulation";
export * from "./types/error";
export * from "./types/result";
