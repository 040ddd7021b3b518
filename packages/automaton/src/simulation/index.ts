export * from "./seed-grid";
export * from "./simulation";
export * from "./trace";
