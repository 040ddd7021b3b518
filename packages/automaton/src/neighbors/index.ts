export * from "./count";
export * from "./kernel";
