export * from "./checksum";
export * from "./fnv32";
