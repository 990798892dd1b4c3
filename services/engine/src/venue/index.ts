export * from "./types.js";
export * from "./pool-key.js";
export * from "./in-memory-venue.js";
