/**
 * Upkeep Module Exports
 */

export * from "./types.js";
export * from "./decision-codec.js";
export * from "./keeper.js";
