/**
 * Registry Module Exports
 */

export * from "./types.js";
export * from "./validation.js";
export * from "./vault-builder.js";
export * from "./vault-registry.js";
