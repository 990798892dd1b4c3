/**
 * @givevault/engine
 * Treasury decision engine: tax routing, launch protection, treasury
 * upkeep, donation forwarding and the vault registry
 */

// Configuration
export { loadEngineConfig, type EngineConfig } from "./config.js";

// Fixed-point helpers
export * from "./math/index.js";

// Execution model
export * from "./chain/index.js";

// Trading venue capabilities and in-process venue
export * from "./venue/index.js";

// Vault components
export * from "./tax/index.js";
export * from "./token/index.js";
export * from "./launch/index.js";
export * from "./treasury/index.js";
export * from "./donation/index.js";

// Registry
export * from "./registry/index.js";

// Upkeep protocol and keeper
export * from "./upkeep/index.js";

// In-process deployment
export * from "./world.js";
