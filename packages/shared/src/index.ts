/**
 * @givevault/shared
 * Shared constants, schemas, errors and logging for GiveVault
 */

// Export schemas (includes inferred domain types)
export * from "./schemas/index.js";

// Export constants (WAD, protocol fractions, defaults)
export * from "./constants/index.js";

// Export error taxonomy
export * from "./errors/index.js";

// Export logger
export {
  logger,
  createServiceLogger,
  engineLogger,
  keeperLogger,
  logUpkeep,
  audit,
  logError,
  logFatal,
  createTimer,
  type UpkeepLogContext,
  type AuditLogEntry,
} from "./logger/index.js";
