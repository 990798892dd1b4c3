/**
 * Chain Module Exports
 *
 * In-process execution model:
 * - Atomic units of work with journaled rollback
 * - ERC-20 style ledgers and native currency bank
 * - Currency resolution for pool currencies
 */

export * from "./types.js";
export * from "./chain-runtime.js";
export * from "./token-ledger.js";
export * from "./native-bank.js";
export * from "./currency-book.js";
