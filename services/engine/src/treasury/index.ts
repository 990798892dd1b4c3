/**
 * Treasury Module Exports
 *
 * Provides the treasury upkeep state machine:
 * - Transfer-and-burn cycle toward the donation forwarder
 * - Pool liquidity top-up when health drops below target
 * - Pause and emergency withdrawal controlled by the registry
 */

export * from "./types.js";
export * from "./treasury-controller.js";
