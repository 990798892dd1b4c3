/**
 * GiveVault Zod Schemas
 * Validation schemas for configuration and vault inputs
 */

import { z } from "zod";
import { KEEPER_DEFAULTS } from "../constants/index.js";

// ============================================
// RE-EXPORT ALL SCHEMAS
// ============================================

// Common primitives
export * from "./common.js";

// Domain schemas
export * from "./vault.js";

// ============================================
// ENVIRONMENT SCHEMAS
// ============================================

const wadString = (fallback: bigint) =>
  z
    .string()
    .regex(/^\d+$/, "Fraction must be an integer string scaled by 1e18")
    .transform((v) => BigInt(v))
    .default(fallback.toString());

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("production"),

  // Logging
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  LOG_FORMAT: z.enum(["json", "pretty"]).default("json"),

  // Keeper cadence
  KEEPER_INTERVAL_MS: z.string().transform(Number).pipe(z.number().int().positive()).default(
    KEEPER_DEFAULTS.intervalMs.toString()
  ),
  KEEPER_BLOCKS_PER_INTERVAL: z.string().transform(Number).pipe(z.number().int().positive()).default(
    KEEPER_DEFAULTS.blocksPerInterval.toString()
  ),

  // Treasury overrides (fractions are parts-per-1e18)
  TRANSFER_INTERVAL_SECONDS: z.string().transform(Number).pipe(z.number().int().positive()).optional(),
  MIN_TREASURY_HEALTH_FRACTION: z.string().regex(/^\d+$/).transform((v) => BigInt(v)).optional(),
  MIN_LP_HEALTH_FRACTION: z.string().regex(/^\d+$/).transform((v) => BigInt(v)).optional(),
  DEFAULT_SLIPPAGE_FRACTION: wadString(5n * 10n ** 16n),

  // Launch protection overrides
  LAUNCH_BLOCKS_TO_HOLD: z.string().transform(Number).pipe(z.number().int().nonnegative()).optional(),
  LAUNCH_TIME_TO_HOLD: z.string().transform(Number).pipe(z.number().int().nonnegative()).optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;
