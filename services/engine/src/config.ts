/**
 * Engine Service Configuration
 */

import { z } from "zod";
import {
  DEFAULT_LAUNCH_GUARD,
  DEFAULT_TREASURY_SETTINGS,
  envSchema,
  launchGuardConfigSchema,
  treasurySettingsSchema,
} from "@givevault/shared";

// ============================================
// ENGINE CONFIG SCHEMA
// ============================================

const engineConfigSchema = z.object({
  nodeEnv: z.enum(["development", "test", "production"]),

  // Keeper cadence
  keeperIntervalMs: z.number().int().positive(),
  // Simulated blocks mined per keeper tick (local daemon only)
  blocksPerInterval: z.number().int().positive(),

  // Defaults applied to vaults created without explicit settings
  treasury: treasurySettingsSchema,
  launchGuard: launchGuardConfigSchema,
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;

// ============================================
// LOAD CONFIGURATION
// ============================================

export function loadEngineConfig(source: NodeJS.ProcessEnv = process.env): EngineConfig {
  const env = envSchema.parse(source);

  const config = {
    nodeEnv: env.NODE_ENV,

    keeperIntervalMs: env.KEEPER_INTERVAL_MS,
    blocksPerInterval: env.KEEPER_BLOCKS_PER_INTERVAL,

    treasury: {
      transferInterval: env.TRANSFER_INTERVAL_SECONDS ?? DEFAULT_TREASURY_SETTINGS.transferInterval,
      minimumHealthThreshold:
        env.MIN_TREASURY_HEALTH_FRACTION ?? DEFAULT_TREASURY_SETTINGS.minimumHealthThreshold,
      minLPHealthThreshold: env.MIN_LP_HEALTH_FRACTION ?? DEFAULT_TREASURY_SETTINGS.minLPHealthThreshold,
      slippageFraction: env.DEFAULT_SLIPPAGE_FRACTION,
    },
    launchGuard: {
      ...DEFAULT_LAUNCH_GUARD,
      blocksToHold: env.LAUNCH_BLOCKS_TO_HOLD ?? DEFAULT_LAUNCH_GUARD.blocksToHold,
      timeToHold: env.LAUNCH_TIME_TO_HOLD ?? DEFAULT_LAUNCH_GUARD.timeToHold,
    },
  };

  return engineConfigSchema.parse(config);
}
