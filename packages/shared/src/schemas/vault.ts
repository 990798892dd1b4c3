/**
 * Vault Domain Schemas
 * Tax policy, treasury settings, launch protection and vault creation inputs
 */

import { z } from "zod";
import {
  DEFAULT_LAUNCH_GUARD,
  DEFAULT_POOL,
  DEFAULT_TREASURY_SETTINGS,
  FEE_DENOMINATOR,
  TRANSFER_BURN_FRACTION,
} from "../constants/index.js";
import {
  addressSchema,
  fractionSchema,
  nonNegativeIntSchema,
  nonZeroAddressSchema,
  positiveAmountSchema,
} from "./common.js";

// ============================================
// TAX POLICY
// ============================================

/**
 * Immutable per-vault tax policy. configurableLPFraction is the share of
 * the transferred amount routed to liquidity support, carved out of the fee.
 */
export const taxPolicySchema = z
  .object({
    taxFeeFraction: fractionSchema,
    maximumTreasuryFraction: fractionSchema,
    minimumLiquidityTopUpFraction: fractionSchema,
    configurableLPFraction: fractionSchema,
  })
  .refine((policy) => policy.taxFeeFraction >= policy.configurableLPFraction, {
    message: "configurableLPFraction cannot exceed taxFeeFraction",
    path: ["configurableLPFraction"],
  });

export type TaxPolicy = z.output<typeof taxPolicySchema>;
export type TaxPolicyInput = z.input<typeof taxPolicySchema>;

// ============================================
// TREASURY SETTINGS
// ============================================

export const treasurySettingsSchema = z
  .object({
    transferInterval: z.number().int().positive().default(DEFAULT_TREASURY_SETTINGS.transferInterval),
    minimumHealthThreshold: fractionSchema.default(DEFAULT_TREASURY_SETTINGS.minimumHealthThreshold),
    minLPHealthThreshold: fractionSchema.default(DEFAULT_TREASURY_SETTINGS.minLPHealthThreshold),
    slippageFraction: fractionSchema.default(DEFAULT_TREASURY_SETTINGS.slippageFraction),
  })
  // A due transfer-and-burn moves one burn amount out and burns another
  .refine((settings) => settings.minimumHealthThreshold >= 2n * TRANSFER_BURN_FRACTION, {
    message: "minimumHealthThreshold must cover two burn amounts",
    path: ["minimumHealthThreshold"],
  });

export type TreasurySettings = z.output<typeof treasurySettingsSchema>;
export type TreasurySettingsInput = z.input<typeof treasurySettingsSchema>;

// ============================================
// LAUNCH PROTECTION
// ============================================

export const launchGuardConfigSchema = z.object({
  maxBuyFraction: fractionSchema.default(DEFAULT_LAUNCH_GUARD.maxBuyFraction),
  cooldownDuration: nonNegativeIntSchema.default(DEFAULT_LAUNCH_GUARD.cooldownDuration),
  blocksToHold: nonNegativeIntSchema.default(DEFAULT_LAUNCH_GUARD.blocksToHold),
  timeToHold: nonNegativeIntSchema.default(DEFAULT_LAUNCH_GUARD.timeToHold),
});

export type LaunchGuardConfig = z.output<typeof launchGuardConfigSchema>;
export type LaunchGuardConfigInput = z.input<typeof launchGuardConfigSchema>;

// ============================================
// VAULT CREATION
// ============================================

export const createVaultParamsSchema = z.object({
  owner: nonZeroAddressSchema,
  payoutAddress: nonZeroAddressSchema,
  // Zero address pairs the token with the native currency
  pairedCurrency: addressSchema,
  name: z.string().min(1).max(64),
  symbol: z.string().min(1).max(16).regex(/^[A-Z0-9]+$/, "Symbol must be uppercase alphanumeric"),
  initialSupply: positiveAmountSchema,
  taxPolicy: taxPolicySchema,
  treasury: treasurySettingsSchema.default({}),
  launchGuard: launchGuardConfigSchema.default({}),
  poolFee: z.number().int().min(0).max(FEE_DENOMINATOR - 1).default(DEFAULT_POOL.fee),
  tickSpacing: z.number().int().min(1).max(32767).default(DEFAULT_POOL.tickSpacing),
});

export type CreateVaultParams = z.output<typeof createVaultParamsSchema>;
export type CreateVaultParamsInput = z.input<typeof createVaultParamsSchema>;

export const createLiquidityParamsSchema = z.object({
  tokenAmount: positiveAmountSchema,
  pairedAmount: positiveAmountSchema,
  funder: nonZeroAddressSchema,
});

export type CreateLiquidityParams = z.output<typeof createLiquidityParamsSchema>;
export type CreateLiquidityParamsInput = z.input<typeof createLiquidityParamsSchema>;
