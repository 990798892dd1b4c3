/**
 * GiveVault Constants
 * Fixed-point scale, protocol fractions and engine defaults
 */

// ============================================
// FIXED POINT
// ============================================

/** 1e18 = 100%. Every fraction in the protocol is expressed against this scale. */
export const WAD = 10n ** 18n;

/** 1% in WAD terms */
export const PERCENT = WAD / 100n;

/** Pool fees are expressed in pips (1_000_000 = 100%) */
export const FEE_DENOMINATOR = 1_000_000;

// ============================================
// ADDRESS SENTINELS
// ============================================

/** Mint/burn sentinel, and the native currency when used as a pool currency */
export const ZERO_ADDRESS = "0x0000000000000000000000000000000000000000" as const;
export const NATIVE_CURRENCY = ZERO_ADDRESS;

// ============================================
// PROTOCOL CONSTANTS
// ============================================

/**
 * Share of total supply moved to the donation forwarder on every
 * transfer-and-burn cycle. The same amount is burned from the treasury.
 */
export const TRANSFER_BURN_FRACTION = 2n * PERCENT;

export const TICK_BOUNDS = {
  min: -887272,
  max: 887272,
} as const;

// ============================================
// DEFAULTS
// ============================================

export const DEFAULT_TAX_POLICY = {
  taxFeeFraction: 2n * PERCENT,
  maximumTreasuryFraction: 30n * PERCENT,
  minimumLiquidityTopUpFraction: 5n * PERCENT,
  configurableLPFraction: 1n * PERCENT,
} as const;

export const DEFAULT_TREASURY_SETTINGS = {
  transferInterval: 30 * 24 * 60 * 60, // 30 days (seconds)
  minimumHealthThreshold: 10n * PERCENT,
  minLPHealthThreshold: 5n * PERCENT,
  slippageFraction: 5n * PERCENT,
} as const;

export const DEFAULT_LAUNCH_GUARD = {
  maxBuyFraction: 1n * PERCENT,
  cooldownDuration: 60, // seconds between buys per address
  blocksToHold: 10,
  timeToHold: 60 * 60, // 1 hour
} as const;

export const DEFAULT_POOL = {
  fee: 3000, // 0.3%
  tickSpacing: 60,
} as const;

export const KEEPER_DEFAULTS = {
  intervalMs: 15_000,
  blocksPerInterval: 5,
} as const;
