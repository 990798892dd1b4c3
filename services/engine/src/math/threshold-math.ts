/**
 * Threshold Math
 *
 * Fixed-point helpers shared by the tax router, treasury and launch guard.
 * Every fraction is scaled by WAD (1e18 = 100%); results round down.
 */

import { InvalidAmountError, TICK_BOUNDS, WAD } from "@givevault/shared";

// ============================================
// FRACTIONS
// ============================================

function assertNonNegative(field: string, value: bigint): void {
  if (value < 0n) {
    throw new InvalidAmountError(field, value);
  }
}

/**
 * amount × fraction / 1e18, rounded down
 */
export function mulFraction(amount: bigint, fraction: bigint): bigint {
  assertNonNegative("amount", amount);
  assertNonNegative("fraction", fraction);
  return (amount * fraction) / WAD;
}

/**
 * part / whole as a WAD fraction. An empty whole reads as 0%.
 */
export function fractionOf(part: bigint, whole: bigint): bigint {
  assertNonNegative("part", part);
  assertNonNegative("whole", whole);
  if (whole === 0n) {
    return 0n;
  }
  return (part * WAD) / whole;
}

/**
 * Share of total supply held by an account (treasury health, pool health)
 */
export function fractionOfSupply(balance: bigint, totalSupply: bigint): bigint {
  return fractionOf(balance, totalSupply);
}

/**
 * Minimum acceptable output after applying a slippage tolerance to a quote
 */
export function minAmountOut(expectedAmountOut: bigint, slippageFraction: bigint): bigint {
  if (slippageFraction > WAD) {
    throw new InvalidAmountError("slippageFraction", slippageFraction);
  }
  return expectedAmountOut - mulFraction(expectedAmountOut, slippageFraction);
}

/**
 * a − b, floored at zero
 */
export function clampSub(a: bigint, b: bigint): bigint {
  return a > b ? a - b : 0n;
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

// ============================================
// TICK BUCKETING
// ============================================

export interface TickRange {
  tickLower: number;
  tickUpper: number;
}

function assertSpacing(tickSpacing: number): void {
  if (!Number.isInteger(tickSpacing) || tickSpacing <= 0) {
    // BigInt() throws on NaN and infinities
    const reported = Number.isFinite(tickSpacing) ? BigInt(Math.trunc(tickSpacing)) : 0n;
    throw new InvalidAmountError("tickSpacing", reported);
  }
}

/**
 * Lowest tick that is a multiple of the spacing (rounds toward zero)
 */
export function minUsableTick(tickSpacing: number): number {
  assertSpacing(tickSpacing);
  return Math.trunc(TICK_BOUNDS.min / tickSpacing) * tickSpacing;
}

/**
 * Highest tick that is a multiple of the spacing (rounds toward zero)
 */
export function maxUsableTick(tickSpacing: number): number {
  assertSpacing(tickSpacing);
  return Math.trunc(TICK_BOUNDS.max / tickSpacing) * tickSpacing;
}

export function fullRangeTicks(tickSpacing: number): TickRange {
  return {
    tickLower: minUsableTick(tickSpacing),
    tickUpper: maxUsableTick(tickSpacing),
  };
}

export function isUsableTick(tick: number, tickSpacing: number): boolean {
  return (
    Number.isInteger(tick) &&
    tick % tickSpacing === 0 &&
    tick >= minUsableTick(tickSpacing) &&
    tick <= maxUsableTick(tickSpacing)
  );
}
