/**
 * Tax Router
 *
 * Decides how every fundraising-token transfer is split between the
 * receiver, the liquidity manager and the treasury.
 *
 * - Mints, burns and transfers touching a system address are untaxed
 * - No tax while the treasury is paused or already holds its maximum share
 * - Otherwise taxFeeFraction of the amount is taken; when pool liquidity is
 *   unhealthy, configurableLPFraction of the amount goes to liquidity support
 *   and the remainder of the tax to the treasury
 *
 * The router only reads state; the token applies the resulting breakdown.
 */

import type { Address } from "viem";
import { normalizeAddress, type TaxPolicy, ZERO_ADDRESS } from "@givevault/shared";
import { fractionOfSupply, minBigInt, mulFraction } from "../math/threshold-math.js";

// ============================================
// TYPES
// ============================================

export interface TaxRecipients {
  liquidityManager: Address;
  treasury: Address;
  donationForwarder: Address;
}

/**
 * Treasury-side readings the router consults on each transfer
 */
export interface TaxSignals {
  isPaused(): boolean;
  lpHealthFraction(): bigint;
}

export interface SupplyReader {
  totalSupply(): bigint;
  balanceOf(account: Address): bigint;
}

export type TaxExemption =
  | "mint"
  | "burn"
  | "system-address"
  | "zero-amount"
  | "treasury-paused"
  | "treasury-full";

export interface TaxBreakdown {
  amount: bigint;
  netAmount: bigint;
  taxAmount: bigint;
  toLiquidity: bigint;
  toTreasury: bigint;
  exemption?: TaxExemption;
}

// ============================================
// TAX ROUTER
// ============================================

export class TaxRouter {
  readonly recipients: TaxRecipients;
  private readonly systemAddresses: ReadonlySet<Address>;

  constructor(
    readonly policy: TaxPolicy,
    recipients: TaxRecipients,
    private readonly signals: TaxSignals,
    private readonly supply: SupplyReader
  ) {
    this.recipients = {
      liquidityManager: normalizeAddress(recipients.liquidityManager, "liquidityManager"),
      treasury: normalizeAddress(recipients.treasury, "treasury"),
      donationForwarder: normalizeAddress(recipients.donationForwarder, "donationForwarder"),
    };
    this.systemAddresses = new Set([
      this.recipients.liquidityManager,
      this.recipients.treasury,
      this.recipients.donationForwarder,
    ]);
  }

  isSystemAddress(account: Address): boolean {
    return this.systemAddresses.has(normalizeAddress(account, "account"));
  }

  /**
   * Treasury balance as a share of total supply
   */
  treasuryFraction(): bigint {
    return fractionOfSupply(
      this.supply.balanceOf(this.recipients.treasury),
      this.supply.totalSupply()
    );
  }

  route(from: Address, to: Address, amount: bigint): TaxBreakdown {
    const exemption = this.exemptionFor(normalizeAddress(from, "from"), normalizeAddress(to, "to"), amount);
    if (exemption) {
      return untaxed(amount, exemption);
    }

    const taxAmount = mulFraction(amount, this.policy.taxFeeFraction);

    let toLiquidity = 0n;
    if (this.signals.lpHealthFraction() < this.policy.minimumLiquidityTopUpFraction) {
      // Clamp so rounding can never push the LP share past the whole tax
      toLiquidity = minBigInt(mulFraction(amount, this.policy.configurableLPFraction), taxAmount);
    }

    return {
      amount,
      netAmount: amount - taxAmount,
      taxAmount,
      toLiquidity,
      toTreasury: taxAmount - toLiquidity,
    };
  }

  private exemptionFor(from: Address, to: Address, amount: bigint): TaxExemption | undefined {
    if (from === ZERO_ADDRESS) {
      return "mint";
    }
    if (to === ZERO_ADDRESS) {
      return "burn";
    }
    if (this.isSystemAddress(from) || this.isSystemAddress(to)) {
      return "system-address";
    }
    if (amount === 0n) {
      return "zero-amount";
    }
    if (this.signals.isPaused()) {
      return "treasury-paused";
    }
    if (this.treasuryFraction() >= this.policy.maximumTreasuryFraction) {
      return "treasury-full";
    }
    return undefined;
  }
}

function untaxed(amount: bigint, exemption: TaxExemption): TaxBreakdown {
  return {
    amount,
    netAmount: amount,
    taxAmount: 0n,
    toLiquidity: 0n,
    toTreasury: 0n,
    exemption,
  };
}
