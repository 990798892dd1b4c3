/**
 * Launch Guard
 *
 * Swap hook protecting the fundraising pool right after launch:
 * - No buys at all until blocksToHold blocks have passed
 * - Until timeToHold seconds have passed, buys above maxBuyFraction of
 *   supply are rejected and each buyer must wait cooldownDuration between buys
 * - Sells are never checked
 *
 * Launch block and timestamp are captured once, at construction.
 */

import type { Address } from "viem";
import {
  engineLogger as logger,
  type LaunchGuardConfig,
  normalizeAddress,
  TradeBlockedError,
  type TradeBlockReason,
  sameAddress,
  UnauthorizedError,
} from "@givevault/shared";
import type { ChainRuntime } from "../chain/chain-runtime.js";
import type { Journaled } from "../chain/types.js";
import { mulFraction } from "../math/threshold-math.js";
import type { AfterSwapContext, BeforeSwapContext, PoolKey, SwapHook } from "../venue/types.js";
import type { SupplyReader } from "../tax/tax-router.js";

const guardLogger = logger.child({ component: "launch-guard" });

// ============================================
// TYPES
// ============================================

export interface LaunchGuardLinks {
  token: Address;
  supply: SupplyReader;
}

export interface LaunchInfo {
  launchBlockNumber: number;
  launchTimestamp: number;
  holdUntilBlock: number;
  restrictedUntil: number;
  config: LaunchGuardConfig;
}

// ============================================
// LAUNCH GUARD
// ============================================

export class LaunchGuard implements SwapHook, Journaled<Map<Address, number>> {
  readonly launchBlockNumber: number;
  readonly launchTimestamp: number;

  private lastBuyTimestamp: Map<Address, number> = new Map();
  private links?: LaunchGuardLinks;

  constructor(
    private readonly runtime: ChainRuntime,
    readonly address: Address,
    private readonly venue: Address,
    private readonly config: LaunchGuardConfig
  ) {
    this.launchBlockNumber = runtime.block;
    this.launchTimestamp = runtime.now;
    runtime.track(this);
  }

  captureState(): Map<Address, number> {
    return new Map(this.lastBuyTimestamp);
  }

  restoreState(state: Map<Address, number>): void {
    this.lastBuyTimestamp = new Map(state);
  }

  wire(links: LaunchGuardLinks): void {
    if (this.links) {
      throw new Error(`LaunchGuard ${this.address} is already wired`);
    }
    this.links = links;
  }

  private get wired(): LaunchGuardLinks {
    if (!this.links) {
      throw new Error(`LaunchGuard ${this.address} used before wiring`);
    }
    return this.links;
  }

  // ============================================
  // VIEWS
  // ============================================

  getLaunchInfo(): LaunchInfo {
    return {
      launchBlockNumber: this.launchBlockNumber,
      launchTimestamp: this.launchTimestamp,
      holdUntilBlock: this.launchBlockNumber + this.config.blocksToHold,
      restrictedUntil: this.launchTimestamp + this.config.timeToHold,
      config: this.config,
    };
  }

  /**
   * True while the time-based restrictions still apply
   */
  isRestricted(): boolean {
    return this.runtime.now < this.launchTimestamp + this.config.timeToHold;
  }

  lastBuyOf(trader: Address): number | undefined {
    return this.lastBuyTimestamp.get(normalizeAddress(trader, "trader"));
  }

  /**
   * Buying the fundraising token means receiving it from the pool
   */
  isBuy(poolKey: PoolKey, zeroForOne: boolean): boolean {
    return sameAddress(poolKey.currency1, this.wired.token) ? zeroForOne : !zeroForOne;
  }

  // ============================================
  // HOOKS
  // ============================================

  beforeSwap(caller: Address, context: BeforeSwapContext): void {
    this.requireVenue(caller);
    if (!this.isBuy(context.poolKey, context.zeroForOne)) {
      return;
    }

    if (this.runtime.block < this.launchBlockNumber + this.config.blocksToHold) {
      this.reject("hold-window", context.trader);
    }

    if (!this.isRestricted()) {
      return;
    }

    const lastBuy = this.lastBuyOf(context.trader);
    if (lastBuy !== undefined && this.runtime.now < lastBuy + this.config.cooldownDuration) {
      this.reject("cooldown", context.trader);
    }
  }

  afterSwap(caller: Address, context: AfterSwapContext): void {
    this.requireVenue(caller);
    if (!this.isBuy(context.poolKey, context.zeroForOne) || !this.isRestricted()) {
      return;
    }

    const maxBuy = mulFraction(this.wired.supply.totalSupply(), this.config.maxBuyFraction);
    if (context.amountOut > maxBuy) {
      this.reject("max-buy", context.trader);
    }

    this.lastBuyTimestamp.set(normalizeAddress(context.trader, "trader"), this.runtime.now);
  }

  private requireVenue(caller: Address): void {
    if (!sameAddress(caller, this.venue)) {
      throw new UnauthorizedError(caller, "trading venue");
    }
  }

  private reject(reason: TradeBlockReason, trader: Address): never {
    guardLogger.warn({
      token: this.wired.token,
      trader,
      reason,
      block: this.runtime.block,
      timestamp: this.runtime.now,
    }, "Buy blocked by launch guard");
    throw new TradeBlockedError(reason, trader);
  }
}
