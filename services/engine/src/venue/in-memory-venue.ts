/**
 * In-Memory Venue
 *
 * In-process stand-in for the trading venue, quoter and position manager.
 * Used by tests and the local daemon. Pricing is a plain constant-product
 * curve with a pip fee; balances move through the currency book so the
 * fundraising token's tax hook sees every transfer.
 */

import type { Address, Hex } from "viem";
import {
  engineLogger as logger,
  FEE_DENOMINATOR,
  InsufficientOutputError,
  InvalidAddressError,
  InvalidAmountError,
  PoolAlreadyExistsError,
  PoolNotFoundError,
  sameAddress,
} from "@givevault/shared";
import type { ChainRuntime } from "../chain/chain-runtime.js";
import type { CurrencyBook } from "../chain/currency-book.js";
import type { Journaled } from "../chain/types.js";
import { isUsableTick } from "../math/threshold-math.js";
import { toPoolId } from "./pool-key.js";
import type {
  AddLiquidityParams,
  AddLiquidityResult,
  PoolKey,
  PoolReserves,
  PositionManager,
  QuoteParams,
  QuotingService,
  SwapHook,
  SwapParams,
  TradingVenue,
} from "./types.js";

const venueLogger = logger.child({ component: "in-memory-venue" });

// ============================================
// TYPES
// ============================================

interface PoolRecord {
  key: PoolKey;
  reserve0: bigint;
  reserve1: bigint;
  hook?: SwapHook;
}

export interface PositionRecord {
  poolId: Hex;
  owner: Address;
  tickLower: number;
  tickUpper: number;
  amount0: bigint;
  amount1: bigint;
}

interface VenueState {
  pools: Map<Hex, PoolRecord>;
  positions: PositionRecord[];
}

// ============================================
// IN-MEMORY VENUE
// ============================================

export class InMemoryVenue
  implements TradingVenue, QuotingService, PositionManager, Journaled<VenueState>
{
  private pools: Map<Hex, PoolRecord> = new Map();
  private positions: PositionRecord[] = [];

  constructor(
    private readonly runtime: ChainRuntime,
    private readonly currencies: CurrencyBook,
    readonly address: Address
  ) {
    runtime.track(this);
    venueLogger.debug({ address }, "InMemoryVenue initialized");
  }

  captureState(): VenueState {
    const pools = new Map<Hex, PoolRecord>();
    for (const [id, pool] of this.pools) {
      pools.set(id, { ...pool });
    }
    return { pools, positions: this.positions.map((p) => ({ ...p })) };
  }

  restoreState(state: VenueState): void {
    this.pools = state.pools;
    this.positions = state.positions;
  }

  // ============================================
  // POOLS
  // ============================================

  hasPool(poolKey: PoolKey): boolean {
    return this.pools.has(toPoolId(poolKey));
  }

  initializePool(poolKey: PoolKey, hook?: SwapHook): Hex {
    const poolId = toPoolId(poolKey);
    if (this.pools.has(poolId)) {
      throw new PoolAlreadyExistsError(poolId);
    }
    if (BigInt(poolKey.currency0) >= BigInt(poolKey.currency1)) {
      throw new InvalidAddressError("currency1", poolKey.currency1);
    }
    if (hook && !sameAddress(hook.address, poolKey.hooks)) {
      throw new InvalidAddressError("hooks", hook.address);
    }

    this.runtime.atomic(() => {
      this.pools.set(poolId, { key: poolKey, reserve0: 0n, reserve1: 0n, hook });
      this.runtime.emitEvent({
        type: "PoolInitialized",
        poolId,
        currency0: poolKey.currency0,
        currency1: poolKey.currency1,
        hooks: poolKey.hooks,
      });
    });

    venueLogger.info({ poolId, currency0: poolKey.currency0, currency1: poolKey.currency1 }, "Pool initialized");
    return poolId;
  }

  getReserves(poolKey: PoolKey): PoolReserves {
    const pool = this.requirePool(poolKey);
    return { reserve0: pool.reserve0, reserve1: pool.reserve1 };
  }

  getPositions(owner?: Address): PositionRecord[] {
    return this.positions
      .filter((p) => owner === undefined || sameAddress(p.owner, owner))
      .map((p) => ({ ...p }));
  }

  private requirePool(poolKey: PoolKey): PoolRecord {
    const poolId = toPoolId(poolKey);
    const pool = this.pools.get(poolId);
    if (!pool) {
      throw new PoolNotFoundError(poolId);
    }
    return pool;
  }

  // ============================================
  // PRICING
  // ============================================

  private computeAmountOut(amountIn: bigint, reserveIn: bigint, reserveOut: bigint, fee: number): bigint {
    if (reserveIn === 0n || reserveOut === 0n) {
      return 0n;
    }
    const amountInAfterFee = (amountIn * BigInt(FEE_DENOMINATOR - fee)) / BigInt(FEE_DENOMINATOR);
    return (amountInAfterFee * reserveOut) / (reserveIn + amountInAfterFee);
  }

  quoteExactInputSingle(params: QuoteParams): bigint {
    const pool = this.requirePool(params.poolKey);
    const [reserveIn, reserveOut] = params.zeroForOne
      ? [pool.reserve0, pool.reserve1]
      : [pool.reserve1, pool.reserve0];
    return this.computeAmountOut(params.amountIn, reserveIn, reserveOut, pool.key.fee);
  }

  // ============================================
  // SWAPS
  // ============================================

  swapExactInputSingle(params: SwapParams): bigint {
    if (params.amountIn <= 0n) {
      throw new InvalidAmountError("amountIn", params.amountIn);
    }

    return this.runtime.atomic(() => {
      const pool = this.requirePool(params.poolKey);
      const poolId = toPoolId(params.poolKey);
      const { poolKey, zeroForOne, trader } = params;
      const currencyIn = zeroForOne ? poolKey.currency0 : poolKey.currency1;
      const currencyOut = zeroForOne ? poolKey.currency1 : poolKey.currency0;

      pool.hook?.beforeSwap(this.address, { poolKey, trader, zeroForOne, amountIn: params.amountIn });

      // Measure what actually arrived: the input currency may take a transfer tax
      const balanceBefore = this.currencies.balanceOf(currencyIn, this.address);
      this.currencies.transfer(currencyIn, params.payer, this.address, params.amountIn);
      const received = this.currencies.balanceOf(currencyIn, this.address) - balanceBefore;

      const [reserveIn, reserveOut] = zeroForOne
        ? [pool.reserve0, pool.reserve1]
        : [pool.reserve1, pool.reserve0];
      const amountOut = this.computeAmountOut(received, reserveIn, reserveOut, poolKey.fee);

      if (amountOut < params.minAmountOut || amountOut === 0n) {
        throw new InsufficientOutputError(amountOut, params.minAmountOut);
      }

      if (zeroForOne) {
        pool.reserve0 += received;
        pool.reserve1 -= amountOut;
      } else {
        pool.reserve1 += received;
        pool.reserve0 -= amountOut;
      }

      this.currencies.transfer(currencyOut, this.address, params.recipient, amountOut);

      pool.hook?.afterSwap(this.address, {
        poolKey,
        trader,
        zeroForOne,
        amountIn: params.amountIn,
        amountOut,
      });

      this.runtime.emitEvent({
        type: "Swap",
        poolId,
        trader,
        zeroForOne,
        amountIn: received,
        amountOut,
      });

      venueLogger.debug({
        poolId,
        trader,
        zeroForOne,
        amountIn: received.toString(),
        amountOut: amountOut.toString(),
      }, "Swap executed");

      return amountOut;
    });
  }

  // ============================================
  // LIQUIDITY
  // ============================================

  addLiquidity(params: AddLiquidityParams): AddLiquidityResult {
    const { poolKey, tickLower, tickUpper } = params;
    if (
      tickLower >= tickUpper ||
      !isUsableTick(tickLower, poolKey.tickSpacing) ||
      !isUsableTick(tickUpper, poolKey.tickSpacing)
    ) {
      throw new InvalidAmountError("tickRange", BigInt(tickUpper - tickLower));
    }

    return this.runtime.atomic(() => {
      const pool = this.requirePool(poolKey);
      const poolId = toPoolId(poolKey);

      let amount0Used = params.amount0Max;
      let amount1Used = params.amount1Max;
      if (pool.reserve0 > 0n && pool.reserve1 > 0n) {
        const amount1Needed = (params.amount0Max * pool.reserve1) / pool.reserve0;
        if (amount1Needed <= params.amount1Max) {
          amount1Used = amount1Needed;
        } else {
          amount0Used = (params.amount1Max * pool.reserve0) / pool.reserve1;
        }
      }

      if (amount0Used === 0n && amount1Used === 0n) {
        throw new InvalidAmountError("liquidity", 0n);
      }

      this.pull(poolKey.currency0, params.payer, amount0Used);
      this.pull(poolKey.currency1, params.payer, amount1Used);
      pool.reserve0 += amount0Used;
      pool.reserve1 += amount1Used;

      this.positions.push({
        poolId,
        owner: params.recipient,
        tickLower,
        tickUpper,
        amount0: amount0Used,
        amount1: amount1Used,
      });

      this.runtime.emitEvent({
        type: "LiquidityAdded",
        poolId,
        provider: params.recipient,
        amount0: amount0Used,
        amount1: amount1Used,
      });

      return { amount0Used, amount1Used };
    });
  }

  donate(poolKey: PoolKey, amount0: bigint, amount1: bigint, payer: Address): void {
    if (amount0 < 0n || amount1 < 0n) {
      throw new InvalidAmountError("donation", amount0 < 0n ? amount0 : amount1);
    }

    this.runtime.atomic(() => {
      const pool = this.requirePool(poolKey);
      this.pull(poolKey.currency0, payer, amount0);
      this.pull(poolKey.currency1, payer, amount1);
      pool.reserve0 += amount0;
      pool.reserve1 += amount1;

      this.runtime.emitEvent({ type: "Donate", poolId: toPoolId(poolKey), payer, amount0, amount1 });
    });
  }

  private pull(currency: Address, payer: Address, amount: bigint): void {
    if (amount > 0n) {
      this.currencies.transfer(currency, payer, this.address, amount);
    }
  }
}

// ============================================
// FACTORY
// ============================================

export function createInMemoryVenue(
  runtime: ChainRuntime,
  currencies: CurrencyBook,
  address: Address
): InMemoryVenue {
  return new InMemoryVenue(runtime, currencies, address);
}
