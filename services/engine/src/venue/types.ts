/**
 * Trading Venue Capabilities
 *
 * The decision engine treats the AMM as an opaque collaborator. These are the
 * contracts it consumes (venue, quoter, position manager) and the hook
 * contract it exposes to the venue (launch protection).
 */

import type { Address, Hex } from "viem";

// ============================================
// POOL IDENTIFIER
// ============================================

/**
 * currency0 < currency1 (numeric order). The zero address is the native currency.
 */
export interface PoolKey {
  currency0: Address;
  currency1: Address;
  fee: number; // pips, 1_000_000 = 100%
  tickSpacing: number;
  hooks: Address;
}

export interface PoolReserves {
  reserve0: bigint;
  reserve1: bigint;
}

// ============================================
// SWAPS
// ============================================

export interface SwapParams {
  poolKey: PoolKey;
  zeroForOne: boolean;
  amountIn: bigint;
  minAmountOut: bigint;
  payer: Address;
  recipient: Address;
  // Identity the launch guard attributes the trade to
  trader: Address;
}

export interface QuoteParams {
  poolKey: PoolKey;
  zeroForOne: boolean;
  amountIn: bigint;
}

// ============================================
// LIQUIDITY
// ============================================

export interface AddLiquidityParams {
  poolKey: PoolKey;
  amount0Max: bigint;
  amount1Max: bigint;
  tickLower: number;
  tickUpper: number;
  payer: Address;
  recipient: Address;
}

export interface AddLiquidityResult {
  amount0Used: bigint;
  amount1Used: bigint;
}

// ============================================
// HOOKS
// ============================================

export interface BeforeSwapContext {
  poolKey: PoolKey;
  trader: Address;
  zeroForOne: boolean;
  amountIn: bigint;
}

export interface AfterSwapContext extends BeforeSwapContext {
  amountOut: bigint;
}

/**
 * Called by the venue around every swap on a pool whose key names the hook.
 * Throwing aborts the swap.
 */
export interface SwapHook {
  readonly address: Address;
  beforeSwap(caller: Address, context: BeforeSwapContext): void;
  afterSwap(caller: Address, context: AfterSwapContext): void;
}

// ============================================
// CAPABILITY INTERFACES
// ============================================

export interface TradingVenue {
  readonly address: Address;

  hasPool(poolKey: PoolKey): boolean;

  /**
   * Register a pool. Throws PoolAlreadyExistsError if it is already known.
   */
  initializePool(poolKey: PoolKey, hook?: SwapHook): Hex;

  getReserves(poolKey: PoolKey): PoolReserves;

  /**
   * Swap an exact input amount. Throws InsufficientOutputError below minAmountOut.
   */
  swapExactInputSingle(params: SwapParams): bigint;

  /**
   * Gift balances to the pool without receiving a position
   */
  donate(poolKey: PoolKey, amount0: bigint, amount1: bigint, payer: Address): void;
}

export interface QuotingService {
  quoteExactInputSingle(params: QuoteParams): bigint;
}

export interface PositionManager {
  addLiquidity(params: AddLiquidityParams): AddLiquidityResult;
}
