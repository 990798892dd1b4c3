/**
 * Chain Types
 *
 * Journaling contract for stateful components, balance ledgers and the
 * observable events committed by the runtime.
 */

import type { Address, Hex } from "viem";

// ============================================
// JOURNALING
// ============================================

/**
 * A component whose state can be captured before a unit of work and
 * restored if that unit reverts.
 */
export interface Journaled<TState> {
  captureState(): TState;
  restoreState(state: TState): void;
}

// ============================================
// BALANCES
// ============================================

/**
 * Anything that holds balances of one currency (ERC-20 ledger or native bank)
 */
export interface BalanceLedger {
  readonly currency: Address;
  balanceOf(account: Address): bigint;
  transfer(from: Address, to: Address, amount: bigint): void;
}

// ============================================
// EVENTS
// ============================================

export type EngineEvent =
  | { type: "Transfer"; token: Address; from: Address; to: Address; amount: bigint }
  | { type: "NativeTransfer"; from: Address; to: Address; amount: bigint }
  | {
      type: "TaxRouted";
      token: Address;
      from: Address;
      to: Address;
      amount: bigint;
      netAmount: bigint;
      toLiquidity: bigint;
      toTreasury: bigint;
    }
  | {
      type: "TransferAndBurn";
      treasury: Address;
      recipient: Address;
      amountTransferred: bigint;
      amountBurned: bigint;
      timestamp: number;
    }
  | {
      type: "LiquidityToppedUp";
      treasury: Address;
      poolId: Hex;
      tokenSwapped: bigint;
      pairedReceived: bigint;
      amount0Used: bigint;
      amount1Used: bigint;
      dust0: bigint;
      dust1: bigint;
    }
  | {
      type: "DonationForwarded";
      forwarder: Address;
      recipient: Address;
      currency: Address;
      amountIn: bigint;
      amountOut: bigint;
    }
  | {
      type: "Swap";
      poolId: Hex;
      trader: Address;
      zeroForOne: boolean;
      amountIn: bigint;
      amountOut: bigint;
    }
  | { type: "LiquidityAdded"; poolId: Hex; provider: Address; amount0: bigint; amount1: bigint }
  | { type: "Donate"; poolId: Hex; payer: Address; amount0: bigint; amount1: bigint }
  | { type: "PoolInitialized"; poolId: Hex; currency0: Address; currency1: Address; hooks: Address }
  | { type: "PauseChanged"; component: Address; paused: boolean }
  | { type: "GlobalPauseChanged"; paused: boolean }
  | {
      type: "VaultCreated";
      owner: Address;
      token: Address;
      treasury: Address;
      donationForwarder: Address;
      launchGuard: Address;
    }
  | { type: "LiquidityCreated"; owner: Address; poolId: Hex; tokenAmount: bigint; pairedAmount: bigint }
  | { type: "EmergencyWithdrawal"; component: Address; recipient: Address; currency: Address; amount: bigint };

export type EngineEventType = EngineEvent["type"];

export type EngineEventOf<T extends EngineEventType> = Extract<EngineEvent, { type: T }>;

/**
 * Event as committed to the log
 */
export interface LoggedEvent<TEvent extends EngineEvent = EngineEvent> {
  index: number;
  blockNumber: number;
  timestamp: number;
  event: TEvent;
}
