/**
 * Treasury Controller Types
 */

import type { Address, Hex } from "viem";
import type { TreasurySettings } from "@givevault/shared";
import type { ChainRuntime } from "../chain/chain-runtime.js";
import type { CurrencyBook } from "../chain/currency-book.js";
import type { VaultDirectory } from "../registry/types.js";
import type { FundraisingToken } from "../token/fundraising-token.js";
import type { TreasuryDecision, UpkeepOutcome } from "../upkeep/types.js";
import type { PositionManager, QuotingService, TradingVenue } from "../venue/types.js";

export interface TreasuryControllerOptions {
  runtime: ChainRuntime;
  currencies: CurrencyBook;
  address: Address;
  owner: Address;
  registry: Address;
  scheduler: Address;
  settings: TreasurySettings;
  venue: TradingVenue;
  quoter: QuotingService;
  positionManager: PositionManager;
}

export interface TreasuryLinks {
  token: FundraisingToken;
  donationForwarder: Address;
  directory: VaultDirectory;
}

/**
 * Persisted treasury state (journaled)
 */
export interface TreasuryState {
  lastTransferTimestamp: number;
  paused: boolean;
}

export interface TransferAndBurnResult {
  recipient: Address;
  amountTransferred: bigint;
  amountBurned: bigint;
  timestamp: number;
}

export interface LiquidityTopUpResult {
  poolId: Hex;
  deficit: bigint;
  tokenSwapped: bigint;
  pairedReceived: bigint;
  amount0Used: bigint;
  amount1Used: bigint;
  dust0: bigint;
  dust1: bigint;
}

export interface TreasuryUpkeepOutcome extends UpkeepOutcome {
  transfer?: TransferAndBurnResult;
  topUp?: LiquidityTopUpResult;
}

export interface TreasuryStatus extends TreasuryState, TreasuryDecision {
  address: Address;
  globallyPaused: boolean;
  balance: bigint;
  treasuryFraction: bigint;
  lpHealthFraction: bigint;
  nextTransferAt: number;
  settings: TreasurySettings;
}
