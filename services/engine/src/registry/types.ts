/**
 * Vault Registry Types
 */

import type { Address, Hex } from "viem";
import type { TaxPolicy } from "@givevault/shared";
import type { CurrencyBook } from "../chain/currency-book.js";
import type { ChainRuntime } from "../chain/chain-runtime.js";
import type { DonationForwarder } from "../donation/donation-forwarder.js";
import type { LaunchGuard } from "../launch/launch-guard.js";
import type { TaxRouter } from "../tax/tax-router.js";
import type { FundraisingToken } from "../token/fundraising-token.js";
import type { TreasuryController } from "../treasury/treasury-controller.js";
import type { PoolKey, PositionManager, QuotingService, TradingVenue } from "../venue/types.js";

// ============================================
// DIRECTORY (consumed by treasury / forwarder)
// ============================================

/**
 * Lookups the registry offers to the components it wires
 */
export interface VaultDirectory {
  readonly address: Address;
  isGloballyPaused(): boolean;
  isLiquidityCreated(owner: Address): boolean;
  getPoolKey(owner: Address): PoolKey;
}

// ============================================
// VAULT HANDLE
// ============================================

/**
 * Fully linked set of components for one non-profit owner. Immutable once built.
 */
export interface VaultHandle {
  readonly owner: Address;
  readonly payoutAddress: Address;
  readonly pairedCurrency: Address;
  readonly policy: TaxPolicy;
  readonly token: FundraisingToken;
  readonly treasury: TreasuryController;
  readonly donationForwarder: DonationForwarder;
  readonly launchGuard: LaunchGuard;
  readonly taxRouter: TaxRouter;
  readonly poolKey: PoolKey;
  readonly poolId: Hex;
}

/**
 * Read-only projection of a vault, as listed by the registry
 */
export interface VaultSummary {
  owner: Address;
  token: Address;
  pairedCurrency: Address;
  treasury: Address;
  donationForwarder: Address;
  launchGuard: Address;
  poolId: Hex;
  isLPCreated: boolean;
}

// ============================================
// REGISTRY CONFIGURATION
// ============================================

export interface VaultRegistryOptions {
  runtime: ChainRuntime;
  currencies: CurrencyBook;
  address: Address;
  // Factory identity allowed to create vaults and toggle pauses
  admin: Address;
  // Identity of the external scheduler allowed to perform upkeep
  scheduler: Address;
  // System address receiving the liquidity-support share of the tax
  liquidityManager: Address;
  venue: TradingVenue;
  quoter: QuotingService;
  positionManager: PositionManager;
}
