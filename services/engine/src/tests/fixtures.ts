/**
 * Shared test world and vault builders
 */

import type { Address } from "viem";
import { PERCENT, ZERO_ADDRESS, type CreateVaultParamsInput } from "@givevault/shared";
import { TokenLedger } from "../chain/token-ledger.js";
import type { VaultHandle } from "../registry/types.js";
import { createLocalWorld, type LocalWorld } from "../world.js";

// ============================================
// ADDRESSES
// ============================================

export const OWNER: Address = "0x2000000000000000000000000000000000000001";
export const PAYOUT: Address = "0x2000000000000000000000000000000000000002";
export const FUNDER: Address = "0x2000000000000000000000000000000000000003";
export const HOLDER: Address = "0x4000000000000000000000000000000000000001";
export const TRADER: Address = "0x4000000000000000000000000000000000000002";
export const TRADER_2: Address = "0x4000000000000000000000000000000000000003";
export const STRANGER: Address = "0x4000000000000000000000000000000000000009";
export const PAIRED_TOKEN: Address = "0x3000000000000000000000000000000000000001";

export const START_BLOCK = 100;
export const START_TIMESTAMP = 1_700_000_000;
export const INITIAL_SUPPLY = 1_000_000_000n;
export const THIRTY_DAYS = 30 * 24 * 60 * 60;

// ============================================
// WORLD
// ============================================

export function createTestWorld(): LocalWorld {
  return createLocalWorld({
    startBlock: START_BLOCK,
    startTimestamp: START_TIMESTAMP,
    blockTimeSeconds: 2,
  });
}

/**
 * ERC-20 paired currency registered with the world's currency book
 */
export function createPairedToken(world: LocalWorld, address: Address = PAIRED_TOKEN): TokenLedger {
  const ledger = new TokenLedger(world.runtime, address, { name: "Paired", symbol: "PAIR", decimals: 18 });
  world.currencies.register(ledger);
  return ledger;
}

/**
 * Vault parameters with launch protection switched off
 */
export function vaultParams(overrides: Partial<CreateVaultParamsInput> = {}): CreateVaultParamsInput {
  return {
    owner: OWNER,
    payoutAddress: PAYOUT,
    pairedCurrency: ZERO_ADDRESS,
    name: "Test Cause Token",
    symbol: "CAUSE",
    initialSupply: INITIAL_SUPPLY,
    taxPolicy: {
      taxFeeFraction: 2n * PERCENT,
      maximumTreasuryFraction: 30n * PERCENT,
      minimumLiquidityTopUpFraction: 5n * PERCENT,
      configurableLPFraction: 1n * PERCENT,
    },
    launchGuard: {
      maxBuyFraction: 1n * PERCENT,
      cooldownDuration: 0,
      blocksToHold: 0,
      timeToHold: 0,
    },
    poolFee: 0,
    ...overrides,
  };
}

export function createTestVault(
  world: LocalWorld,
  overrides: Partial<CreateVaultParamsInput> = {}
): VaultHandle {
  return world.registry.createVault(world.addresses.admin, vaultParams(overrides));
}

/**
 * Fund the funder with the paired currency and seed the vault's pool
 */
export function seedLiquidity(
  world: LocalWorld,
  vault: VaultHandle,
  tokenAmount: bigint,
  pairedAmount: bigint,
  paired?: TokenLedger
): void {
  if (paired) {
    paired.mint(FUNDER, pairedAmount);
  } else {
    world.native.deal(FUNDER, pairedAmount);
  }
  world.registry.createLiquidity(world.addresses.admin, vault.owner, {
    tokenAmount,
    pairedAmount,
    funder: FUNDER,
  });
}

/**
 * The same account written in one letter case
 */
export function spelledAs(address: Address, letterCase: "lower" | "upper"): Address {
  const hex = address.slice(2);
  return `0x${letterCase === "lower" ? hex.toLowerCase() : hex.toUpperCase()}`;
}

/**
 * Pool reserves as (token side, paired side)
 */
export function poolSides(world: LocalWorld, vault: VaultHandle): { token: bigint; paired: bigint } {
  const reserves = world.venue.getReserves(vault.poolKey);
  return vault.poolKey.currency0 === vault.token.currency
    ? { token: reserves.reserve0, paired: reserves.reserve1 }
    : { token: reserves.reserve1, paired: reserves.reserve0 };
}
