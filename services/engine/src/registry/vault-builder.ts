/**
 * Vault Builder
 *
 * Two-phase construction of a vault's component graph. The components refer
 * to each other (token -> router -> treasury -> token), so they are first
 * allocated at deterministic CREATE addresses derived from the registry and
 * its nonce, then linked in a single wire() step that freezes the handle.
 */

import { getContractAddress, type Address } from "viem";
import type { CreateVaultParams } from "@givevault/shared";
import { DonationForwarder } from "../donation/donation-forwarder.js";
import { LaunchGuard } from "../launch/launch-guard.js";
import { TaxRouter } from "../tax/tax-router.js";
import { FundraisingToken } from "../token/fundraising-token.js";
import { TreasuryController } from "../treasury/treasury-controller.js";
import { buildPoolKey, toPoolId } from "../venue/pool-key.js";
import type { VaultDirectory, VaultHandle, VaultRegistryOptions } from "./types.js";

const TOKEN_DECIMALS = 18;

// ============================================
// TYPES
// ============================================

export interface VaultAddresses {
  token: Address;
  treasury: Address;
  donationForwarder: Address;
  launchGuard: Address;
}

/**
 * Components constructed but not yet linked
 */
export interface VaultAllocation {
  params: CreateVaultParams;
  addresses: VaultAddresses;
  token: FundraisingToken;
  treasury: TreasuryController;
  donationForwarder: DonationForwarder;
  launchGuard: LaunchGuard;
  // Registry nonce to use for the next allocation
  nextNonce: number;
}

/**
 * CREATE address of the contract deployed by `from` at `nonce`
 */
export function deriveComponentAddress(from: Address, nonce: number): Address {
  return getContractAddress({ from, nonce: BigInt(nonce) });
}

// ============================================
// VAULT BUILDER
// ============================================

export class VaultBuilder {
  constructor(
    private readonly options: VaultRegistryOptions,
    private readonly directory: VaultDirectory
  ) {}

  allocate(params: CreateVaultParams, nonce: number): VaultAllocation {
    const { runtime, currencies, address: registry, scheduler, venue, quoter, positionManager } =
      this.options;

    const addresses: VaultAddresses = {
      token: deriveComponentAddress(registry, nonce),
      treasury: deriveComponentAddress(registry, nonce + 1),
      donationForwarder: deriveComponentAddress(registry, nonce + 2),
      launchGuard: deriveComponentAddress(registry, nonce + 3),
    };

    const token = new FundraisingToken(runtime, addresses.token, {
      name: params.name,
      symbol: params.symbol,
      decimals: TOKEN_DECIMALS,
    });

    const treasury = new TreasuryController({
      runtime,
      currencies,
      address: addresses.treasury,
      owner: params.owner,
      registry,
      scheduler,
      settings: params.treasury,
      venue,
      quoter,
      positionManager,
    });

    const donationForwarder = new DonationForwarder({
      runtime,
      currencies,
      address: addresses.donationForwarder,
      owner: params.owner,
      payoutAddress: params.payoutAddress,
      registry,
      scheduler,
      slippageFraction: params.treasury.slippageFraction,
      venue,
      quoter,
    });

    const launchGuard = new LaunchGuard(runtime, addresses.launchGuard, venue.address, params.launchGuard);

    return {
      params,
      addresses,
      token,
      treasury,
      donationForwarder,
      launchGuard,
      nextNonce: nonce + 4,
    };
  }

  /**
   * Inject cross references; every component accepts wiring exactly once
   */
  wire(allocation: VaultAllocation): VaultHandle {
    const { params, addresses, token, treasury, donationForwarder, launchGuard } = allocation;

    const taxRouter = new TaxRouter(
      params.taxPolicy,
      {
        liquidityManager: this.options.liquidityManager,
        treasury: addresses.treasury,
        donationForwarder: addresses.donationForwarder,
      },
      treasury,
      token
    );

    token.wire(taxRouter);
    treasury.wire({ token, donationForwarder: addresses.donationForwarder, directory: this.directory });
    donationForwarder.wire({ token, directory: this.directory });
    launchGuard.wire({ token: addresses.token, supply: token });
    this.options.currencies.register(token);

    const poolKey = buildPoolKey({
      token: addresses.token,
      pairedCurrency: params.pairedCurrency,
      fee: params.poolFee,
      tickSpacing: params.tickSpacing,
      hooks: addresses.launchGuard,
    });

    return Object.freeze({
      owner: params.owner,
      payoutAddress: params.payoutAddress,
      pairedCurrency: params.pairedCurrency,
      policy: params.taxPolicy,
      token,
      treasury,
      donationForwarder,
      launchGuard,
      taxRouter,
      poolKey,
      poolId: toPoolId(poolKey),
    });
  }
}
