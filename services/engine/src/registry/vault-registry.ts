/**
 * Vault Registry
 *
 * Factory and directory for per-owner vaults. Creates and wires the component
 * graph, seeds the initial pool, answers the lookups the treasury and the
 * donation forwarder depend on, and holds the global pause switch.
 */

import type { Address, Hex } from "viem";
import {
  engineLogger as logger,
  audit,
  AlreadySetError,
  createLiquidityParamsSchema,
  createVaultParamsSchema,
  DuplicateVaultError,
  InvalidAddressError,
  normalizeAddress,
  PoolAlreadyExistsError,
  sameAddress,
  UnauthorizedError,
  VaultNotFoundError,
  ZERO_ADDRESS,
  type CreateLiquidityParamsInput,
  type CreateVaultParamsInput,
} from "@givevault/shared";
import type { ChainRuntime } from "../chain/chain-runtime.js";
import type { Journaled } from "../chain/types.js";
import { fullRangeTicks } from "../math/threshold-math.js";
import type { UpkeepTarget } from "../upkeep/types.js";
import { isCurrency0 } from "../venue/pool-key.js";
import type { PoolKey } from "../venue/types.js";
import type { VaultDirectory, VaultHandle, VaultRegistryOptions, VaultSummary } from "./types.js";
import { parseOrThrow } from "./validation.js";
import { VaultBuilder } from "./vault-builder.js";

const registryLogger = logger.child({ component: "vault-registry" });

// ============================================
// TYPES
// ============================================

interface VaultRecord {
  handle: VaultHandle;
  isLPCreated: boolean;
}

interface RegistryState {
  records: Map<Address, VaultRecord>;
  globalPaused: boolean;
  nonce: number;
}

export interface EmergencyWithdrawalResult {
  treasury: bigint;
  donationForwarder: bigint;
}

// ============================================
// VAULT REGISTRY
// ============================================

export class VaultRegistry implements VaultDirectory, Journaled<RegistryState> {
  readonly address: Address;
  readonly admin: Address;
  readonly scheduler: Address;

  private readonly runtime: ChainRuntime;
  private readonly options: VaultRegistryOptions;
  private readonly builder: VaultBuilder;

  // Keyed by the owner's checksummed address
  private records: Map<Address, VaultRecord> = new Map();
  private globalPaused = false;
  // CREATE nonce for component addresses; starts at 1 like a fresh contract
  private nonce = 1;

  constructor(options: VaultRegistryOptions) {
    const required: Array<[string, Address]> = [
      ["address", options.address],
      ["admin", options.admin],
      ["scheduler", options.scheduler],
      ["liquidityManager", options.liquidityManager],
      ["venue", options.venue.address],
    ];
    for (const [field, value] of required) {
      if (value === ZERO_ADDRESS) {
        throw new InvalidAddressError(field, value);
      }
    }

    this.options = options;
    this.runtime = options.runtime;
    this.address = normalizeAddress(options.address, "address");
    this.admin = normalizeAddress(options.admin, "admin");
    this.scheduler = normalizeAddress(options.scheduler, "scheduler");
    this.builder = new VaultBuilder(options, this);
    this.runtime.track(this);
  }

  captureState(): RegistryState {
    const records = new Map<Address, VaultRecord>();
    for (const [owner, record] of this.records) {
      records.set(owner, { ...record });
    }
    return { records, globalPaused: this.globalPaused, nonce: this.nonce };
  }

  restoreState(state: RegistryState): void {
    this.records = state.records;
    this.globalPaused = state.globalPaused;
    this.nonce = state.nonce;
  }

  // ============================================
  // VAULT CREATION
  // ============================================

  createVault(caller: Address, input: CreateVaultParamsInput): VaultHandle {
    this.requireAdmin(caller);
    const params = parseOrThrow(createVaultParamsSchema, input, "vault parameters");

    if (this.records.has(params.owner)) {
      throw new DuplicateVaultError(params.owner);
    }
    if (!this.options.currencies.has(params.pairedCurrency)) {
      throw new InvalidAddressError("pairedCurrency", params.pairedCurrency);
    }

    const handle = this.runtime.atomic(() => {
      const allocation = this.builder.allocate(params, this.nonce);
      this.nonce = allocation.nextNonce;
      const built = this.builder.wire(allocation);

      built.token.mint(built.treasury.address, params.initialSupply);
      this.records.set(params.owner, { handle: built, isLPCreated: false });

      this.runtime.emitEvent({
        type: "VaultCreated",
        owner: built.owner,
        token: built.token.currency,
        treasury: built.treasury.address,
        donationForwarder: built.donationForwarder.address,
        launchGuard: built.launchGuard.address,
      });
      return built;
    });

    registryLogger.info({
      owner: handle.owner,
      token: handle.token.currency,
      poolId: handle.poolId,
      initialSupply: params.initialSupply.toString(),
    }, "Vault created");

    audit({
      action: "vault.create",
      entityType: "vault",
      entityId: handle.owner,
      actor: caller,
      details: { token: handle.token.currency, symbol: params.symbol },
    });

    return handle;
  }

  /**
   * Initialize the vault's pool and seed it from the treasury (tokens)
   * and a funder (paired currency). Runs at most once per vault.
   */
  createLiquidity(caller: Address, owner: Address, input: CreateLiquidityParamsInput): Hex {
    this.requireAdmin(caller);
    const params = parseOrThrow(createLiquidityParamsSchema, input, "liquidity parameters");
    const record = this.requireRecord(owner);
    const { handle } = record;
    const { venue, positionManager, currencies } = this.options;

    if (record.isLPCreated || venue.hasPool(handle.poolKey)) {
      throw new PoolAlreadyExistsError(handle.poolId);
    }

    this.runtime.atomic(() => {
      venue.initializePool(handle.poolKey, handle.launchGuard);

      // The position is funded from the treasury; bring the paired side there first
      const treasury = handle.treasury.address;
      currencies.transfer(handle.pairedCurrency, params.funder, treasury, params.pairedAmount);

      const tokenIsCurrency0 = isCurrency0(handle.poolKey, handle.token.currency);
      const { tickLower, tickUpper } = fullRangeTicks(handle.poolKey.tickSpacing);
      positionManager.addLiquidity({
        poolKey: handle.poolKey,
        amount0Max: tokenIsCurrency0 ? params.tokenAmount : params.pairedAmount,
        amount1Max: tokenIsCurrency0 ? params.pairedAmount : params.tokenAmount,
        tickLower,
        tickUpper,
        payer: treasury,
        recipient: this.address,
      });

      this.records.set(handle.owner, { ...record, isLPCreated: true });
      this.runtime.emitEvent({
        type: "LiquidityCreated",
        owner: handle.owner,
        poolId: handle.poolId,
        tokenAmount: params.tokenAmount,
        pairedAmount: params.pairedAmount,
      });
    });

    registryLogger.info({
      owner: handle.owner,
      poolId: handle.poolId,
      tokenAmount: params.tokenAmount.toString(),
      pairedAmount: params.pairedAmount.toString(),
    }, "Initial liquidity created");

    audit({
      action: "vault.createLiquidity",
      entityType: "pool",
      entityId: handle.poolId,
      actor: caller,
      details: { owner: handle.owner, funder: params.funder },
    });

    return handle.poolId;
  }

  // ============================================
  // LOOKUPS
  // ============================================

  getVault(owner: Address): VaultHandle {
    return this.requireRecord(owner).handle;
  }

  hasVault(owner: Address): boolean {
    return this.records.has(normalizeAddress(owner, "owner"));
  }

  getPoolKey(owner: Address): PoolKey {
    return this.requireRecord(owner).handle.poolKey;
  }

  getPoolId(owner: Address): Hex {
    return this.requireRecord(owner).handle.poolId;
  }

  isLiquidityCreated(owner: Address): boolean {
    return this.records.get(normalizeAddress(owner, "owner"))?.isLPCreated ?? false;
  }

  isGloballyPaused(): boolean {
    return this.globalPaused;
  }

  listVaults(): VaultSummary[] {
    return [...this.records.values()].map(({ handle, isLPCreated }) => ({
      owner: handle.owner,
      token: handle.token.currency,
      pairedCurrency: handle.pairedCurrency,
      treasury: handle.treasury.address,
      donationForwarder: handle.donationForwarder.address,
      launchGuard: handle.launchGuard.address,
      poolId: handle.poolId,
      isLPCreated,
    }));
  }

  /**
   * Every component the scheduler should poll, in creation order
   */
  upkeepTargets(): UpkeepTarget[] {
    const targets: UpkeepTarget[] = [];
    for (const { handle } of this.records.values()) {
      targets.push(handle.treasury, handle.donationForwarder);
    }
    return targets;
  }

  // ============================================
  // PAUSE CONTROL
  // ============================================

  setVaultPause(caller: Address, owner: Address, paused: boolean): void {
    this.requireAdmin(caller);
    const { handle } = this.requireRecord(owner);
    this.runtime.atomic(() => {
      handle.treasury.setPause(this.address, paused);
      handle.donationForwarder.setPause(this.address, paused);
    });
    audit({
      action: paused ? "vault.pause" : "vault.unpause",
      entityType: "vault",
      entityId: handle.owner,
      actor: caller,
    });
  }

  setGlobalPause(caller: Address, paused: boolean): void {
    this.requireAdmin(caller);
    if (this.globalPaused === paused) {
      throw new AlreadySetError("global pause", paused);
    }
    this.runtime.atomic(() => {
      this.globalPaused = paused;
      this.runtime.emitEvent({ type: "GlobalPauseChanged", paused });
    });
    registryLogger.warn({ paused }, "Global pause changed");
    audit({
      action: paused ? "registry.pause" : "registry.unpause",
      entityType: "registry",
      entityId: this.address,
      actor: caller,
    });
  }

  /**
   * Drain a paused vault's treasury and forwarder token balances to `recipient`
   */
  emergencyWithdraw(caller: Address, owner: Address, recipient: Address): EmergencyWithdrawalResult {
    this.requireAdmin(caller);
    const { handle } = this.requireRecord(owner);
    const result = this.runtime.atomic(() => ({
      treasury: handle.treasury.emergencyWithdraw(this.address, recipient),
      donationForwarder: handle.donationForwarder.emergencyWithdraw(this.address, recipient),
    }));
    audit({
      action: "vault.emergencyWithdraw",
      entityType: "vault",
      entityId: handle.owner,
      actor: caller,
      details: {
        recipient,
        treasury: result.treasury.toString(),
        donationForwarder: result.donationForwarder.toString(),
      },
    });
    return result;
  }

  // ============================================
  // GUARDS
  // ============================================

  private requireAdmin(caller: Address): void {
    if (!sameAddress(caller, this.admin)) {
      throw new UnauthorizedError(caller, "registry admin");
    }
  }

  private requireRecord(owner: Address): VaultRecord {
    const record = this.records.get(normalizeAddress(owner, "owner"));
    if (!record) {
      throw new VaultNotFoundError(owner);
    }
    return record;
  }
}

// ============================================
// FACTORY
// ============================================

export function createVaultRegistry(options: VaultRegistryOptions): VaultRegistry {
  return new VaultRegistry(options);
}
