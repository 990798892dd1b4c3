/**
 * Treasury Controller Tests
 *
 * Upkeep decision, transfer-and-burn cycle, liquidity top-up,
 * pause handling and all-or-nothing execution.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { isVaultError, PERCENT } from "@givevault/shared";
import { ChainRuntime } from "../chain/chain-runtime.js";
import { CurrencyBook } from "../chain/currency-book.js";
import { NativeBank } from "../chain/native-bank.js";
import type { VaultHandle } from "../registry/types.js";
import { VaultRegistry } from "../registry/vault-registry.js";
import { decodeTreasuryDecision, encodeTreasuryDecision } from "../upkeep/decision-codec.js";
import { InMemoryVenue } from "../venue/in-memory-venue.js";
import { DEFAULT_WORLD_ADDRESSES, type LocalWorld } from "../world.js";
import {
  createTestVault,
  createTestWorld,
  HOLDER,
  INITIAL_SUPPLY,
  poolSides,
  seedLiquidity,
  START_BLOCK,
  START_TIMESTAMP,
  STRANGER,
  THIRTY_DAYS,
  vaultParams,
} from "./fixtures.js";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("TreasuryController", () => {
  let world: LocalWorld;
  let vault: VaultHandle;
  let scheduler: LocalWorld["addresses"]["scheduler"];

  beforeEach(() => {
    world = createTestWorld();
    vault = createTestVault(world);
    scheduler = world.addresses.scheduler;
  });

  describe("Decision", () => {
    it("should not need upkeep right after creation", () => {
      seedLiquidity(world, vault, 100_000_000n, 1_000_000n);

      const check = vault.treasury.checkUpkeep();
      expect(check.upkeepNeeded).toBe(false);
      expect(decodeTreasuryDecision(check.performData)).toEqual({
        initiateTransfer: false,
        initiateLiquidityTopUp: false,
      });
    });

    it("should report zero pool health before liquidity exists without asking for a top-up", () => {
      expect(vault.treasury.lpHealthFraction()).toBe(0n);
      expect(vault.treasury.evaluateConditions().initiateLiquidityTopUp).toBe(false);
    });

    it("should become due one transfer interval after creation", () => {
      seedLiquidity(world, vault, 100_000_000n, 1_000_000n);

      world.runtime.advanceTime(THIRTY_DAYS - 1);
      expect(vault.treasury.evaluateConditions().initiateTransfer).toBe(false);

      world.runtime.advanceTime(1);
      expect(vault.treasury.checkUpkeep()).toEqual({
        upkeepNeeded: true,
        performData: encodeTreasuryDecision({ initiateTransfer: true, initiateLiquidityTopUp: false }),
      });
    });

    it("should hold transfers while the treasury is below its health threshold", () => {
      seedLiquidity(world, vault, 100_000_000n, 1_000_000n);
      // Treasury keeps 9% of supply
      vault.token.transfer(vault.treasury.address, HOLDER, 810_000_000n);
      world.runtime.advanceTime(THIRTY_DAYS);

      expect(vault.treasury.treasuryFraction()).toBe(9n * PERCENT);
      expect(vault.treasury.evaluateConditions().initiateTransfer).toBe(false);
    });

    it("should ask for a top-up when pool health drops below the target", () => {
      seedLiquidity(world, vault, 10_000_000n, 100_000n);

      expect(vault.treasury.lpHealthFraction()).toBe(1n * PERCENT);
      expect(vault.treasury.evaluateConditions()).toEqual({
        initiateTransfer: false,
        initiateLiquidityTopUp: true,
      });
    });

    it("should summarize its state", () => {
      seedLiquidity(world, vault, 100_000_000n, 1_000_000n);
      const status = vault.treasury.getStatus();

      expect(status.balance).toBe(900_000_000n);
      expect(status.treasuryFraction).toBe(90n * PERCENT);
      expect(status.lpHealthFraction).toBe(10n * PERCENT);
      expect(status.lastTransferTimestamp).toBe(START_TIMESTAMP);
      expect(status.nextTransferAt).toBe(START_TIMESTAMP + THIRTY_DAYS);
      expect(status.paused).toBe(false);
      expect(status.globallyPaused).toBe(false);
    });
  });

  describe("Transfer-and-burn", () => {
    beforeEach(() => {
      seedLiquidity(world, vault, 100_000_000n, 1_000_000n);
      world.runtime.advanceTime(THIRTY_DAYS);
    });

    it("should move 2% of supply to the forwarder and burn the same amount", () => {
      const supplyBefore = vault.token.totalSupply();
      const treasuryBefore = vault.treasury.balance();
      const { performData } = vault.treasury.checkUpkeep();
      const outcome = vault.treasury.performUpkeep(scheduler, performData);

      expect(outcome.performed).toBe(true);
      expect(outcome.actions).toEqual(["transfer-and-burn"]);
      expect(outcome.transfer).toEqual({
        recipient: vault.donationForwarder.address,
        amountTransferred: 20_000_000n,
        amountBurned: 20_000_000n,
        timestamp: START_TIMESTAMP + THIRTY_DAYS,
      });

      // Supply shrinks by the burn only; the treasury pays for both legs
      const burnAmount = 20_000_000n;
      expect(supplyBefore - vault.token.totalSupply()).toBe(burnAmount);
      expect(treasuryBefore - vault.treasury.balance()).toBe(2n * burnAmount);
      expect(vault.token.balanceOf(vault.donationForwarder.address)).toBe(burnAmount);
      expect(vault.token.balanceOf(vault.treasury.address)).toBe(860_000_000n);
      expect(vault.treasury.lastTransferTimestamp).toBe(START_TIMESTAMP + THIRTY_DAYS);
    });

    it("should emit a TransferAndBurn event stamped with the current block", () => {
      vault.treasury.performUpkeep(scheduler, vault.treasury.checkUpkeep().performData);

      const [entry] = world.runtime.getEventsOfType("TransferAndBurn");
      expect(entry?.blockNumber).toBe(START_BLOCK);
      expect(entry?.event).toEqual({
        type: "TransferAndBurn",
        treasury: vault.treasury.address,
        recipient: vault.donationForwarder.address,
        amountTransferred: 20_000_000n,
        amountBurned: 20_000_000n,
        timestamp: START_TIMESTAMP + THIRTY_DAYS,
      });
    });

    it("should not act twice on a stale decision", () => {
      const { performData } = vault.treasury.checkUpkeep();
      vault.treasury.performUpkeep(scheduler, performData);
      const events = world.runtime.eventCount;

      const second = vault.treasury.performUpkeep(scheduler, performData);

      expect(second).toEqual({ performed: false, actions: [] });
      expect(world.runtime.eventCount).toBe(events);
      expect(vault.token.totalSupply()).toBe(INITIAL_SUPPLY - 20_000_000n);
    });

    it("should only accept the scheduler", () => {
      const error = captureError(() =>
        vault.treasury.performUpkeep(STRANGER, vault.treasury.checkUpkeep().performData)
      );
      expect(isVaultError(error, "Unauthorized")).toBe(true);
      expect(vault.token.totalSupply()).toBe(INITIAL_SUPPLY);
    });

    it("should treat an all-false decision as a no-op", () => {
      const events = world.runtime.eventCount;
      const treasuryBefore = vault.treasury.balance();

      const outcome = vault.treasury.performUpkeep(
        scheduler,
        encodeTreasuryDecision({ initiateTransfer: false, initiateLiquidityTopUp: false })
      );

      expect(outcome).toEqual({ performed: false, actions: [] });
      expect(vault.token.totalSupply()).toBe(INITIAL_SUPPLY);
      expect(vault.treasury.balance()).toBe(treasuryBefore);
      expect(vault.token.balanceOf(vault.donationForwarder.address)).toBe(0n);
      expect(vault.treasury.lastTransferTimestamp).toBe(START_TIMESTAMP);
      expect(world.runtime.eventCount).toBe(events);
    });
  });

  describe("Liquidity top-up", () => {
    it("should swap half the deficit and deposit both sides, donating the dust", () => {
      seedLiquidity(world, vault, 10_000_000n, 100_000n);

      const outcome = vault.treasury.performUpkeep(scheduler, vault.treasury.checkUpkeep().performData);

      expect(outcome.actions).toEqual(["liquidity-top-up"]);
      expect(outcome.topUp).toEqual({
        poolId: vault.poolId,
        deficit: 40_000_000n,
        tokenSwapped: 20_000_000n,
        pairedReceived: 66_666n,
        amount0Used: 22_222n,
        amount1Used: 20_000_000n,
        dust0: 44_444n,
        dust1: 0n,
      });

      expect(poolSides(world, vault)).toEqual({ token: 50_000_000n, paired: 100_000n });
      expect(vault.token.balanceOf(vault.treasury.address)).toBe(950_000_000n);
      expect(world.native.balanceOf(vault.treasury.address)).toBe(0n);
      expect(vault.treasury.lpHealthFraction()).toBe(5n * PERCENT);
      expect(vault.treasury.checkUpkeep().upkeepNeeded).toBe(false);
    });

    it("should run the top-up after the transfer, against the reduced supply", () => {
      seedLiquidity(world, vault, 10_000_000n, 100_000n);
      world.runtime.advanceTime(THIRTY_DAYS);

      const check = vault.treasury.checkUpkeep();
      expect(decodeTreasuryDecision(check.performData)).toEqual({
        initiateTransfer: true,
        initiateLiquidityTopUp: true,
      });

      const outcome = vault.treasury.performUpkeep(scheduler, check.performData);

      expect(outcome.actions).toEqual(["transfer-and-burn", "liquidity-top-up"]);
      expect(outcome.topUp?.deficit).toBe(39_000_000n);
      // 5% of the 980M supply left after the burn
      expect(poolSides(world, vault).token).toBe(49_000_000n);
    });
  });

  describe("Atomic execution", () => {
    it("should roll back the transfer when the top-up swap falls short", () => {
      const runtime = new ChainRuntime({ startBlock: START_BLOCK, startTimestamp: START_TIMESTAMP });
      const native = new NativeBank(runtime);
      const currencies = new CurrencyBook(native);
      const venue = new InMemoryVenue(runtime, currencies, DEFAULT_WORLD_ADDRESSES.venue);
      const registry = new VaultRegistry({
        runtime,
        currencies,
        address: DEFAULT_WORLD_ADDRESSES.registry,
        admin: DEFAULT_WORLD_ADDRESSES.admin,
        scheduler: DEFAULT_WORLD_ADDRESSES.scheduler,
        liquidityManager: DEFAULT_WORLD_ADDRESSES.liquidityManager,
        venue,
        // Promises twice what the pool pays, so the slippage floor is never met
        quoter: { quoteExactInputSingle: (params) => venue.quoteExactInputSingle(params) * 2n },
        positionManager: venue,
      });

      const handle = registry.createVault(DEFAULT_WORLD_ADDRESSES.admin, vaultParams());
      native.deal(DEFAULT_WORLD_ADDRESSES.admin, 100_000n);
      registry.createLiquidity(DEFAULT_WORLD_ADDRESSES.admin, handle.owner, {
        tokenAmount: 10_000_000n,
        pairedAmount: 100_000n,
        funder: DEFAULT_WORLD_ADDRESSES.admin,
      });
      runtime.advanceTime(THIRTY_DAYS);
      const events = runtime.eventCount;

      const error = captureError(() =>
        handle.treasury.performUpkeep(DEFAULT_WORLD_ADDRESSES.scheduler, handle.treasury.checkUpkeep().performData)
      );

      expect(isVaultError(error, "InsufficientOutput")).toBe(true);
      expect(handle.token.totalSupply()).toBe(INITIAL_SUPPLY);
      expect(handle.token.balanceOf(handle.donationForwarder.address)).toBe(0n);
      expect(handle.treasury.lastTransferTimestamp).toBe(START_TIMESTAMP);
      expect(runtime.eventCount).toBe(events);
    });
  });

  describe("Pause", () => {
    beforeEach(() => {
      seedLiquidity(world, vault, 10_000_000n, 100_000n);
      world.runtime.advanceTime(THIRTY_DAYS);
    });

    it("should stop asking for upkeep while paused", () => {
      world.registry.setVaultPause(world.addresses.admin, vault.owner, true);

      expect(vault.treasury.checkUpkeep()).toEqual({
        upkeepNeeded: false,
        performData: encodeTreasuryDecision({ initiateTransfer: false, initiateLiquidityTopUp: false }),
      });
    });

    it("should ignore a decision taken before the pause", () => {
      const { performData } = vault.treasury.checkUpkeep();
      world.registry.setGlobalPause(world.addresses.admin, true);

      expect(vault.treasury.performUpkeep(scheduler, performData)).toEqual({ performed: false, actions: [] });
      expect(vault.token.totalSupply()).toBe(INITIAL_SUPPLY);
    });

    it("should only accept pause changes from the registry", () => {
      expect(isVaultError(captureError(() => vault.treasury.setPause(STRANGER, true)), "Unauthorized")).toBe(true);
    });

    it("should refuse to set the same pause state twice", () => {
      vault.treasury.setPause(world.addresses.registry, true);
      expect(isVaultError(captureError(() => vault.treasury.setPause(world.addresses.registry, true)), "AlreadySet")).toBe(true);
    });
  });

  describe("Emergency withdrawal", () => {
    it("should require the treasury to be paused", () => {
      const error = captureError(() => vault.treasury.emergencyWithdraw(world.addresses.registry, HOLDER));
      expect(isVaultError(error, "NotPaused")).toBe(true);
    });

    it("should accept the global pause in place of its own", () => {
      world.registry.setGlobalPause(world.addresses.admin, true);

      const amount = vault.treasury.emergencyWithdraw(world.addresses.registry, HOLDER);

      expect(amount).toBe(INITIAL_SUPPLY);
      expect(vault.token.balanceOf(HOLDER)).toBe(INITIAL_SUPPLY);
    });

    it("should move the full balance out while paused", () => {
      vault.treasury.setPause(world.addresses.registry, true);

      const amount = vault.treasury.emergencyWithdraw(world.addresses.registry, HOLDER);

      expect(amount).toBe(INITIAL_SUPPLY);
      expect(vault.token.balanceOf(HOLDER)).toBe(INITIAL_SUPPLY);
      expect(vault.token.balanceOf(vault.treasury.address)).toBe(0n);
    });
  });
});
