/**
 * Donation Forwarder Tests
 *
 * Pool: 100M tokens / 1M paired, no fee. The forwarder holds 20M tokens,
 * which sell for 20M * 1M / 120M = 166_666 paired units.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { isVaultError, ZERO_ADDRESS } from "@givevault/shared";
import type { TokenLedger } from "../chain/token-ledger.js";
import type { VaultHandle } from "../registry/types.js";
import type { LocalWorld } from "../world.js";
import {
  createPairedToken,
  createTestVault,
  createTestWorld,
  HOLDER,
  PAIRED_TOKEN,
  PAYOUT,
  poolSides,
  seedLiquidity,
  STRANGER,
} from "./fixtures.js";

const PENDING = 20_000_000n;
const EXPECTED_OUT = 166_666n;

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("DonationForwarder", () => {
  let world: LocalWorld;
  let vault: VaultHandle;
  let scheduler: LocalWorld["addresses"]["scheduler"];

  describe("with a native-currency pool", () => {
    beforeEach(() => {
      world = createTestWorld();
      scheduler = world.addresses.scheduler;
      vault = createTestVault(world);
      seedLiquidity(world, vault, 100_000_000n, 1_000_000n);
      vault.token.transfer(vault.treasury.address, vault.donationForwarder.address, PENDING);
    });

    it("should need upkeep while it holds tokens", () => {
      expect(vault.donationForwarder.checkUpkeep()).toEqual({ upkeepNeeded: true, performData: "0x" });
    });

    it("should sell the whole balance and forward the proceeds to the payout address", () => {
      const outcome = vault.donationForwarder.performUpkeep(scheduler, "0x");

      expect(outcome).toEqual({
        performed: true,
        actions: ["forward-donation"],
        donation: {
          recipient: PAYOUT,
          currency: ZERO_ADDRESS,
          amountIn: PENDING,
          amountOut: EXPECTED_OUT,
        },
      });
      expect(world.native.balanceOf(PAYOUT)).toBe(EXPECTED_OUT);
      expect(world.native.balanceOf(vault.donationForwarder.address)).toBe(0n);
      expect(vault.token.balanceOf(vault.donationForwarder.address)).toBe(0n);
      expect(poolSides(world, vault)).toEqual({ token: 120_000_000n, paired: 1_000_000n - EXPECTED_OUT });
      expect(vault.donationForwarder.checkUpkeep().upkeepNeeded).toBe(false);
    });

    it("should emit DonationForwarded", () => {
      vault.donationForwarder.performUpkeep(scheduler, "0x");

      const [entry] = world.runtime.getEventsOfType("DonationForwarded");
      expect(entry?.event).toEqual({
        type: "DonationForwarded",
        forwarder: vault.donationForwarder.address,
        recipient: PAYOUT,
        currency: ZERO_ADDRESS,
        amountIn: PENDING,
        amountOut: EXPECTED_OUT,
      });
    });

    it("should include paired currency already sitting on the forwarder", () => {
      world.native.deal(vault.donationForwarder.address, 500n);

      const outcome = vault.donationForwarder.performUpkeep(scheduler, "0x");

      expect(outcome.donation?.amountOut).toBe(EXPECTED_OUT + 500n);
      expect(world.native.balanceOf(PAYOUT)).toBe(EXPECTED_OUT + 500n);
    });

    it("should roll everything back when the payout address rejects value", () => {
      world.native.setReceiveHandler(PAYOUT, () => false);
      const reservesBefore = world.venue.getReserves(vault.poolKey);

      const error = captureError(() => vault.donationForwarder.performUpkeep(scheduler, "0x"));

      expect(isVaultError(error, "TransferFailed")).toBe(true);
      expect(vault.token.balanceOf(vault.donationForwarder.address)).toBe(PENDING);
      expect(world.venue.getReserves(vault.poolKey)).toEqual(reservesBefore);
      expect(world.native.balanceOf(PAYOUT)).toBe(0n);
      expect(world.runtime.getEventsOfType("DonationForwarded")).toHaveLength(0);
    });

    it("should only accept the scheduler", () => {
      const error = captureError(() => vault.donationForwarder.performUpkeep(STRANGER, "0x"));
      expect(isVaultError(error, "Unauthorized")).toBe(true);
    });

    it("should do nothing while paused", () => {
      world.registry.setVaultPause(world.addresses.admin, vault.owner, true);

      expect(vault.donationForwarder.checkUpkeep().upkeepNeeded).toBe(false);
      expect(vault.donationForwarder.performUpkeep(scheduler, "0x")).toEqual({ performed: false, actions: [] });
      expect(vault.token.balanceOf(vault.donationForwarder.address)).toBe(PENDING);
    });

    it("should release its balance through an emergency withdrawal while paused", () => {
      const registry = world.addresses.registry;
      expect(isVaultError(captureError(() => vault.donationForwarder.emergencyWithdraw(registry, HOLDER)), "NotPaused")).toBe(true);

      vault.donationForwarder.setPause(registry, true);
      expect(vault.donationForwarder.emergencyWithdraw(registry, HOLDER)).toBe(PENDING);
      expect(vault.token.balanceOf(HOLDER)).toBe(PENDING);
    });
  });

  describe("with an ERC-20 paired pool", () => {
    let paired: TokenLedger;

    beforeEach(() => {
      world = createTestWorld();
      scheduler = world.addresses.scheduler;
      paired = createPairedToken(world);
      vault = createTestVault(world, { pairedCurrency: PAIRED_TOKEN });
      seedLiquidity(world, vault, 100_000_000n, 1_000_000n, paired);
      vault.token.transfer(vault.treasury.address, vault.donationForwarder.address, PENDING);
    });

    it("should forward the paired token to the payout address", () => {
      const outcome = vault.donationForwarder.performUpkeep(scheduler, "0x");

      expect(outcome.donation).toEqual({
        recipient: PAYOUT,
        currency: PAIRED_TOKEN,
        amountIn: PENDING,
        amountOut: EXPECTED_OUT,
      });
      expect(paired.balanceOf(PAYOUT)).toBe(EXPECTED_OUT);
      expect(paired.balanceOf(vault.donationForwarder.address)).toBe(0n);
    });
  });

  describe("before liquidity exists", () => {
    it("should not ask for upkeep", () => {
      world = createTestWorld();
      vault = createTestVault(world);
      vault.token.transfer(vault.treasury.address, vault.donationForwarder.address, PENDING);

      expect(vault.donationForwarder.checkUpkeep().upkeepNeeded).toBe(false);
    });
  });
});
