/**
 * Threshold Math Tests
 */

import { describe, it, expect } from "vitest";
import { InvalidAmountError, isVaultError, PERCENT, WAD } from "@givevault/shared";
import {
  clampSub,
  fractionOf,
  fractionOfSupply,
  fullRangeTicks,
  isUsableTick,
  maxUsableTick,
  minAmountOut,
  minBigInt,
  minUsableTick,
  mulFraction,
} from "../math/threshold-math.js";

describe("ThresholdMath", () => {
  describe("mulFraction", () => {
    it("should scale an amount by a WAD fraction", () => {
      expect(mulFraction(1000n, 2n * PERCENT)).toBe(20n);
      expect(mulFraction(1_000_000_000n, 2n * PERCENT)).toBe(20_000_000n);
    });

    it("should round down", () => {
      expect(mulFraction(49n, 2n * PERCENT)).toBe(0n);
      expect(mulFraction(50n, 2n * PERCENT)).toBe(1n);
      expect(mulFraction(99n, PERCENT)).toBe(0n);
    });

    it("should return the amount for a full fraction and zero for none", () => {
      expect(mulFraction(12345n, WAD)).toBe(12345n);
      expect(mulFraction(12345n, 0n)).toBe(0n);
    });

    it("should reject negative inputs", () => {
      expect(() => mulFraction(-1n, PERCENT)).toThrowError(/Invalid amount for amount/);
      expect(() => mulFraction(1n, -1n)).toThrowError(/Invalid amount for fraction/);
    });
  });

  describe("fractionOf", () => {
    it("should express a part of a whole in WAD", () => {
      expect(fractionOf(100_000_000n, 1_000_000_000n)).toBe(10n * PERCENT);
      expect(fractionOfSupply(300n, 1000n)).toBe(30n * PERCENT);
    });

    it("should read an empty whole as zero", () => {
      expect(fractionOf(5n, 0n)).toBe(0n);
    });
  });

  describe("minAmountOut", () => {
    it("should subtract the slippage share of the quote", () => {
      expect(minAmountOut(66_666n, 5n * PERCENT)).toBe(63_333n);
      expect(minAmountOut(1000n, 0n)).toBe(1000n);
    });

    it("should reject slippage above 100%", () => {
      let caught: unknown;
      try {
        minAmountOut(1000n, WAD + 1n);
      } catch (error) {
        caught = error;
      }
      expect(isVaultError(caught, "InvalidAmount")).toBe(true);
    });
  });

  describe("clampSub / minBigInt", () => {
    it("should floor subtraction at zero", () => {
      expect(clampSub(10n, 3n)).toBe(7n);
      expect(clampSub(3n, 10n)).toBe(0n);
    });

    it("should pick the smaller value", () => {
      expect(minBigInt(4n, 9n)).toBe(4n);
      expect(minBigInt(9n, 4n)).toBe(4n);
    });
  });

  describe("tick bucketing", () => {
    it("should round the tick bounds toward zero onto the spacing", () => {
      expect(minUsableTick(60)).toBe(-887220);
      expect(maxUsableTick(60)).toBe(887220);
      expect(minUsableTick(1)).toBe(-887272);
      expect(maxUsableTick(200)).toBe(887200);
    });

    it("should produce a full range", () => {
      expect(fullRangeTicks(60)).toEqual({ tickLower: -887220, tickUpper: 887220 });
    });

    it("should validate usable ticks", () => {
      expect(isUsableTick(120, 60)).toBe(true);
      expect(isUsableTick(100, 60)).toBe(false);
      expect(isUsableTick(887280, 60)).toBe(false);
    });

    it("should reject a non-positive spacing", () => {
      expect(() => minUsableTick(0)).toThrowError(/tickSpacing/);
    });

    it("should reject a spacing that is not a finite number", () => {
      expect(() => minUsableTick(Number.NaN)).toThrowError("Invalid amount for tickSpacing: 0");
      expect(() => maxUsableTick(Number.POSITIVE_INFINITY)).toThrowError(InvalidAmountError);
      expect(() => fullRangeTicks(2.5)).toThrowError("Invalid amount for tickSpacing: 2");
    });
  });
});
