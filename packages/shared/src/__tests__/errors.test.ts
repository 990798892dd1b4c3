import { describe, it, expect } from "vitest";
import {
  InsufficientOutputError,
  InvalidAmountError,
  isVaultError,
  TradeBlockedError,
  UnauthorizedError,
  VaultError,
} from "../errors/index.js";

describe("Errors", () => {
  it("should carry a kind and serializable details", () => {
    const error = new InsufficientOutputError(90n, 95n);

    expect(error).toBeInstanceOf(VaultError);
    expect(error.kind).toBe("InsufficientOutput");
    expect(error.name).toBe("InsufficientOutputError");
    expect(error.message).toBe("Swap returned 90, below minimum 95");
    expect(error.details).toEqual({ amountOut: "90", minAmountOut: "95" });
  });

  it("should expose the trade block reason", () => {
    const error = new TradeBlockedError("cooldown", "0x4000000000000000000000000000000000000002");
    expect(error.reason).toBe("cooldown");
    expect(error.message).toBe("Buy by 0x4000000000000000000000000000000000000002 blocked: cooldown");
  });

  describe("isVaultError", () => {
    it("should narrow by kind", () => {
      const error: unknown = new UnauthorizedError("0x1", "scheduler");

      expect(isVaultError(error)).toBe(true);
      expect(isVaultError(error, "Unauthorized")).toBe(true);
      expect(isVaultError(error, "NotPaused")).toBe(false);
    });

    it("should reject foreign errors", () => {
      expect(isVaultError(new Error("plain"))).toBe(false);
      expect(isVaultError("Unauthorized")).toBe(false);
    });
  });

  it("should format amounts in messages", () => {
    expect(new InvalidAmountError("burnAmount", 0n).message).toBe("Invalid amount for burnAmount: 0");
  });
});
