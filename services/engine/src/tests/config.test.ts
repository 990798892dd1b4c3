/**
 * Engine Configuration Tests
 */

import { describe, it, expect } from "vitest";
import { DEFAULT_LAUNCH_GUARD, DEFAULT_TREASURY_SETTINGS, PERCENT } from "@givevault/shared";
import { loadEngineConfig } from "../config.js";

describe("loadEngineConfig", () => {
  it("should fall back to protocol defaults", () => {
    const config = loadEngineConfig({});

    expect(config.nodeEnv).toBe("production");
    expect(config.keeperIntervalMs).toBe(15_000);
    expect(config.blocksPerInterval).toBe(5);
    expect(config.treasury).toEqual(DEFAULT_TREASURY_SETTINGS);
    expect(config.launchGuard).toEqual(DEFAULT_LAUNCH_GUARD);
  });

  it("should apply environment overrides", () => {
    const config = loadEngineConfig({
      NODE_ENV: "test",
      KEEPER_INTERVAL_MS: "1000",
      TRANSFER_INTERVAL_SECONDS: "3600",
      MIN_TREASURY_HEALTH_FRACTION: "200000000000000000",
      DEFAULT_SLIPPAGE_FRACTION: "10000000000000000",
      LAUNCH_TIME_TO_HOLD: "0",
    });

    expect(config.keeperIntervalMs).toBe(1_000);
    expect(config.treasury).toEqual({
      transferInterval: 3600,
      minimumHealthThreshold: 20n * PERCENT,
      minLPHealthThreshold: DEFAULT_TREASURY_SETTINGS.minLPHealthThreshold,
      slippageFraction: PERCENT,
    });
    expect(config.launchGuard.timeToHold).toBe(0);
  });

  it("should reject inconsistent treasury settings", () => {
    expect(() => loadEngineConfig({ MIN_TREASURY_HEALTH_FRACTION: "10000000000000000" })).toThrow();
  });
});
