/**
 * GiveVault Engine Daemon
 *
 * Local long-running process that:
 * - Boots an in-process world with one demo vault paired with the native currency
 * - Seeds the vault's pool
 * - Runs the upkeep keeper on its interval, mining blocks before each cycle
 *
 * Usage: npm start (or node dist/daemon.js after a build)
 */

import "dotenv/config";

import { engineLogger as logger, logFatal, WAD, ZERO_ADDRESS } from "@givevault/shared";
import type { Address } from "viem";
import { loadEngineConfig } from "./config.js";
import { createUpkeepKeeper, type UpkeepKeeper } from "./upkeep/keeper.js";
import { createLocalWorld } from "./world.js";

const daemonLogger = logger.child({ component: "daemon" });

const DEMO_OWNER: Address = "0x2000000000000000000000000000000000000001";
const DEMO_PAYOUT: Address = "0x2000000000000000000000000000000000000002";
const DEMO_FUNDER: Address = "0x2000000000000000000000000000000000000003";

// ============================================
// DAEMON MAIN
// ============================================

let keeper: UpkeepKeeper | null = null;
let isShuttingDown = false;

function main(): void {
  const config = loadEngineConfig();
  daemonLogger.info({
    nodeEnv: config.nodeEnv,
    keeperIntervalMs: config.keeperIntervalMs,
    blocksPerInterval: config.blocksPerInterval,
    transferInterval: config.treasury.transferInterval,
  }, "Configuration loaded");

  const world = createLocalWorld();
  const { runtime, registry, native, addresses } = world;

  runtime.on("event", (entry) => {
    daemonLogger.debug({ index: entry.index, block: entry.blockNumber, type: entry.event.type }, "Event committed");
  });

  const initialSupply = 1_000_000_000n * WAD;
  registry.createVault(addresses.admin, {
    owner: DEMO_OWNER,
    payoutAddress: DEMO_PAYOUT,
    pairedCurrency: ZERO_ADDRESS,
    name: "Demo Fundraising Token",
    symbol: "DEMO",
    initialSupply,
    taxPolicy: {
      taxFeeFraction: 2n * 10n ** 16n,
      maximumTreasuryFraction: 30n * 10n ** 16n,
      minimumLiquidityTopUpFraction: 5n * 10n ** 16n,
      configurableLPFraction: 10n ** 16n,
    },
    treasury: config.treasury,
    launchGuard: config.launchGuard,
  });

  // Seed the pool with 10% of supply against 100 native units
  const pairedAmount = 100n * WAD;
  native.deal(DEMO_FUNDER, pairedAmount);
  const poolId = registry.createLiquidity(addresses.admin, DEMO_OWNER, {
    tokenAmount: initialSupply / 10n,
    pairedAmount,
    funder: DEMO_FUNDER,
  });
  daemonLogger.info({ owner: DEMO_OWNER, poolId }, "Demo vault ready");

  keeper = createUpkeepKeeper(addresses.scheduler, () => registry.upkeepTargets());
  keeper.on("upkeep:performed", (report) => {
    daemonLogger.info({ target: report.target, actions: report.outcome?.actions }, "Upkeep performed");
  });
  keeper.on("upkeep:failed", (report) => {
    daemonLogger.warn({ target: report.target, error: report.error?.message }, "Upkeep failed");
  });

  keeper.start(config.keeperIntervalMs, () => runtime.mine(config.blocksPerInterval));

  const shutdown = (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    daemonLogger.info({ signal }, "Shutting down engine daemon...");
    keeper?.stop();
    daemonLogger.info({ events: runtime.eventCount, block: runtime.block }, "Shutdown complete");
    process.exit(0);
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

// ============================================
// RUN
// ============================================

try {
  main();
} catch (caught) {
  const error = caught instanceof Error ? caught : new Error(String(caught));
  logFatal(error, { component: "daemon" }, "Fatal error in engine daemon");
  process.exit(1);
}
