/**
 * Upkeep Keeper
 *
 * Stand-in for the external automation network. Each cycle polls every
 * target's checkUpkeep and, where needed, calls performUpkeep with the
 * returned performData as the scheduler identity. A failing target is
 * logged and reported; the cycle moves on and the next cycle re-checks.
 */

import { EventEmitter } from "eventemitter3";
import type { Address } from "viem";
import { createTimer, keeperLogger as logger, logError, logUpkeep } from "@givevault/shared";
import type { UpkeepOutcome, UpkeepTarget } from "./types.js";

const loopLogger = logger.child({ component: "upkeep-keeper" });

// ============================================
// TYPES
// ============================================

export type UpkeepTargetSource = () => UpkeepTarget[];

export type UpkeepStatus = "idle" | "performed" | "failed";

export interface UpkeepReport {
  target: string;
  address: Address;
  status: UpkeepStatus;
  outcome?: UpkeepOutcome;
  error?: Error;
  durationMs: number;
}

export interface KeeperEvents {
  "upkeep:performed": (report: UpkeepReport) => void;
  "upkeep:failed": (report: UpkeepReport) => void;
  "cycle:complete": (reports: UpkeepReport[]) => void;
}

// ============================================
// UPKEEP KEEPER
// ============================================

export class UpkeepKeeper extends EventEmitter<KeeperEvents> {
  private timer: NodeJS.Timeout | null = null;
  private cycles = 0;

  constructor(
    private readonly scheduler: Address,
    private readonly targets: UpkeepTargetSource
  ) {
    super();
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  get cycleCount(): number {
    return this.cycles;
  }

  /**
   * One pass over every target
   */
  runOnce(): UpkeepReport[] {
    const reports = this.targets().map((target) => this.service(target));
    this.cycles++;
    this.emit("cycle:complete", reports);
    return reports;
  }

  private service(target: UpkeepTarget): UpkeepReport {
    const stopTimer = createTimer(`upkeep:${target.name}`);
    const context = { target: target.name, address: target.address };

    try {
      const check = target.checkUpkeep();
      if (!check.upkeepNeeded) {
        return { ...context, status: "idle", durationMs: stopTimer() };
      }

      const outcome = target.performUpkeep(this.scheduler, check.performData);
      const report: UpkeepReport = {
        ...context,
        status: outcome.performed ? "performed" : "idle",
        outcome,
        durationMs: stopTimer(),
      };
      if (outcome.performed) {
        logUpkeep("info", "upkeep_performed", {
          ...context,
          performData: check.performData,
          durationMs: report.durationMs,
        }, `${target.name} upkeep performed: ${outcome.actions.join(", ")}`);
        this.emit("upkeep:performed", report);
      }
      return report;
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(String(caught));
      const report: UpkeepReport = { ...context, status: "failed", error, durationMs: stopTimer() };
      logError(error, { upkeep: context }, `${target.name} upkeep failed`);
      this.emit("upkeep:failed", report);
      return report;
    }
  }

  /**
   * Run a cycle every `intervalMs`. `beforeCycle` runs first on each tick
   * (the daemon uses it to advance its clock).
   */
  start(intervalMs: number, beforeCycle?: () => void): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      try {
        beforeCycle?.();
        this.runOnce();
      } catch (caught) {
        const error = caught instanceof Error ? caught : new Error(String(caught));
        logError(error, { component: "upkeep-keeper" }, "Keeper cycle aborted");
      }
    }, intervalMs);

    loopLogger.info({ intervalMs }, "Keeper started");
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      loopLogger.info({ cycles: this.cycles }, "Keeper stopped");
    }
  }
}

export function createUpkeepKeeper(scheduler: Address, targets: UpkeepTargetSource): UpkeepKeeper {
  return new UpkeepKeeper(scheduler, targets);
}
