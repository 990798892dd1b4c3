/**
 * Chain Runtime
 *
 * Single-threaded execution context for every vault component:
 * - Block/time clock (seconds), advanced only forward
 * - Atomic units of work: state of every tracked component is captured
 *   before the outermost unit and restored if it throws
 * - Event buffering: events become visible only when the unit commits
 */

import { EventEmitter } from "eventemitter3";
import { engineLogger as logger } from "@givevault/shared";
import type {
  EngineEvent,
  EngineEventOf,
  EngineEventType,
  Journaled,
  LoggedEvent,
} from "./types.js";

const runtimeLogger = logger.child({ component: "chain-runtime" });

// ============================================
// TYPES
// ============================================

export interface ChainRuntimeOptions {
  startBlock: number;
  startTimestamp: number;
  blockTimeSeconds: number;
}

export interface ChainRuntimeEvents {
  event: (entry: LoggedEvent) => void;
  reverted: (error: unknown, discardedEvents: number) => void;
}

const DEFAULT_OPTIONS: ChainRuntimeOptions = {
  startBlock: 1,
  startTimestamp: Math.floor(Date.now() / 1000),
  blockTimeSeconds: 2,
};

type Restorer = () => void;
type Capture = () => Restorer;

// ============================================
// CHAIN RUNTIME
// ============================================

export class ChainRuntime extends EventEmitter<ChainRuntimeEvents> {
  private readonly options: ChainRuntimeOptions;
  private blockNumber: number;
  private currentTimestamp: number;

  private readonly participants: Capture[] = [];
  private readonly log: LoggedEvent[] = [];
  private pending: EngineEvent[] = [];
  private depth = 0;

  constructor(options?: Partial<ChainRuntimeOptions>) {
    super();
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.blockNumber = this.options.startBlock;
    this.currentTimestamp = this.options.startTimestamp;

    runtimeLogger.debug({
      startBlock: this.blockNumber,
      startTimestamp: this.currentTimestamp,
    }, "ChainRuntime initialized");
  }

  // ============================================
  // CLOCK
  // ============================================

  get now(): number {
    return this.currentTimestamp;
  }

  get block(): number {
    return this.blockNumber;
  }

  /**
   * Mine blocks, advancing time by the configured block time per block
   */
  mine(blocks = 1): void {
    if (!Number.isInteger(blocks) || blocks < 0) {
      throw new Error(`Cannot mine ${blocks} blocks`);
    }
    this.blockNumber += blocks;
    this.currentTimestamp += blocks * this.options.blockTimeSeconds;
  }

  /**
   * Advance wall-clock time without producing blocks
   */
  advanceTime(seconds: number): void {
    if (!Number.isInteger(seconds) || seconds < 0) {
      throw new Error(`Cannot move clock by ${seconds} seconds`);
    }
    this.currentTimestamp += seconds;
  }

  // ============================================
  // JOURNAL
  // ============================================

  /**
   * Register a stateful component so its state is rolled back on revert
   */
  track<TState>(component: Journaled<TState>): void {
    this.participants.push(() => {
      const state = component.captureState();
      return () => component.restoreState(state);
    });
  }

  get inUnitOfWork(): boolean {
    return this.depth > 0;
  }

  /**
   * Run `fn` as one atomic unit. Nested calls join the outer unit.
   */
  atomic<T>(fn: () => T): T {
    if (this.depth > 0) {
      this.depth++;
      try {
        return fn();
      } finally {
        this.depth--;
      }
    }

    const trackedBefore = this.participants.length;
    const restorers = this.participants.map((capture) => capture());
    this.depth = 1;

    let result: T;
    try {
      result = fn();
    } catch (error) {
      this.depth = 0;
      this.rollback(restorers, trackedBefore, error);
      throw error;
    }

    this.depth = 0;
    this.commit();
    return result;
  }

  private rollback(restorers: Restorer[], trackedBefore: number, error: unknown): void {
    for (let i = restorers.length - 1; i >= 0; i--) {
      restorers[i]();
    }
    // Components created inside the reverted unit no longer exist
    this.participants.length = trackedBefore;

    const discarded = this.pending.length;
    this.pending = [];

    runtimeLogger.debug({
      discardedEvents: discarded,
      error: error instanceof Error ? error.message : String(error),
    }, "Unit of work reverted");
    this.emit("reverted", error, discarded);
  }

  private commit(): void {
    const committed = this.pending;
    this.pending = [];
    for (const event of committed) {
      const entry: LoggedEvent = {
        index: this.log.length,
        blockNumber: this.blockNumber,
        timestamp: this.currentTimestamp,
        event,
      };
      this.log.push(entry);
      this.emit("event", entry);
    }
  }

  // ============================================
  // EVENTS
  // ============================================

  /**
   * Record an event. Outside a unit of work it commits immediately.
   */
  emitEvent(event: EngineEvent): void {
    this.pending.push(event);
    if (this.depth === 0) {
      this.commit();
    }
  }

  getEvents(): LoggedEvent[] {
    return [...this.log];
  }

  getEventsOfType<T extends EngineEventType>(type: T): Array<LoggedEvent<EngineEventOf<T>>> {
    const matches: Array<LoggedEvent<EngineEventOf<T>>> = [];
    for (const entry of this.log) {
      const { event } = entry;
      if (isEventOfType(event, type)) {
        matches.push({ ...entry, event });
      }
    }
    return matches;
  }

  get eventCount(): number {
    return this.log.length;
  }
}

function isEventOfType<T extends EngineEventType>(
  event: EngineEvent,
  type: T
): event is EngineEventOf<T> {
  return event.type === type;
}

// ============================================
// FACTORY
// ============================================

export function createChainRuntime(options?: Partial<ChainRuntimeOptions>): ChainRuntime {
  return new ChainRuntime(options);
}
