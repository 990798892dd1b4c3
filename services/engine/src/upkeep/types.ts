/**
 * Upkeep Protocol
 *
 * Poll-then-act contract exposed to the external scheduler. checkUpkeep is
 * a pure read; performUpkeep mutates state and is gated to the scheduler.
 */

import type { Address, Hex } from "viem";

export interface UpkeepCheck {
  upkeepNeeded: boolean;
  performData: Hex;
}

export interface UpkeepTarget {
  readonly name: string;
  readonly address: Address;
  checkUpkeep(checkData?: Hex): UpkeepCheck;
  performUpkeep(caller: Address, performData: Hex): UpkeepOutcome;
}

/**
 * What a performUpkeep call actually did. `performed` is false for no-ops.
 */
export interface UpkeepOutcome {
  performed: boolean;
  actions: string[];
}

export interface TreasuryDecision {
  initiateTransfer: boolean;
  initiateLiquidityTopUp: boolean;
}
