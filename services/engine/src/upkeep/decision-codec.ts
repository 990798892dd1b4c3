/**
 * ABI coding of the treasury upkeep decision: (bool initiateTransfer, bool initiateLiquidityTopUp)
 */

import { decodeAbiParameters, encodeAbiParameters, type Hex } from "viem";
import type { TreasuryDecision } from "./types.js";

const TREASURY_DECISION_ABI = [
  { name: "initiateTransfer", type: "bool" },
  { name: "initiateLiquidityTopUp", type: "bool" },
] as const;

export const EMPTY_PERFORM_DATA: Hex = "0x";

export function encodeTreasuryDecision(decision: TreasuryDecision): Hex {
  return encodeAbiParameters(TREASURY_DECISION_ABI, [
    decision.initiateTransfer,
    decision.initiateLiquidityTopUp,
  ]);
}

export function decodeTreasuryDecision(performData: Hex): TreasuryDecision {
  const [initiateTransfer, initiateLiquidityTopUp] = decodeAbiParameters(
    TREASURY_DECISION_ABI,
    performData
  );
  return { initiateTransfer, initiateLiquidityTopUp };
}
