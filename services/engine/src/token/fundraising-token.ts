/**
 * Fundraising Token
 *
 * Token ledger whose value-transfer path runs through the tax router.
 * Allocated unwired; the vault builder attaches the router exactly once.
 */

import type { Address } from "viem";
import { engineLogger as logger, InsufficientBalanceError } from "@givevault/shared";
import type { ChainRuntime } from "../chain/chain-runtime.js";
import { TokenLedger, type TokenMetadata } from "../chain/token-ledger.js";
import type { TaxRouter } from "../tax/tax-router.js";

const tokenLogger = logger.child({ component: "fundraising-token" });

export class FundraisingToken extends TokenLedger {
  private router?: TaxRouter;

  constructor(runtime: ChainRuntime, address: Address, metadata: TokenMetadata) {
    super(runtime, address, metadata);
  }

  get isWired(): boolean {
    return this.router !== undefined;
  }

  wire(router: TaxRouter): void {
    if (this.router) {
      throw new Error(`FundraisingToken ${this.currency} is already wired`);
    }
    this.router = router;
  }

  get taxRouter(): TaxRouter {
    if (!this.router) {
      throw new Error(`FundraisingToken ${this.currency} used before wiring`);
    }
    return this.router;
  }

  protected override update(from: Address, to: Address, amount: bigint): void {
    const breakdown = this.taxRouter.route(from, to, amount);
    if (breakdown.exemption) {
      super.update(from, to, amount);
      return;
    }

    const available = this.balanceOf(from);
    if (available < amount) {
      throw new InsufficientBalanceError(from, available, amount);
    }

    const { recipients } = this.taxRouter;
    this.move(from, to, breakdown.netAmount);
    if (breakdown.toLiquidity > 0n) {
      this.move(from, recipients.liquidityManager, breakdown.toLiquidity);
    }
    if (breakdown.toTreasury > 0n) {
      this.move(from, recipients.treasury, breakdown.toTreasury);
    }

    this.runtime.emitEvent({
      type: "TaxRouted",
      token: this.currency,
      from,
      to,
      amount,
      netAmount: breakdown.netAmount,
      toLiquidity: breakdown.toLiquidity,
      toTreasury: breakdown.toTreasury,
    });

    tokenLogger.debug({
      from,
      to,
      amount: amount.toString(),
      toLiquidity: breakdown.toLiquidity.toString(),
      toTreasury: breakdown.toTreasury.toString(),
    }, "Transfer taxed");
  }
}
