/**
 * Donation Forwarder
 *
 * Receives fundraising tokens from the treasury, sells them in the vault's
 * pool for the paired currency and forwards the proceeds to the non-profit's
 * payout address. Driven by the upkeep scheduler.
 */

import type { Address, Hex } from "viem";
import {
  engineLogger as logger,
  AlreadySetError,
  InsufficientOutputError,
  InvalidAddressError,
  normalizeAddress,
  NotPausedError,
  sameAddress,
  UnauthorizedError,
  ZERO_ADDRESS,
} from "@givevault/shared";
import type { ChainRuntime } from "../chain/chain-runtime.js";
import type { CurrencyBook } from "../chain/currency-book.js";
import type { Journaled } from "../chain/types.js";
import { minAmountOut } from "../math/threshold-math.js";
import type { VaultDirectory } from "../registry/types.js";
import type { FundraisingToken } from "../token/fundraising-token.js";
import { EMPTY_PERFORM_DATA } from "../upkeep/decision-codec.js";
import type { UpkeepCheck, UpkeepOutcome, UpkeepTarget } from "../upkeep/types.js";
import { isCurrency0, otherCurrency } from "../venue/pool-key.js";
import type { QuotingService, TradingVenue } from "../venue/types.js";

const forwarderLogger = logger.child({ component: "donation-forwarder" });

// ============================================
// TYPES
// ============================================

export interface DonationForwarderOptions {
  runtime: ChainRuntime;
  currencies: CurrencyBook;
  address: Address;
  owner: Address;
  payoutAddress: Address;
  registry: Address;
  scheduler: Address;
  slippageFraction: bigint;
  venue: TradingVenue;
  quoter: QuotingService;
}

export interface DonationForwarderLinks {
  token: FundraisingToken;
  directory: VaultDirectory;
}

export interface DonationResult {
  recipient: Address;
  currency: Address;
  amountIn: bigint;
  amountOut: bigint;
}

export interface DonationUpkeepOutcome extends UpkeepOutcome {
  donation?: DonationResult;
}

// ============================================
// DONATION FORWARDER
// ============================================

export class DonationForwarder implements UpkeepTarget, Journaled<boolean> {
  readonly name = "donation-forwarder";
  readonly address: Address;
  readonly owner: Address;
  readonly payoutAddress: Address;
  readonly slippageFraction: bigint;

  private readonly runtime: ChainRuntime;
  private readonly currencies: CurrencyBook;
  private readonly registry: Address;
  private readonly scheduler: Address;
  private readonly venue: TradingVenue;
  private readonly quoter: QuotingService;

  private paused = false;
  private links?: DonationForwarderLinks;

  constructor(options: DonationForwarderOptions) {
    if (options.payoutAddress === ZERO_ADDRESS) {
      throw new InvalidAddressError("payoutAddress", options.payoutAddress);
    }
    this.runtime = options.runtime;
    this.currencies = options.currencies;
    this.address = options.address;
    this.owner = options.owner;
    this.payoutAddress = options.payoutAddress;
    this.registry = options.registry;
    this.scheduler = options.scheduler;
    this.slippageFraction = options.slippageFraction;
    this.venue = options.venue;
    this.quoter = options.quoter;
    this.runtime.track(this);
  }

  captureState(): boolean {
    return this.paused;
  }

  restoreState(state: boolean): void {
    this.paused = state;
  }

  wire(links: DonationForwarderLinks): void {
    if (this.links) {
      throw new Error(`DonationForwarder ${this.address} is already wired`);
    }
    this.links = links;
  }

  private get wired(): DonationForwarderLinks {
    if (!this.links) {
      throw new Error(`DonationForwarder ${this.address} used before wiring`);
    }
    return this.links;
  }

  isPaused(): boolean {
    return this.paused || this.wired.directory.isGloballyPaused();
  }

  pendingBalance(): bigint {
    return this.wired.token.balanceOf(this.address);
  }

  // ============================================
  // UPKEEP
  // ============================================

  checkUpkeep(_checkData?: Hex): UpkeepCheck {
    const { directory } = this.wired;
    const upkeepNeeded =
      !this.isPaused() &&
      directory.isLiquidityCreated(this.owner) &&
      this.pendingBalance() > 0n;
    return { upkeepNeeded, performData: EMPTY_PERFORM_DATA };
  }

  performUpkeep(caller: Address, _performData: Hex): DonationUpkeepOutcome {
    if (!sameAddress(caller, this.scheduler)) {
      throw new UnauthorizedError(caller, "scheduler");
    }

    return this.runtime.atomic(() => {
      const amountIn = this.pendingBalance();
      if (this.isPaused() || amountIn === 0n) {
        return { performed: false, actions: [] };
      }

      const donation = this.swapAndForward(amountIn);
      return { performed: true, actions: ["forward-donation"], donation };
    });
  }

  private swapAndForward(amountIn: bigint): DonationResult {
    const { token, directory } = this.wired;
    const poolKey = directory.getPoolKey(this.owner);
    const zeroForOne = isCurrency0(poolKey, token.currency);
    const currency = otherCurrency(poolKey, token.currency);

    const expected = this.quoter.quoteExactInputSingle({ poolKey, zeroForOne, amountIn });
    const minOut = minAmountOut(expected, this.slippageFraction);
    const swapped = this.venue.swapExactInputSingle({
      poolKey,
      zeroForOne,
      amountIn,
      minAmountOut: minOut,
      payer: this.address,
      recipient: this.address,
      trader: this.address,
    });
    if (swapped < minOut) {
      throw new InsufficientOutputError(swapped, minOut);
    }

    // Forward everything held in the output currency, including earlier leftovers
    const amountOut = this.currencies.balanceOf(currency, this.address);
    this.currencies.transfer(currency, this.address, this.payoutAddress, amountOut);

    this.runtime.emitEvent({
      type: "DonationForwarded",
      forwarder: this.address,
      recipient: this.payoutAddress,
      currency,
      amountIn,
      amountOut,
    });

    forwarderLogger.info({
      forwarder: this.address,
      recipient: this.payoutAddress,
      currency,
      amountIn: amountIn.toString(),
      amountOut: amountOut.toString(),
    }, "Donation forwarded");

    return { recipient: this.payoutAddress, currency, amountIn, amountOut };
  }

  // ============================================
  // ADMINISTRATION
  // ============================================

  setPause(caller: Address, paused: boolean): void {
    this.requireRegistry(caller);
    if (this.paused === paused) {
      throw new AlreadySetError("forwarder paused", paused);
    }
    this.runtime.atomic(() => {
      this.paused = paused;
      this.runtime.emitEvent({ type: "PauseChanged", component: this.address, paused });
    });
  }

  /**
   * Move the pending token balance out while paused
   */
  emergencyWithdraw(caller: Address, recipientInput: Address): bigint {
    this.requireRegistry(caller);
    if (!this.isPaused()) {
      throw new NotPausedError("donation forwarder");
    }
    const recipient = normalizeAddress(recipientInput, "recipient");
    if (recipient === ZERO_ADDRESS) {
      throw new InvalidAddressError("recipient", recipient);
    }

    return this.runtime.atomic(() => {
      const { token } = this.wired;
      const amount = this.pendingBalance();
      if (amount > 0n) {
        token.transfer(this.address, recipient, amount);
      }
      this.runtime.emitEvent({
        type: "EmergencyWithdrawal",
        component: this.address,
        recipient,
        currency: token.currency,
        amount,
      });
      forwarderLogger.warn({ forwarder: this.address, recipient, amount: amount.toString() }, "Emergency withdrawal");
      return amount;
    });
  }

  private requireRegistry(caller: Address): void {
    if (!sameAddress(caller, this.registry)) {
      throw new UnauthorizedError(caller, "vault registry");
    }
  }
}
