/**
 * Treasury Controller
 *
 * Scheduled-upkeep state machine for one vault's treasury:
 * - Transfer-and-burn: every transferInterval, while the treasury holds at
 *   least minimumHealthThreshold of supply, move 2% of supply to the
 *   donation forwarder and burn the same amount
 * - Liquidity top-up: while the pool holds less than minLPHealthThreshold of
 *   supply, swap half the deficit for the paired asset and deposit both sides
 *
 * The decision is recomputed from current state on every check; nothing
 * about it is persisted. performUpkeep re-validates each requested action,
 * so a stale decision can never act twice.
 */

import type { Address, Hex } from "viem";
import {
  engineLogger as logger,
  AlreadySetError,
  InsufficientOutputError,
  InvalidAddressError,
  InvalidAmountError,
  normalizeAddress,
  NotPausedError,
  sameAddress,
  TRANSFER_BURN_FRACTION,
  type TreasurySettings,
  UnauthorizedError,
  ZERO_ADDRESS,
} from "@givevault/shared";
import type { ChainRuntime } from "../chain/chain-runtime.js";
import type { CurrencyBook } from "../chain/currency-book.js";
import type { Journaled } from "../chain/types.js";
import {
  clampSub,
  fractionOfSupply,
  fullRangeTicks,
  minAmountOut,
  minBigInt,
  mulFraction,
} from "../math/threshold-math.js";
import type { TaxSignals } from "../tax/tax-router.js";
import { decodeTreasuryDecision, encodeTreasuryDecision } from "../upkeep/decision-codec.js";
import type { TreasuryDecision, UpkeepCheck, UpkeepTarget } from "../upkeep/types.js";
import { isCurrency0, otherCurrency, toPoolId } from "../venue/pool-key.js";
import type { PositionManager, QuotingService, TradingVenue } from "../venue/types.js";
import type {
  LiquidityTopUpResult,
  TransferAndBurnResult,
  TreasuryControllerOptions,
  TreasuryLinks,
  TreasuryState,
  TreasuryStatus,
  TreasuryUpkeepOutcome,
} from "./types.js";

const treasuryLogger = logger.child({ component: "treasury-controller" });

const IDLE: TreasuryDecision = { initiateTransfer: false, initiateLiquidityTopUp: false };

// ============================================
// TREASURY CONTROLLER
// ============================================

export class TreasuryController implements UpkeepTarget, TaxSignals, Journaled<TreasuryState> {
  readonly name = "treasury";
  readonly address: Address;
  readonly owner: Address;

  private readonly runtime: ChainRuntime;
  private readonly currencies: CurrencyBook;
  private readonly registry: Address;
  private readonly scheduler: Address;
  private readonly settings: TreasurySettings;
  private readonly venue: TradingVenue;
  private readonly quoter: QuotingService;
  private readonly positionManager: PositionManager;

  private state: TreasuryState;
  private links?: TreasuryLinks;

  constructor(options: TreasuryControllerOptions) {
    this.runtime = options.runtime;
    this.currencies = options.currencies;
    this.address = options.address;
    this.owner = options.owner;
    this.registry = options.registry;
    this.scheduler = options.scheduler;
    this.settings = options.settings;
    this.venue = options.venue;
    this.quoter = options.quoter;
    this.positionManager = options.positionManager;

    // First cycle becomes due one interval after creation
    this.state = { lastTransferTimestamp: this.runtime.now, paused: false };
    this.runtime.track(this);
  }

  captureState(): TreasuryState {
    return { ...this.state };
  }

  restoreState(state: TreasuryState): void {
    this.state = { ...state };
  }

  wire(links: TreasuryLinks): void {
    if (this.links) {
      throw new Error(`TreasuryController ${this.address} is already wired`);
    }
    this.links = links;
  }

  private get wired(): TreasuryLinks {
    if (!this.links) {
      throw new Error(`TreasuryController ${this.address} used before wiring`);
    }
    return this.links;
  }

  // ============================================
  // READINGS
  // ============================================

  isPaused(): boolean {
    return this.state.paused || this.wired.directory.isGloballyPaused();
  }

  get lastTransferTimestamp(): number {
    return this.state.lastTransferTimestamp;
  }

  balance(): bigint {
    return this.wired.token.balanceOf(this.address);
  }

  treasuryFraction(): bigint {
    return fractionOfSupply(this.balance(), this.wired.token.totalSupply());
  }

  /**
   * Fundraising tokens currently held by the pool. Zero before liquidity exists.
   */
  poolTokenReserve(): bigint {
    const { directory, token } = this.wired;
    if (!directory.isLiquidityCreated(this.owner)) {
      return 0n;
    }
    const poolKey = directory.getPoolKey(this.owner);
    const reserves = this.venue.getReserves(poolKey);
    return isCurrency0(poolKey, token.currency) ? reserves.reserve0 : reserves.reserve1;
  }

  lpHealthFraction(): bigint {
    return fractionOfSupply(this.poolTokenReserve(), this.wired.token.totalSupply());
  }

  /**
   * Pure function of current state and clock
   */
  evaluateConditions(): TreasuryDecision {
    if (this.isPaused()) {
      return IDLE;
    }
    const initiateTransfer =
      this.runtime.now >= this.state.lastTransferTimestamp + this.settings.transferInterval &&
      this.treasuryFraction() >= this.settings.minimumHealthThreshold;
    const initiateLiquidityTopUp =
      this.wired.directory.isLiquidityCreated(this.owner) &&
      this.lpHealthFraction() < this.settings.minLPHealthThreshold;
    return { initiateTransfer, initiateLiquidityTopUp };
  }

  getStatus(): TreasuryStatus {
    return {
      address: this.address,
      ...this.state,
      ...this.evaluateConditions(),
      globallyPaused: this.wired.directory.isGloballyPaused(),
      balance: this.balance(),
      treasuryFraction: this.treasuryFraction(),
      lpHealthFraction: this.lpHealthFraction(),
      nextTransferAt: this.state.lastTransferTimestamp + this.settings.transferInterval,
      settings: this.settings,
    };
  }

  // ============================================
  // UPKEEP
  // ============================================

  checkUpkeep(_checkData?: Hex): UpkeepCheck {
    const decision = this.evaluateConditions();
    return {
      upkeepNeeded: decision.initiateTransfer || decision.initiateLiquidityTopUp,
      performData: encodeTreasuryDecision(decision),
    };
  }

  performUpkeep(caller: Address, performData: Hex): TreasuryUpkeepOutcome {
    if (!sameAddress(caller, this.scheduler)) {
      throw new UnauthorizedError(caller, "scheduler");
    }
    const requested = decodeTreasuryDecision(performData);
    if (!requested.initiateTransfer && !requested.initiateLiquidityTopUp) {
      return { performed: false, actions: [] };
    }

    return this.runtime.atomic(() => {
      const outcome: TreasuryUpkeepOutcome = { performed: false, actions: [] };
      if (this.isPaused()) {
        treasuryLogger.info({ treasury: this.address }, "Upkeep skipped: treasury paused");
        return outcome;
      }

      if (requested.initiateTransfer && this.evaluateConditions().initiateTransfer) {
        outcome.transfer = this.transferAndBurn();
        outcome.actions.push("transfer-and-burn");
      }

      // Re-read after the transfer: the burn changes total supply
      if (requested.initiateLiquidityTopUp && this.evaluateConditions().initiateLiquidityTopUp) {
        const topUp = this.topUpLiquidity();
        if (topUp) {
          outcome.topUp = topUp;
          outcome.actions.push("liquidity-top-up");
        }
      }

      outcome.performed = outcome.actions.length > 0;
      if (!outcome.performed) {
        treasuryLogger.debug({ treasury: this.address, requested }, "Stale upkeep decision, nothing to do");
      }
      return outcome;
    });
  }

  private transferAndBurn(): TransferAndBurnResult {
    const { token, donationForwarder } = this.wired;
    const burnAmount = mulFraction(token.totalSupply(), TRANSFER_BURN_FRACTION);
    if (burnAmount === 0n) {
      throw new InvalidAmountError("burnAmount", burnAmount);
    }

    token.transfer(this.address, donationForwarder, burnAmount);
    token.burn(this.address, burnAmount);
    this.state.lastTransferTimestamp = this.runtime.now;

    const result: TransferAndBurnResult = {
      recipient: donationForwarder,
      amountTransferred: burnAmount,
      amountBurned: burnAmount,
      timestamp: this.runtime.now,
    };

    this.runtime.emitEvent({
      type: "TransferAndBurn",
      treasury: this.address,
      recipient: donationForwarder,
      amountTransferred: burnAmount,
      amountBurned: burnAmount,
      timestamp: result.timestamp,
    });

    treasuryLogger.info({
      treasury: this.address,
      recipient: donationForwarder,
      amount: burnAmount.toString(),
      supplyAfter: token.totalSupply().toString(),
    }, "Transfer-and-burn executed");

    return result;
  }

  private topUpLiquidity(): LiquidityTopUpResult | undefined {
    const { token, directory } = this.wired;
    const poolKey = directory.getPoolKey(this.owner);
    const poolId = toPoolId(poolKey);

    const target = mulFraction(token.totalSupply(), this.settings.minLPHealthThreshold);
    const deficit = minBigInt(clampSub(target, this.poolTokenReserve()), this.balance());
    const tokenSwapped = deficit / 2n;
    const tokenDeposited = deficit - tokenSwapped;
    if (tokenSwapped === 0n) {
      treasuryLogger.warn({
        treasury: this.address,
        deficit: deficit.toString(),
      }, "Liquidity top-up skipped: nothing to deposit");
      return undefined;
    }

    const tokenIsCurrency0 = isCurrency0(poolKey, token.currency);
    const zeroForOne = tokenIsCurrency0;
    const pairedCurrency = otherCurrency(poolKey, token.currency);
    const pairedBefore = this.currencies.balanceOf(pairedCurrency, this.address);

    const expected = this.quoter.quoteExactInputSingle({ poolKey, zeroForOne, amountIn: tokenSwapped });
    const minOut = minAmountOut(expected, this.settings.slippageFraction);
    this.venue.swapExactInputSingle({
      poolKey,
      zeroForOne,
      amountIn: tokenSwapped,
      minAmountOut: minOut,
      payer: this.address,
      recipient: this.address,
      trader: this.address,
    });
    // Count what arrived, not what the venue reports
    const pairedReceived = this.currencies.balanceOf(pairedCurrency, this.address) - pairedBefore;
    if (pairedReceived < minOut) {
      throw new InsufficientOutputError(pairedReceived, minOut);
    }

    const amount0Max = tokenIsCurrency0 ? tokenDeposited : pairedReceived;
    const amount1Max = tokenIsCurrency0 ? pairedReceived : tokenDeposited;
    const { tickLower, tickUpper } = fullRangeTicks(poolKey.tickSpacing);
    const { amount0Used, amount1Used } = this.positionManager.addLiquidity({
      poolKey,
      amount0Max,
      amount1Max,
      tickLower,
      tickUpper,
      payer: this.address,
      recipient: this.address,
    });

    // Whatever the position could not absorb goes to the pool as a donation
    const dust0 = amount0Max - amount0Used;
    const dust1 = amount1Max - amount1Used;
    if (dust0 > 0n || dust1 > 0n) {
      this.venue.donate(poolKey, dust0, dust1, this.address);
    }

    const result: LiquidityTopUpResult = {
      poolId,
      deficit,
      tokenSwapped,
      pairedReceived,
      amount0Used,
      amount1Used,
      dust0,
      dust1,
    };

    this.runtime.emitEvent({
      type: "LiquidityToppedUp",
      treasury: this.address,
      poolId,
      tokenSwapped,
      pairedReceived,
      amount0Used,
      amount1Used,
      dust0,
      dust1,
    });

    treasuryLogger.info({
      treasury: this.address,
      poolId,
      deficit: deficit.toString(),
      tokenSwapped: tokenSwapped.toString(),
      pairedReceived: pairedReceived.toString(),
    }, "Liquidity topped up");

    return result;
  }

  // ============================================
  // ADMINISTRATION
  // ============================================

  setPause(caller: Address, paused: boolean): void {
    this.requireRegistry(caller);
    if (this.state.paused === paused) {
      throw new AlreadySetError("treasury paused", paused);
    }
    this.runtime.atomic(() => {
      this.state.paused = paused;
      this.runtime.emitEvent({ type: "PauseChanged", component: this.address, paused });
    });
  }

  /**
   * Move the whole token balance out while paused
   */
  emergencyWithdraw(caller: Address, recipientInput: Address): bigint {
    this.requireRegistry(caller);
    if (!this.isPaused()) {
      throw new NotPausedError("treasury");
    }
    const recipient = normalizeAddress(recipientInput, "recipient");
    if (recipient === ZERO_ADDRESS) {
      throw new InvalidAddressError("recipient", recipient);
    }

    return this.runtime.atomic(() => {
      const { token } = this.wired;
      const amount = this.balance();
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
      treasuryLogger.warn({ treasury: this.address, recipient, amount: amount.toString() }, "Emergency withdrawal");
      return amount;
    });
  }

  private requireRegistry(caller: Address): void {
    if (!sameAddress(caller, this.registry)) {
      throw new UnauthorizedError(caller, "vault registry");
    }
  }
}
