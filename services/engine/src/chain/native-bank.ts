/**
 * Native Bank
 *
 * Balances of the chain's native currency. Accounts may register a receive
 * handler; a handler returning false rejects incoming value, which fails the
 * whole unit of work.
 */

import type { Address } from "viem";
import {
  InsufficientBalanceError,
  InvalidAddressError,
  InvalidAmountError,
  NATIVE_CURRENCY,
  normalizeAddress,
  TransferFailedError,
  ZERO_ADDRESS,
} from "@givevault/shared";
import type { ChainRuntime } from "./chain-runtime.js";
import type { BalanceLedger, Journaled } from "./types.js";

export type NativeReceiveHandler = (from: Address, amount: bigint) => boolean;

// ============================================
// NATIVE BANK
// ============================================

export class NativeBank implements BalanceLedger, Journaled<Map<Address, bigint>> {
  readonly currency: Address = NATIVE_CURRENCY;

  private balances: Map<Address, bigint> = new Map();
  private readonly receiveHandlers: Map<Address, NativeReceiveHandler> = new Map();

  constructor(private readonly runtime: ChainRuntime) {
    runtime.track(this);
  }

  captureState(): Map<Address, bigint> {
    return new Map(this.balances);
  }

  restoreState(state: Map<Address, bigint>): void {
    this.balances = new Map(state);
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(normalizeAddress(account, "account")) ?? 0n;
  }

  /**
   * Install receive logic for an account (models a contract recipient)
   */
  setReceiveHandler(accountInput: Address, handler: NativeReceiveHandler | undefined): void {
    const account = normalizeAddress(accountInput, "account");
    if (handler) {
      this.receiveHandlers.set(account, handler);
    } else {
      this.receiveHandlers.delete(account);
    }
  }

  /**
   * Credit native currency out of thin air (genesis allocation, test funding)
   */
  deal(accountInput: Address, amount: bigint): void {
    const account = normalizeAddress(accountInput, "account");
    if (account === ZERO_ADDRESS) {
      throw new InvalidAddressError("account", account);
    }
    if (amount <= 0n) {
      throw new InvalidAmountError("amount", amount);
    }
    this.runtime.atomic(() => {
      this.balances.set(account, this.balanceOf(account) + amount);
    });
  }

  /**
   * Direct value transfer. Throws TransferFailedError if the recipient rejects.
   */
  transfer(fromInput: Address, toInput: Address, amount: bigint): void {
    const from = normalizeAddress(fromInput, "from");
    const to = normalizeAddress(toInput, "to");
    if (to === ZERO_ADDRESS) {
      throw new InvalidAddressError("to", to);
    }
    if (amount < 0n) {
      throw new InvalidAmountError("amount", amount);
    }

    this.runtime.atomic(() => {
      const available = this.balanceOf(from);
      if (available < amount) {
        throw new InsufficientBalanceError(from, available, amount);
      }
      this.balances.set(from, available - amount);
      this.balances.set(to, this.balanceOf(to) + amount);

      const handler = this.receiveHandlers.get(to);
      if (handler && !handler(from, amount)) {
        throw new TransferFailedError(to, amount);
      }

      this.runtime.emitEvent({ type: "NativeTransfer", from, to, amount });
    });
  }
}
