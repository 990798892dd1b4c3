/**
 * Token Ledger
 *
 * Plain fungible-token bookkeeping (balances, total supply, mint, burn).
 * Subclasses hook into `update` to change how a transfer is applied.
 */

import type { Address } from "viem";
import {
  InsufficientBalanceError,
  InvalidAddressError,
  InvalidAmountError,
  normalizeAddress,
  ZERO_ADDRESS,
} from "@givevault/shared";
import type { ChainRuntime } from "./chain-runtime.js";
import type { BalanceLedger, Journaled } from "./types.js";

// ============================================
// TYPES
// ============================================

export interface TokenMetadata {
  name: string;
  symbol: string;
  decimals: number;
}

interface TokenLedgerState {
  balances: Map<Address, bigint>;
  totalSupply: bigint;
}

// ============================================
// TOKEN LEDGER
// ============================================

export class TokenLedger implements BalanceLedger, Journaled<TokenLedgerState> {
  readonly currency: Address;

  // Keyed by checksummed address
  private balances: Map<Address, bigint> = new Map();
  private supply = 0n;

  constructor(
    protected readonly runtime: ChainRuntime,
    currency: Address,
    readonly metadata: TokenMetadata
  ) {
    this.currency = normalizeAddress(currency, "token");
    if (this.currency === ZERO_ADDRESS) {
      throw new InvalidAddressError("token", currency);
    }
    runtime.track(this);
  }

  captureState(): TokenLedgerState {
    return { balances: new Map(this.balances), totalSupply: this.supply };
  }

  restoreState(state: TokenLedgerState): void {
    this.balances = new Map(state.balances);
    this.supply = state.totalSupply;
  }

  // ============================================
  // VIEWS
  // ============================================

  balanceOf(account: Address): bigint {
    return this.balances.get(normalizeAddress(account, "account")) ?? 0n;
  }

  totalSupply(): bigint {
    return this.supply;
  }

  // ============================================
  // MUTATIONS
  // ============================================

  transfer(fromInput: Address, toInput: Address, amount: bigint): void {
    const from = normalizeAddress(fromInput, "from");
    const to = normalizeAddress(toInput, "to");
    if (from === ZERO_ADDRESS) {
      throw new InvalidAddressError("from", from);
    }
    if (to === ZERO_ADDRESS) {
      throw new InvalidAddressError("to", to);
    }
    if (amount < 0n) {
      throw new InvalidAmountError("amount", amount);
    }
    this.runtime.atomic(() => this.update(from, to, amount));
  }

  mint(toInput: Address, amount: bigint): void {
    const to = normalizeAddress(toInput, "to");
    if (to === ZERO_ADDRESS) {
      throw new InvalidAddressError("to", to);
    }
    if (amount <= 0n) {
      throw new InvalidAmountError("mintAmount", amount);
    }
    this.runtime.atomic(() => this.update(ZERO_ADDRESS, to, amount));
  }

  burn(fromInput: Address, amount: bigint): void {
    const from = normalizeAddress(fromInput, "from");
    if (from === ZERO_ADDRESS) {
      throw new InvalidAddressError("from", from);
    }
    if (amount <= 0n) {
      throw new InvalidAmountError("burnAmount", amount);
    }
    this.runtime.atomic(() => this.update(from, ZERO_ADDRESS, amount));
  }

  /**
   * Apply a value movement. The zero address on either side mints or burns.
   */
  protected update(from: Address, to: Address, amount: bigint): void {
    this.move(from, to, amount);
  }

  protected move(from: Address, to: Address, amount: bigint): void {
    if (from === ZERO_ADDRESS) {
      this.supply += amount;
    } else {
      const available = this.balanceOf(from);
      if (available < amount) {
        throw new InsufficientBalanceError(from, available, amount);
      }
      this.balances.set(from, available - amount);
    }

    if (to === ZERO_ADDRESS) {
      this.supply -= amount;
    } else {
      this.balances.set(to, this.balanceOf(to) + amount);
    }

    this.runtime.emitEvent({ type: "Transfer", token: this.currency, from, to, amount });
  }
}
