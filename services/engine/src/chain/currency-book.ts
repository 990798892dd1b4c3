/**
 * Currency Book
 *
 * Resolves a pool currency address to the ledger holding its balances.
 * The zero address resolves to the native bank.
 */

import type { Address } from "viem";
import { InvalidAddressError, NATIVE_CURRENCY, normalizeAddress } from "@givevault/shared";
import type { NativeBank } from "./native-bank.js";
import type { BalanceLedger } from "./types.js";

export class CurrencyBook {
  private readonly ledgers: Map<Address, BalanceLedger> = new Map();

  constructor(readonly native: NativeBank) {}

  register(ledger: BalanceLedger): void {
    if (ledger.currency === NATIVE_CURRENCY) {
      throw new InvalidAddressError("currency", ledger.currency);
    }
    this.ledgers.set(normalizeAddress(ledger.currency, "currency"), ledger);
  }

  has(currency: Address): boolean {
    const key = normalizeAddress(currency, "currency");
    return key === NATIVE_CURRENCY || this.ledgers.has(key);
  }

  ledgerOf(currency: Address): BalanceLedger {
    const key = normalizeAddress(currency, "currency");
    if (key === NATIVE_CURRENCY) {
      return this.native;
    }
    const ledger = this.ledgers.get(key);
    if (!ledger) {
      throw new InvalidAddressError("currency", currency);
    }
    return ledger;
  }

  balanceOf(currency: Address, account: Address): bigint {
    return this.ledgerOf(currency).balanceOf(account);
  }

  transfer(currency: Address, from: Address, to: Address, amount: bigint): void {
    this.ledgerOf(currency).transfer(from, to, amount);
  }
}
