/**
 * Local World
 *
 * Assembles an in-process deployment: runtime, native bank, currency book,
 * in-memory venue and the vault registry. Used by the daemon and the tests.
 */

import type { Address } from "viem";
import { ChainRuntime, type ChainRuntimeOptions } from "./chain/chain-runtime.js";
import { CurrencyBook } from "./chain/currency-book.js";
import { NativeBank } from "./chain/native-bank.js";
import { VaultRegistry } from "./registry/vault-registry.js";
import { InMemoryVenue } from "./venue/in-memory-venue.js";

export interface LocalWorldAddresses {
  registry: Address;
  admin: Address;
  scheduler: Address;
  liquidityManager: Address;
  venue: Address;
}

export const DEFAULT_WORLD_ADDRESSES: LocalWorldAddresses = {
  registry: "0x1000000000000000000000000000000000000001",
  admin: "0x1000000000000000000000000000000000000002",
  scheduler: "0x1000000000000000000000000000000000000003",
  liquidityManager: "0x1000000000000000000000000000000000000004",
  venue: "0x1000000000000000000000000000000000000005",
};

export interface LocalWorld {
  runtime: ChainRuntime;
  native: NativeBank;
  currencies: CurrencyBook;
  venue: InMemoryVenue;
  registry: VaultRegistry;
  addresses: LocalWorldAddresses;
}

export function createLocalWorld(
  runtimeOptions?: Partial<ChainRuntimeOptions>,
  addressOverrides?: Partial<LocalWorldAddresses>
): LocalWorld {
  const addresses = { ...DEFAULT_WORLD_ADDRESSES, ...addressOverrides };
  const runtime = new ChainRuntime(runtimeOptions);
  const native = new NativeBank(runtime);
  const currencies = new CurrencyBook(native);
  const venue = new InMemoryVenue(runtime, currencies, addresses.venue);

  const registry = new VaultRegistry({
    runtime,
    currencies,
    address: addresses.registry,
    admin: addresses.admin,
    scheduler: addresses.scheduler,
    liquidityManager: addresses.liquidityManager,
    venue,
    quoter: venue,
    positionManager: venue,
  });

  return { runtime, native, currencies, venue, registry, addresses };
}
