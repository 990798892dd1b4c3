/**
 * Pool key helpers
 */

import {
  encodeAbiParameters,
  keccak256,
  parseAbiParameters,
  type Address,
  type Hex,
} from "viem";
import { InvalidAddressError, sameAddress } from "@givevault/shared";
import type { PoolKey } from "./types.js";

const POOL_KEY_ABI = parseAbiParameters("address, address, uint24, int24, address");

/**
 * Order two currencies the way pools do (numeric address order)
 */
export function sortCurrencies(a: Address, b: Address): [Address, Address] {
  if (sameAddress(a, b)) {
    throw new InvalidAddressError("currency", b);
  }
  return BigInt(a) < BigInt(b) ? [a, b] : [b, a];
}

export function buildPoolKey(params: {
  token: Address;
  pairedCurrency: Address;
  fee: number;
  tickSpacing: number;
  hooks: Address;
}): PoolKey {
  const [currency0, currency1] = sortCurrencies(params.token, params.pairedCurrency);
  return {
    currency0,
    currency1,
    fee: params.fee,
    tickSpacing: params.tickSpacing,
    hooks: params.hooks,
  };
}

/**
 * keccak256(abi.encode(poolKey))
 */
export function toPoolId(poolKey: PoolKey): Hex {
  return keccak256(
    encodeAbiParameters(POOL_KEY_ABI, [
      poolKey.currency0,
      poolKey.currency1,
      poolKey.fee,
      poolKey.tickSpacing,
      poolKey.hooks,
    ])
  );
}

/**
 * Which side of the pool a currency sits on
 */
export function isCurrency0(poolKey: PoolKey, currency: Address): boolean {
  if (sameAddress(poolKey.currency0, currency)) {
    return true;
  }
  if (sameAddress(poolKey.currency1, currency)) {
    return false;
  }
  throw new InvalidAddressError("currency", currency);
}

export function otherCurrency(poolKey: PoolKey, currency: Address): Address {
  return isCurrency0(poolKey, currency) ? poolKey.currency1 : poolKey.currency0;
}
