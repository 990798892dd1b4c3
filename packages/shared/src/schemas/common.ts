/**
 * Common Schema Primitives
 * Shared types used across all schemas
 */

import { z } from "zod";
import { getAddress, isAddress, type Address } from "viem";
import { WAD, ZERO_ADDRESS } from "../constants/index.js";
import { InvalidAddressError } from "../errors/index.js";

// ============================================
// PRIMITIVE SCHEMAS
// ============================================

/** EVM address, normalized to its checksummed form */
export const addressSchema = z
  .string()
  .refine((value): value is Address => isAddress(value, { strict: false }), "Invalid address")
  .transform((value) => getAddress(value));

/** Address that must not be the zero sentinel */
export const nonZeroAddressSchema = addressSchema.refine(
  (value) => value !== ZERO_ADDRESS,
  "Zero address is not allowed"
);

/**
 * Checksummed form of an address, so that differently cased spellings name
 * the same account. Throws InvalidAddressError for malformed input.
 */
export function normalizeAddress(value: string, field = "address"): Address {
  if (!isAddress(value, { strict: false })) {
    throw new InvalidAddressError(field, value);
  }
  return getAddress(value);
}

/** Address equality regardless of letter case */
export function sameAddress(a: string, b: string): boolean {
  return normalizeAddress(a) === normalizeAddress(b);
}

/**
 * Integer amount in smallest units.
 * Accepts bigint, decimal string or safe integer so values survive JSON/env round trips.
 */
export const bigIntSchema = z.union([
  z.bigint(),
  z.string().regex(/^-?\d+$/, "Amount must be an integer string").transform((val) => BigInt(val)),
  z.number().int().transform((val) => BigInt(val)),
]);

export const positiveAmountSchema = bigIntSchema.pipe(z.bigint().positive());

/** Fraction scaled by 1e18 (1e18 = 100%) */
export const fractionSchema = bigIntSchema.pipe(
  z.bigint().min(0n, "Fraction cannot be negative").max(WAD, "Fraction cannot exceed 1e18")
);

/** Duration or count in whole seconds/blocks */
export const nonNegativeIntSchema = z.number().int().nonnegative();
