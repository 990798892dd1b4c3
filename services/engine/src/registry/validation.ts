/**
 * Maps zod validation failures of registry inputs onto the vault error taxonomy
 */

import type { z } from "zod";
import {
  bigIntSchema,
  InvalidAddressError,
  InvalidAmountError,
  InvalidConfigError,
  type VaultError,
} from "@givevault/shared";

const ADDRESS_FIELDS: ReadonlySet<string> = new Set(["owner", "payoutAddress", "pairedCurrency", "funder"]);
const AMOUNT_FIELDS: ReadonlySet<string> = new Set(["initialSupply", "tokenAmount", "pairedAmount"]);

function fieldValue(input: unknown, field: string): unknown {
  if (typeof input !== "object" || input === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(input, field);
  return value;
}

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

export function toValidationError(error: z.ZodError, input: unknown, subject: string): VaultError {
  const [first] = error.issues;
  const field = first && first.path.length === 1 ? String(first.path[0]) : undefined;

  if (field && ADDRESS_FIELDS.has(field)) {
    return new InvalidAddressError(field, String(fieldValue(input, field)));
  }
  if (field && AMOUNT_FIELDS.has(field)) {
    const parsed = bigIntSchema.safeParse(fieldValue(input, field));
    return new InvalidAmountError(field, parsed.success ? parsed.data : 0n);
  }
  return new InvalidConfigError(`Invalid ${subject}`, error.issues.map(formatIssue));
}

/**
 * Parse with a zod schema, throwing a VaultError on failure
 */
export function parseOrThrow<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  input: unknown,
  subject: string
): z.output<TSchema> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw toValidationError(result.error, input, subject);
  }
  return result.data;
}
