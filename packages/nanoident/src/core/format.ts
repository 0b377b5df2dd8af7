/**
 * Identifier format checks.
 *
 * Contract: a well-formed identifier is a string of exactly `size` symbols,
 * each a member of `alphabet`. Symbols are counted in code points.
 */

import { z } from "zod";

import { ValidationError } from "../errors";
import {
  DEFAULT_ALPHABET,
  DEFAULT_SIZE,
  getAlphabet,
  toSymbols,
} from "./alphabet";

export type NanoIdFormat = Readonly<{
  /** Alphabet name or custom symbols. Default: URL_SAFE */
  alphabet?: string;
  /** Expected number of symbols. Default: 21 */
  size?: number;
}>;

function resolveFormat(format: NanoIdFormat): {
  symbols: ReadonlySet<string>;
  size: number;
} {
  return {
    symbols: new Set(
      toSymbols(getAlphabet(format.alphabet ?? DEFAULT_ALPHABET)),
    ),
    size: format.size ?? DEFAULT_SIZE,
  };
}

function matchesFormat(
  value: string,
  symbols: ReadonlySet<string>,
  size: number,
): boolean {
  const valueSymbols = toSymbols(value);
  return (
    valueSymbols.length === size &&
    valueSymbols.every((symbol) => symbols.has(symbol))
  );
}

/**
 * Checks if a value is a well-formed identifier string.
 *
 * @example
 * ```typescript
 * isValidNanoId("V1StGXR8_Z5jdHi6B-myT");                    // true
 * isValidNanoId("deadbeef", { alphabet: "HEX_LOWER", size: 8 }); // true
 * isValidNanoId("not an id");                                // false
 * ```
 */
export function isValidNanoId(
  value: unknown,
  format: NanoIdFormat = {},
): value is string {
  if (typeof value !== "string") {
    return false;
  }
  const { symbols, size } = resolveFormat(format);
  return matchesFormat(value, symbols, size);
}

/**
 * Validates that a value is a well-formed identifier string.
 *
 * @param value - Value to validate
 * @param fieldName - Name of field for error message
 * @returns The validated string
 * @throws ValidationError if the value is not well-formed
 */
export function validateNanoId(
  value: unknown,
  fieldName: string,
  format: NanoIdFormat = {},
): string {
  if (isValidNanoId(value, format)) {
    return value;
  }

  const size = format.size ?? DEFAULT_SIZE;
  const alphabet = format.alphabet ?? "URL_SAFE";
  throw new ValidationError(
    `Invalid identifier for "${fieldName}": expected ${size} symbols from ${alphabet}`,
    {
      issues: [
        {
          path: fieldName,
          message: `Expected ${size} symbols from ${alphabet}, got: ${JSON.stringify(value) ?? String(value)}`,
        },
      ],
    },
  );
}

/**
 * Zod schema for a well-formed identifier string.
 *
 * @example
 * ```typescript
 * const UserSchema = z.object({
 *   id: nanoIdSchema(),
 *   inviteCode: nanoIdSchema({ alphabet: "BASE58", size: 10 }),
 * });
 * ```
 */
export function nanoIdSchema(format: NanoIdFormat = {}): z.ZodString {
  const { symbols, size } = resolveFormat(format);
  const alphabet = format.alphabet ?? "URL_SAFE";
  return z.string().refine((value) => matchesFormat(value, symbols, size), {
    error: `Expected ${size} symbols from ${alphabet}`,
  });
}
