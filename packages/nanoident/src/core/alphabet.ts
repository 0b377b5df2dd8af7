/**
 * Alphabets
 *
 * Pre-defined symbol sets for identifier generation, and the checks an
 * alphabet must pass before the generator will use it.
 */

import { InvalidAlphabetError } from "../errors";

/**
 * URL-safe alphabet (64 symbols): digits, Latin letters, underscore, hyphen.
 * 6 bits per symbol; 21 symbols carry 126 bits.
 */
export const URL_SAFE =
  "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ_abcdefghijklmnopqrstuvwxyz-";

/**
 * Alphanumeric (62 symbols).
 */
export const ALPHANUMERIC =
  "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";

/**
 * Lowercase alphanumeric (36 symbols).
 */
export const ALPHANUMERIC_LOWER = "0123456789abcdefghijklmnopqrstuvwxyz";

export const HEX_LOWER = "0123456789abcdef";

export const HEX_UPPER = "0123456789ABCDEF";

/**
 * Base58 (58 symbols). Leaves out 0, O, I and l, which are easy to confuse.
 */
export const BASE58 =
  "123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz";

export const NUMERIC = "0123456789";

export const DEFAULT_ALPHABET = URL_SAFE;

export const DEFAULT_SIZE = 21;

/**
 * The generator draws one byte per candidate symbol, so only the first 256
 * alphabet positions are reachable.
 */
export const MAX_ALPHABET_LENGTH = 256;

export const alphabets = {
  URL_SAFE,
  ALPHANUMERIC,
  ALPHANUMERIC_LOWER,
  HEX_LOWER,
  HEX_UPPER,
  BASE58,
  NUMERIC,
} as const;

export type AlphabetName = keyof typeof alphabets;

export function isAlphabetName(value: string): value is AlphabetName {
  return Object.hasOwn(alphabets, value);
}

/**
 * Resolves an alphabet name, or returns a custom alphabet unchanged.
 */
export function getAlphabet(nameOrCustom: string): string {
  return isAlphabetName(nameOrCustom) ? alphabets[nameOrCustom] : nameOrCustom;
}

/**
 * Splits an alphabet into symbols. A symbol is one Unicode code point.
 */
export function toSymbols(alphabet: string): readonly string[] {
  return Array.from(alphabet);
}

/**
 * Returns the alphabet's symbols, or throws InvalidAlphabetError if the
 * alphabet has fewer than 2 symbols, more than 256, or a repeated one.
 */
export function assertValidAlphabet(alphabet: string): readonly string[] {
  const symbols = toSymbols(alphabet);

  if (symbols.length === 0) {
    throw new InvalidAlphabetError("alphabet cannot be empty", {
      alphabetLength: 0,
    });
  }

  if (symbols.length === 1) {
    throw new InvalidAlphabetError("alphabet must have at least 2 symbols", {
      alphabetLength: 1,
    });
  }

  if (symbols.length > MAX_ALPHABET_LENGTH) {
    throw new InvalidAlphabetError(
      `alphabet cannot exceed ${MAX_ALPHABET_LENGTH} symbols`,
      { alphabetLength: symbols.length },
    );
  }

  const seen = new Set<string>();
  for (const symbol of symbols) {
    if (seen.has(symbol)) {
      throw new InvalidAlphabetError(`duplicate symbol "${symbol}"`, {
        alphabetLength: symbols.length,
        duplicate: symbol,
      });
    }
    seen.add(symbol);
  }

  return symbols;
}

/**
 * Returns null if the alphabet is usable, or the reason it is not.
 */
export function validateAlphabet(alphabet: string): string | null {
  try {
    assertValidAlphabet(alphabet);
    return null;
  } catch (error) {
    if (error instanceof InvalidAlphabetError) {
      return error.message;
    }
    throw error;
  }
}
