/**
 * Generator factories.
 *
 * Each factory validates its alphabet once and returns a function that
 * produces identifier strings on demand.
 */

import { z } from "zod";

import { validateOptions } from "../errors/validation";
import { entropyBits } from "../utils/collision";
import { warnInDevelopment } from "../utils/env";
import {
  assertValidAlphabet,
  DEFAULT_ALPHABET,
  DEFAULT_SIZE,
  getAlphabet,
} from "./alphabet";
import { assertValidSize, generateFromSymbols } from "./generate";
import { getDefaultRandom, type RandomSource } from "./random";

/**
 * ID generator function type.
 */
export type IdGenerator = (size?: number) => string;

/**
 * Options for {@link createIdGenerator}.
 */
export type IdGeneratorOptions = Readonly<{
  /** Alphabet name (e.g. "HEX_LOWER") or custom symbols. Default: URL_SAFE */
  alphabet?: string;
  /** Default number of symbols. Default: 21 */
  size?: number;
  /** Random byte source. Default: the process-wide secure source */
  random?: RandomSource;
}>;

/**
 * Configurations below this many bits get a development warning.
 */
export const MIN_RECOMMENDED_ENTROPY_BITS = 64;

const idGeneratorOptionsSchema = z.strictObject({
  alphabet: z.string().optional(),
  size: z.number().int().nonnegative().optional(),
  random: z
    .custom<RandomSource>(
      (value) => typeof value === "function",
      "Expected a function (bytes: number) => Uint8Array",
    )
    .optional(),
});

function createGenerator(
  alphabet: string,
  defaultSize: number,
  random: RandomSource,
): IdGenerator {
  const symbols = assertValidAlphabet(alphabet);
  assertValidSize(defaultSize);

  return (size: number = defaultSize): string => {
    assertValidSize(size);
    return generateFromSymbols(random, size, symbols);
  };
}

const defaultGenerator = createGenerator(
  DEFAULT_ALPHABET,
  DEFAULT_SIZE,
  getDefaultRandom(),
);

/**
 * Generates an identifier string with the default alphabet and the secure
 * random source.
 *
 * @example
 * ```typescript
 * nanoid();   // "V1StGXR8_Z5jdHi6B-myT"
 * nanoid(10); // "IRFa-VaY2b"
 * ```
 */
export function nanoid(size: number = DEFAULT_SIZE): string {
  return defaultGenerator(size);
}

/**
 * Creates a generator for a custom alphabet.
 *
 * @example
 * ```typescript
 * const orderNumber = customAlphabet("0123456789", 12);
 * orderNumber();  // "839146257301"
 * orderNumber(4); // "5920"
 * ```
 */
export function customAlphabet(
  alphabet: string,
  defaultSize: number = DEFAULT_SIZE,
): IdGenerator {
  return createGenerator(alphabet, defaultSize, getDefaultRandom());
}

/**
 * Creates a generator for a custom alphabet and random source.
 */
export function customRandom(
  alphabet: string,
  defaultSize: number,
  random: RandomSource,
): IdGenerator {
  return createGenerator(alphabet, defaultSize, random);
}

/**
 * Creates a generator from a validated options object.
 *
 * @throws ValidationError if the options object is malformed
 * @throws InvalidAlphabetError if the resolved alphabet cannot be sampled
 *
 * @example
 * ```typescript
 * const sessionId = createIdGenerator({ alphabet: "BASE58", size: 24 });
 * sessionId();
 * ```
 */
export function createIdGenerator(
  options: IdGeneratorOptions = {},
): IdGenerator {
  const parsed = validateOptions(
    idGeneratorOptionsSchema,
    options,
    "createIdGenerator",
  );
  const alphabet = getAlphabet(parsed.alphabet ?? DEFAULT_ALPHABET);
  const size = parsed.size ?? DEFAULT_SIZE;
  const generator = createGenerator(
    alphabet,
    size,
    parsed.random ?? getDefaultRandom(),
  );

  const alphabetLength = Array.from(alphabet).length;
  const bits = entropyBits(alphabetLength, size);
  if (bits < MIN_RECOMMENDED_ENTROPY_BITS) {
    warnInDevelopment(
      `[nanoident] Generator configured with ${bits.toFixed(1)} bits of entropy; collisions become likely after about 2^${(bits / 2).toFixed(1)} identifiers.`,
      { alphabetLength, size },
    );
  }

  return generator;
}
