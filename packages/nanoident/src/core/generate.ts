/**
 * Bias-free identifier generation.
 *
 * Masked rejection sampling: each random byte is reduced with the smallest
 * all-ones mask covering the alphabet's index range, and indices past the
 * end of the alphabet are discarded. Every accepted index is equally
 * likely, whatever the alphabet length.
 */

import { InvalidSizeError, RandomSourceError } from "../errors";
import { assertValidAlphabet } from "./alphabet";
import { type RandomSource } from "./random";

/**
 * Smallest all-ones bitmask that is >= `alphabetLength - 1`.
 * Equivalent to `(2 << floor(log2(alphabetLength - 1))) - 1`.
 */
export function computeMask(alphabetLength: number): number {
  return (2 << (31 - Math.clz32(alphabetLength - 1))) - 1;
}

/**
 * Number of random bytes drawn per batch. The 1.6 factor over-provisions
 * for rejected bytes so most identifiers need a single batch.
 */
export function computeStep(
  mask: number,
  size: number,
  alphabetLength: number,
): number {
  return Math.ceil((1.6 * mask * size) / alphabetLength);
}

export function assertValidSize(size: number): void {
  if (!Number.isSafeInteger(size) || size < 0) {
    throw new InvalidSizeError(size);
  }
}

/**
 * Generates a string of exactly `size` symbols drawn uniformly and
 * independently from `alphabet`.
 *
 * @param random - Source of uniformly distributed random bytes
 * @param size - Number of symbols; 0 returns "" without drawing any bytes
 * @param alphabet - 2 to 256 distinct symbols (code points)
 * @throws InvalidSizeError if size is not a non-negative integer
 * @throws InvalidAlphabetError if the alphabet cannot be sampled
 * @throws RandomSourceError if `random` returns fewer bytes than requested
 */
export function generate(
  random: RandomSource,
  size: number,
  alphabet: string,
): string {
  assertValidSize(size);
  const symbols = assertValidAlphabet(alphabet);
  return generateFromSymbols(random, size, symbols);
}

/**
 * Sampling loop over pre-validated symbols. Callers that validate an
 * alphabet once and generate many identifiers go through here.
 */
export function generateFromSymbols(
  random: RandomSource,
  size: number,
  symbols: readonly string[],
): string {
  if (size === 0) {
    return "";
  }

  const mask = computeMask(symbols.length);
  const step = computeStep(mask, size, symbols.length);

  let id = "";
  let count = 0;

  for (;;) {
    const bytes = random(step);
    if (bytes.length < step) {
      throw new RandomSourceError({ requested: step, received: bytes.length });
    }

    for (let index = 0; index < step; index++) {
      const candidate = bytes[index]! & mask;
      if (candidate < symbols.length) {
        id += symbols[candidate]!;
        count++;
        if (count === size) {
          return id;
        }
      }
    }
  }
}
