import { randomFillSync } from "node:crypto";

/**
 * A source of uniformly distributed random bytes.
 * Must return a Uint8Array of exactly `bytes` length.
 */
export type RandomSource = (bytes: number) => Uint8Array;

// ============================================================
// Secure Default
// ============================================================

const POOL_SIZE = 4096;

let pool: Uint8Array | undefined;
let poolOffset = 0;

function secureRandom(bytes: number): Uint8Array {
  if (bytes > POOL_SIZE) {
    return randomFillSync(new Uint8Array(bytes));
  }

  if (pool === undefined) {
    pool = randomFillSync(new Uint8Array(POOL_SIZE));
    poolOffset = 0;
  } else if (poolOffset + bytes > pool.length) {
    randomFillSync(pool);
    poolOffset = 0;
  }

  // slice, not subarray: callers own the returned bytes
  const result = pool.slice(poolOffset, poolOffset + bytes);
  poolOffset += bytes;
  return result;
}

/**
 * Returns the process-wide cryptographically secure random source.
 *
 * Backed by `crypto.randomFillSync` through a fixed 4 KiB entropy pool that
 * is allocated on first use and refilled in place. Requests larger than the
 * pool are filled into a fresh buffer and leave the pool untouched. Every
 * call returns bytes no other call has seen.
 */
export function getDefaultRandom(): RandomSource {
  return secureRandom;
}

// ============================================================
// Seeded Source
// ============================================================

/**
 * Creates a deterministic random source from a 32-bit seed (mulberry32).
 *
 * NOT cryptographically secure. Use it for tests and reproducible
 * fixtures only; identifiers from it are trivially guessable.
 *
 * @example
 * ```typescript
 * const random = createSeededRandom(42);
 * NanoId.generate(8, HEX_LOWER, random).toString(); // same value on every run
 * ```
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;

  const nextWord = (): number => {
    state = (state + 0x6d_2b_79_f5) >>> 0;
    let value = state;
    value = Math.imul(value ^ (value >>> 15), value | 1);
    value ^= value + Math.imul(value ^ (value >>> 7), value | 61);
    return (value ^ (value >>> 14)) >>> 0;
  };

  return (bytes: number): Uint8Array => {
    const result = new Uint8Array(bytes);
    for (let index = 0; index < bytes; index += 4) {
      const word = nextWord();
      for (let shift = 0; shift < 4 && index + shift < bytes; shift++) {
        result[index + shift] = (word >>> (shift * 8)) & 0xff;
      }
    }
    return result;
  };
}
