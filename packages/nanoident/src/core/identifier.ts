import { DEFAULT_ALPHABET, DEFAULT_SIZE } from "./alphabet";
import { generate } from "./generate";
import { getDefaultRandom, type RandomSource } from "./random";

const encoder = new TextEncoder();
const lenientDecoder = new TextDecoder("utf-8", {
  fatal: false,
  ignoreBOM: true,
});
const strictDecoder = new TextDecoder("utf-8", {
  fatal: true,
  ignoreBOM: true,
});

const FNV_OFFSET_BASIS = 0x81_1c_9d_c5;
const FNV_PRIME = 0x01_00_01_93;

/**
 * An immutable identifier: the UTF-8 bytes of a generated (or supplied)
 * string, compared by value.
 *
 * @example
 * ```typescript
 * const id = NanoId.generate();            // 21 symbols, URL_SAFE
 * const short = NanoId.generate(10);
 * const hex = NanoId.generate(32, HEX_LOWER);
 *
 * NanoId.fromString(id.toString()).equals(id); // true
 * ```
 */
export class NanoId {
  readonly #bytes: Uint8Array;

  /**
   * Wraps a byte sequence verbatim. Any bytes are accepted, including ones
   * the generator could not have produced. The bytes are copied.
   */
  constructor(bytes: Uint8Array) {
    this.#bytes = new Uint8Array(bytes);
  }

  static fromBytes(bytes: Uint8Array): NanoId {
    return new NanoId(bytes);
  }

  /**
   * Wraps the UTF-8 encoding of `value`. Inverse of {@link NanoId.toString}.
   */
  static fromString(value: string): NanoId {
    return new NanoId(encoder.encode(value));
  }

  /**
   * Generates a new identifier.
   *
   * With no arguments: 21 symbols from the URL-safe alphabet, drawn from
   * the process-wide secure random source. That shared source is the only
   * implicit default; pass `random` to supply your own.
   *
   * @throws InvalidSizeError | InvalidAlphabetError | RandomSourceError
   */
  static generate(
    size: number = DEFAULT_SIZE,
    alphabet: string = DEFAULT_ALPHABET,
    random: RandomSource = getDefaultRandom(),
  ): NanoId {
    return NanoId.fromString(generate(random, size, alphabet));
  }

  /**
   * Returns a copy of the underlying bytes.
   */
  asBytes(): Uint8Array {
    return this.#bytes.slice();
  }

  /**
   * Length in bytes, not symbols. The two coincide for ASCII alphabets.
   */
  size(): number {
    return this.#bytes.length;
  }

  /**
   * Decodes the bytes as UTF-8. Malformed sequences, which only raw-byte
   * construction can produce, decode to U+FFFD; this never throws.
   */
  toString(): string {
    return lenientDecoder.decode(this.#bytes);
  }

  /**
   * True if the bytes are valid UTF-8, i.e. {@link NanoId.toString}
   * substitutes nothing.
   */
  isWellFormed(): boolean {
    try {
      strictDecoder.decode(this.#bytes);
      return true;
    } catch (error) {
      if (error instanceof TypeError) {
        return false;
      }
      throw error;
    }
  }

  toJSON(): string {
    return this.toString();
  }

  /**
   * Value equality: `other` must be a NanoId holding the same bytes in the
   * same order.
   */
  equals(other: unknown): boolean {
    if (other === null || other === undefined) {
      return false;
    }

    if (!(other instanceof NanoId)) {
      return false;
    }

    if (other === this) {
      return true;
    }

    const otherBytes = other.#bytes;
    if (otherBytes.length !== this.#bytes.length) {
      return false;
    }

    for (let index = 0; index < otherBytes.length; index++) {
      if (otherBytes[index] !== this.#bytes[index]) {
        return false;
      }
    }
    return true;
  }

  /**
   * 32-bit FNV-1a hash of the bytes. Equal identifiers hash identically.
   */
  hashCode(): number {
    let hash = FNV_OFFSET_BASIS;
    for (const byte of this.#bytes) {
      hash ^= byte;
      hash = Math.imul(hash, FNV_PRIME);
    }
    return hash >>> 0;
  }
}
