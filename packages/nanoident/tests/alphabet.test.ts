/**
 * Unit tests for alphabets.
 */
import { describe, expect, it } from "vitest";

import {
  alphabets,
  assertValidAlphabet,
  DEFAULT_ALPHABET,
  getAlphabet,
  isAlphabetName,
  toSymbols,
  validateAlphabet,
} from "../src/core/alphabet";
import { InvalidAlphabetError } from "../src/errors";

describe("named alphabets", () => {
  it.each([
    ["URL_SAFE", 64],
    ["ALPHANUMERIC", 62],
    ["ALPHANUMERIC_LOWER", 36],
    ["HEX_LOWER", 16],
    ["HEX_UPPER", 16],
    ["BASE58", 58],
    ["NUMERIC", 10],
  ] as const)("%s has %i distinct symbols", (name, length) => {
    expect(assertValidAlphabet(alphabets[name])).toHaveLength(length);
  });

  it("defaults to digits, Latin letters, underscore and hyphen", () => {
    expect(DEFAULT_ALPHABET).toBe(
      "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ_abcdefghijklmnopqrstuvwxyz-",
    );
  });
});

describe("getAlphabet", () => {
  it("resolves a name", () => {
    expect(getAlphabet("HEX_UPPER")).toBe("0123456789ABCDEF");
  });

  it("returns a custom alphabet unchanged", () => {
    expect(getAlphabet("xyz")).toBe("xyz");
  });

  it("does not resolve inherited property names", () => {
    expect(isAlphabetName("toString")).toBe(false);
    expect(getAlphabet("toString")).toBe("toString");
  });
});

describe("toSymbols", () => {
  it("splits by code point", () => {
    expect(toSymbols("a🍎b")).toEqual(["a", "🍎", "b"]);
  });
});

describe("validateAlphabet", () => {
  it("returns null for a usable alphabet", () => {
    expect(validateAlphabet("ab")).toBeNull();
  });

  it.each([
    ["", "Invalid alphabet: alphabet cannot be empty"],
    ["a", "Invalid alphabet: alphabet must have at least 2 symbols"],
    ["abcb", 'Invalid alphabet: duplicate symbol "b"'],
  ])("describes why %j is unusable", (alphabet, reason) => {
    expect(validateAlphabet(alphabet)).toBe(reason);
  });

  it("caps alphabets at 256 symbols", () => {
    const symbols = Array.from({ length: 256 }, (_, index) =>
      String.fromCodePoint(0x1_00 + index),
    );

    expect(validateAlphabet(symbols.join(""))).toBeNull();
    expect(validateAlphabet(`${symbols.join("")}!`)).toBe(
      "Invalid alphabet: alphabet cannot exceed 256 symbols",
    );
  });
});

describe("assertValidAlphabet", () => {
  it("records the duplicate in the error details", () => {
    try {
      assertValidAlphabet("aba");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidAlphabetError);
      if (error instanceof InvalidAlphabetError) {
        expect(error.code).toBe("INVALID_ALPHABET");
        expect(error.details).toEqual({ alphabetLength: 3, duplicate: "a" });
      }
    }
  });
});
