/**
 * Unit tests for generator factories.
 */
import { afterEach, describe, expect, it, vi } from "vitest";

import { URL_SAFE } from "../src/core/alphabet";
import {
  createIdGenerator,
  customAlphabet,
  customRandom,
  nanoid,
} from "../src/core/factory";
import { createSeededRandom } from "../src/core/random";
import {
  InvalidAlphabetError,
  InvalidSizeError,
  ValidationError,
} from "../src/errors";
import { createSequenceRandom } from "./test-utils";

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

describe("nanoid", () => {
  it("generates 21 URL-safe symbols by default", () => {
    const id = nanoid();

    expect(id).toHaveLength(21);
    expect([...id].every((symbol) => URL_SAFE.includes(symbol))).toBe(true);
  });

  it("accepts a custom size", () => {
    expect(nanoid(10)).toHaveLength(10);
    expect(nanoid(0)).toBe("");
  });

  it("rejects a negative size", () => {
    expect(() => nanoid(-1)).toThrow(InvalidSizeError);
  });
});

describe("customAlphabet", () => {
  it("generates from the given alphabet", () => {
    const orderNumber = customAlphabet("0123456789", 12);

    expect(orderNumber()).toMatch(/^\d{12}$/);
    expect(orderNumber(4)).toMatch(/^\d{4}$/);
  });

  it("validates the alphabet when the generator is created", () => {
    expect(() => customAlphabet("a")).toThrow(InvalidAlphabetError);
  });

  it("validates the default size when the generator is created", () => {
    expect(() => customAlphabet("ab", -1)).toThrow(InvalidSizeError);
  });

  it("validates the size of each call", () => {
    const generator = customAlphabet("ab");

    expect(() => generator(2.5)).toThrow(InvalidSizeError);
  });
});

describe("customRandom", () => {
  it("keeps drawing from the same source across calls", () => {
    const { random, calls } = createSequenceRandom([3, 8, 5, 6, 1]);
    const generator = customRandom("ab", 5, random);

    expect(generator()).toBe("babab");
    expect(generator()).toBe("abbab");
    expect(calls).toEqual([4, 4, 4, 4]);
  });
});

describe("createIdGenerator", () => {
  it("resolves named alphabets", () => {
    const generator = createIdGenerator({ alphabet: "HEX_LOWER", size: 32 });

    expect(generator()).toMatch(/^[0-9a-f]{32}$/);
  });

  it("uses the supplied random source", () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const generator = createIdGenerator({
      alphabet: "ab",
      size: 5,
      random: createSeededRandom(42),
    });

    expect(generator()).toBe("abbba");
  });

  it("defaults to 21 URL-safe symbols", () => {
    expect(createIdGenerator()()).toHaveLength(21);
  });

  it("reports malformed options as a ValidationError", () => {
    expect(() => createIdGenerator({ size: -1 })).toThrow(ValidationError);

    try {
      createIdGenerator({ size: -1 });
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.message).toBe("Invalid options for createIdGenerator: size");
        expect(error.details.issues.map((issue) => issue.path)).toEqual([
          "size",
        ]);
      }
    }
  });

  it("rejects unknown option keys", () => {
    try {
      createIdGenerator(JSON.parse('{"prefix":"usr_"}'));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.details.issues[0]?.code).toBe("unrecognized_keys");
      }
    }
  });

  it("rejects an unusable alphabet after name resolution", () => {
    expect(() => createIdGenerator({ alphabet: "aa" })).toThrow(
      InvalidAlphabetError,
    );
  });

  it("warns about low-entropy configurations in development", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    createIdGenerator({ alphabet: "ab", size: 10 });

    expect(warn).toHaveBeenCalledWith(
      "[nanoident] Generator configured with 10.0 bits of entropy; collisions become likely after about 2^5.0 identifiers.",
      { alphabetLength: 2, size: 10 },
    );
  });

  it("does not warn for the default configuration", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    createIdGenerator();

    expect(warn).not.toHaveBeenCalled();
  });

  it("stays silent in production", () => {
    vi.stubEnv("NODE_ENV", "production");
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    createIdGenerator({ alphabet: "ab", size: 10 });

    expect(warn).not.toHaveBeenCalled();
  });
});
