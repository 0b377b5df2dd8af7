/**
 * Statistical tests: generated symbols are uniform, with none of the skew
 * that reducing a byte modulo the alphabet length would introduce.
 *
 * Seeded sources keep every statistic below fixed across runs.
 */
import { describe, expect, it } from "vitest";

import { ALPHANUMERIC, URL_SAFE } from "../src/core/alphabet";
import { generate } from "../src/core/generate";
import { createSeededRandom } from "../src/core/random";
import { chiSquare, chiSquareBound, countSymbols } from "./test-utils";

describe("uniformity", () => {
  it("spreads each position evenly over the default alphabet", () => {
    const random = createSeededRandom(2024);
    const ids = Array.from({ length: 6400 }, () =>
      generate(random, 21, URL_SAFE),
    );
    const symbols = Array.from(URL_SAFE);
    const expected = symbols.map(() => 100);

    for (const position of [0, 10, 20]) {
      const counts = countSymbols(
        ids.map((id) => id.charAt(position)),
        symbols,
      );
      expect(chiSquare(counts, expected)).toBeLessThan(chiSquareBound(63));
    }
  });

  it("spreads a 62-symbol alphabet evenly", () => {
    const symbols = Array.from(ALPHANUMERIC);
    const id = generate(createSeededRandom(99), 62 * 2000, ALPHANUMERIC);

    const counts = countSymbols([id], symbols);

    expect(chiSquare(counts, symbols.map(() => 2000))).toBeLessThan(
      chiSquareBound(61),
    );
  });
});

describe("modulo bias", () => {
  // 256 % 200 = 56: byte % 200 would hit the first 56 symbols twice as often
  const symbols = Array.from({ length: 200 }, (_, index) =>
    String.fromCodePoint(0x1_00 + index),
  );
  const total = 200 * 1000;
  const counts = countSymbols(
    [generate(createSeededRandom(5), total, symbols.join(""))],
    symbols,
  );

  it("fits the uniform distribution", () => {
    expect(chiSquare(counts, symbols.map(() => total / 200))).toBeLessThan(
      chiSquareBound(199),
    );
  });

  it("does not fit the distribution modulo reduction would produce", () => {
    const moduloExpected = symbols.map((_, index) =>
      index < 56 ? (total * 2) / 256 : total / 256,
    );

    expect(chiSquare(counts, moduloExpected)).toBeGreaterThan(
      10 * chiSquareBound(199),
    );
  });

  it("gives low and high indices the same mean frequency", () => {
    const sum = (values: readonly number[]): number =>
      values.reduce((accumulator, value) => accumulator + value, 0);
    const lowMean = sum(counts.slice(0, 56)) / 56;
    const highMean = sum(counts.slice(56)) / 144;

    expect(lowMean / highMean).toBeGreaterThan(0.95);
    expect(lowMean / highMean).toBeLessThan(1.05);
  });
});
