/**
 * Shared fast-check arbitraries for nanoident property tests.
 */
import fc from "fast-check";

/**
 * Alphabets of 2 to 256 distinct code points, mixing BMP and astral
 * symbols. Surrogate code points are never drawn.
 */
export const alphabetArb = fc
  .uniqueArray(
    fc.oneof(
      fc.integer({ min: 0x21, max: 0x7e }),
      fc.integer({ min: 0xa1, max: 0x2_ff }),
      fc.integer({ min: 0x1_f3_00, max: 0x1_f5_ff }),
    ),
    { minLength: 2, maxLength: 256 },
  )
  .map((codePoints) => String.fromCodePoint(...codePoints));

/**
 * Identifier sizes, including 0.
 */
export const sizeArb = fc.nat({ max: 64 });

export const seedArb = fc.integer();

/**
 * Well-formed text: strings of whole graphemes, plus edge cases.
 */
export const textArb = fc.oneof(
  fc.string(),
  fc.string({ unit: "grapheme" }),
  fc.constant(""),
  fc.constantFrom("\uFEFFleading BOM", "日本語", "🎉🚀💻", "Tab\there"),
);
