/**
 * nanoident: short, URL-safe random identifiers without modulo bias.
 *
 * @example
 * ```typescript
 * import { NanoId, customAlphabet, nanoid } from "@nanoident/core";
 *
 * const id = NanoId.generate();      // 21 symbols, URL_SAFE alphabet
 * id.toString();                     // "V1StGXR8_Z5jdHi6B-myT"
 * id.equals(NanoId.fromString(id.toString())); // true
 *
 * nanoid();                          // plain string form
 * const pin = customAlphabet("0123456789", 6);
 * pin();                             // "482913"
 * ```
 */

// ============================================================
// Core
// ============================================================

export {
  ALPHANUMERIC,
  ALPHANUMERIC_LOWER,
  type AlphabetName,
  alphabets,
  assertValidAlphabet,
  assertValidSize,
  BASE58,
  computeMask,
  computeStep,
  createIdGenerator,
  createSeededRandom,
  customAlphabet,
  customRandom,
  DEFAULT_ALPHABET,
  DEFAULT_SIZE,
  generate,
  getAlphabet,
  getDefaultRandom,
  HEX_LOWER,
  HEX_UPPER,
  type IdGenerator,
  type IdGeneratorOptions,
  isAlphabetName,
  isValidNanoId,
  MAX_ALPHABET_LENGTH,
  MIN_RECOMMENDED_ENTROPY_BITS,
  NanoId,
  nanoid,
  type NanoIdFormat,
  nanoIdSchema,
  NUMERIC,
  type RandomSource,
  URL_SAFE,
  validateAlphabet,
  validateNanoId,
} from "./core";

// ============================================================
// Collision Math
// ============================================================

export {
  collisionProbability,
  entropyBits,
  idsUntilCollision,
} from "./utils/collision";

// ============================================================
// Errors
// ============================================================

export {
  type ErrorCategory,
  getErrorSuggestion,
  InvalidAlphabetError,
  InvalidSizeError,
  isNanoIdentError,
  isSystemError,
  isUserRecoverable,
  NanoIdentError,
  type NanoIdentErrorOptions,
  RandomSourceError,
  ValidationError,
  type ValidationErrorDetails,
  type ValidationIssue,
} from "./errors";
