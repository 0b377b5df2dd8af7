export {
  ALPHANUMERIC,
  ALPHANUMERIC_LOWER,
  type AlphabetName,
  alphabets,
  assertValidAlphabet,
  BASE58,
  DEFAULT_ALPHABET,
  DEFAULT_SIZE,
  getAlphabet,
  HEX_LOWER,
  HEX_UPPER,
  isAlphabetName,
  MAX_ALPHABET_LENGTH,
  NUMERIC,
  URL_SAFE,
  validateAlphabet,
} from "./alphabet";
export {
  createIdGenerator,
  customAlphabet,
  customRandom,
  type IdGenerator,
  type IdGeneratorOptions,
  MIN_RECOMMENDED_ENTROPY_BITS,
  nanoid,
} from "./factory";
export {
  isValidNanoId,
  type NanoIdFormat,
  nanoIdSchema,
  validateNanoId,
} from "./format";
export {
  assertValidSize,
  computeMask,
  computeStep,
  generate,
} from "./generate";
export { NanoId } from "./identifier";
export {
  createSeededRandom,
  getDefaultRandom,
  type RandomSource,
} from "./random";
