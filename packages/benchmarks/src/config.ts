import { type AlphabetName } from "@nanoident/core";

export const BENCHMARK_CONFIG = {
  idsPerSample: 20_000,
  warmupIterations: 2,
  sampleIterations: 15,
} as const;

const BASE_GUARDRAILS = {
  defaultMsMax: 100,
  defaultToReferenceRatioMax: 3,
  customToReferenceRatioMax: 3,
  identifierToStringRatioMax: 4,
} as const;

const ALPHABET_GUARDRAIL_OVERRIDES: Partial<
  Record<AlphabetName, Partial<Guardrails>>
> = {
  // Only 10 of 16 masked values are accepted, so more batches are redrawn.
  NUMERIC: {
    customToReferenceRatioMax: 4,
  },
};

export type PerfCliOptions = Readonly<{
  runChecks: boolean;
  alphabet: AlphabetName;
}>;

export type Guardrails = Readonly<{
  defaultMsMax: number;
  defaultToReferenceRatioMax: number;
  customToReferenceRatioMax: number;
  identifierToStringRatioMax: number;
}>;

export function getGuardrails(alphabet: AlphabetName): Guardrails {
  return {
    ...BASE_GUARDRAILS,
    ...ALPHABET_GUARDRAIL_OVERRIDES[alphabet],
  };
}

export type GuardrailViolation = Readonly<{
  label: string;
  actual: number;
  expectedMax: number;
}>;

export type GenerationMetrics = Readonly<{
  /** nanoid() from this library */
  defaultMs: number;
  /** nanoid() from the reference package */
  referenceDefaultMs: number;
  /** customAlphabet() from this library, for the chosen alphabet */
  customMs: number;
  /** customAlphabet() from the reference package, for the chosen alphabet */
  referenceCustomMs: number;
  /** NanoId.generate(), including the UTF-8 encoding */
  identifierMs: number;
}>;
