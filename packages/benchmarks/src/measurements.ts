import { performance } from "node:perf_hooks";

import {
  type AlphabetName,
  alphabets,
  customAlphabet,
  NanoId,
  nanoid,
} from "@nanoident/core";
import {
  customAlphabet as referenceCustomAlphabet,
  nanoid as referenceNanoid,
} from "nanoid";

import { BENCHMARK_CONFIG, type GenerationMetrics } from "./config";
import { formatSample, median } from "./utils";

function benchmarkGeneration(label: string, generateOne: () => unknown): number {
  const run = (): void => {
    for (let index = 0; index < BENCHMARK_CONFIG.idsPerSample; index += 1) {
      generateOne();
    }
  };

  for (
    let iteration = 0;
    iteration < BENCHMARK_CONFIG.warmupIterations;
    iteration += 1
  ) {
    run();
  }

  const samples: number[] = [];
  for (
    let iteration = 0;
    iteration < BENCHMARK_CONFIG.sampleIterations;
    iteration += 1
  ) {
    const startedAt = performance.now();
    run();
    samples.push(performance.now() - startedAt);
  }

  const result = median(samples);
  console.log(
    `${label}: ${formatSample(result, BENCHMARK_CONFIG.idsPerSample)}`,
  );
  return result;
}

export function measureGeneration(
  alphabetName: AlphabetName,
): GenerationMetrics {
  const alphabet = alphabets[alphabetName];
  const custom = customAlphabet(alphabet);
  const referenceCustom = referenceCustomAlphabet(alphabet);

  const defaultMs = benchmarkGeneration("nanoid()", () => nanoid());
  const referenceDefaultMs = benchmarkGeneration("reference nanoid()", () =>
    referenceNanoid(),
  );
  const customMs = benchmarkGeneration(
    `customAlphabet(${alphabetName})()`,
    () => custom(),
  );
  const referenceCustomMs = benchmarkGeneration(
    `reference customAlphabet(${alphabetName})()`,
    () => referenceCustom(),
  );
  const identifierMs = benchmarkGeneration("NanoId.generate()", () =>
    NanoId.generate(),
  );

  return {
    defaultMs,
    referenceDefaultMs,
    customMs,
    referenceCustomMs,
    identifierMs,
  };
}
