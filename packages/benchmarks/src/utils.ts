/**
 * Median of the sample timings; 0 when there are none.
 */
export function median(samples: readonly number[]): number {
  if (samples.length === 0) {
    return 0;
  }

  const sorted = samples.toSorted((left, right) => left - right);
  const upper = Math.floor(sorted.length / 2);
  const lower = sorted.length % 2 === 0 ? upper - 1 : upper;

  return (sorted[lower]! + sorted[upper]!) / 2;
}

export function nsPerId(sampleMs: number, idsPerSample: number): number {
  if (idsPerSample <= 0) {
    return 0;
  }
  return (sampleMs * 1_000_000) / idsPerSample;
}

/**
 * Formats one sample as wall time plus the per-identifier cost,
 * e.g. "10.0ms (500 ns/id)".
 */
export function formatSample(sampleMs: number, idsPerSample: number): string {
  return `${sampleMs.toFixed(1)}ms (${nsPerId(sampleMs, idsPerSample).toFixed(0)} ns/id)`;
}

// Reported when the reference timing rounds to zero.
const UNMEASURABLE_RATIO = 1_000_000;

export function safeRatio(candidateMs: number, referenceMs: number): number {
  return referenceMs > 0 ? candidateMs / referenceMs : UNMEASURABLE_RATIO;
}
