import {
  type GenerationMetrics,
  type Guardrails,
  type GuardrailViolation,
} from "./config";
import { safeRatio } from "./utils";

export function evaluateGuardrails(
  metrics: GenerationMetrics,
  guardrails: Guardrails,
): readonly GuardrailViolation[] {
  const violations: GuardrailViolation[] = [];

  if (metrics.defaultMs > guardrails.defaultMsMax) {
    violations.push({
      label: "nanoid() latency per sample (ms)",
      actual: metrics.defaultMs,
      expectedMax: guardrails.defaultMsMax,
    });
  }

  const defaultToReference = safeRatio(
    metrics.defaultMs,
    metrics.referenceDefaultMs,
  );
  if (defaultToReference > guardrails.defaultToReferenceRatioMax) {
    violations.push({
      label: "nanoid()/reference ratio",
      actual: defaultToReference,
      expectedMax: guardrails.defaultToReferenceRatioMax,
    });
  }

  const customToReference = safeRatio(
    metrics.customMs,
    metrics.referenceCustomMs,
  );
  if (customToReference > guardrails.customToReferenceRatioMax) {
    violations.push({
      label: "customAlphabet()/reference ratio",
      actual: customToReference,
      expectedMax: guardrails.customToReferenceRatioMax,
    });
  }

  const identifierToString = safeRatio(metrics.identifierMs, metrics.defaultMs);
  if (identifierToString > guardrails.identifierToStringRatioMax) {
    violations.push({
      label: "NanoId.generate()/nanoid() ratio",
      actual: identifierToString,
      expectedMax: guardrails.identifierToStringRatioMax,
    });
  }

  return violations;
}

export function printSummary(metrics: GenerationMetrics): void {
  const defaultToReference = safeRatio(
    metrics.defaultMs,
    metrics.referenceDefaultMs,
  );
  const customToReference = safeRatio(
    metrics.customMs,
    metrics.referenceCustomMs,
  );
  const identifierToString = safeRatio(metrics.identifierMs, metrics.defaultMs);
  console.log("\nRatios:");
  console.log(`nanoid()/reference: ${defaultToReference.toFixed(2)}x`);
  console.log(`customAlphabet()/reference: ${customToReference.toFixed(2)}x`);
  console.log(`NanoId.generate()/nanoid(): ${identifierToString.toFixed(2)}x`);
}

export function printGuardrailFailures(
  violations: readonly GuardrailViolation[],
): void {
  console.error("\nPerformance guardrail failures:");

  for (const violation of violations) {
    console.error(
      `- ${violation.label}: ${violation.actual.toFixed(2)} > ${violation.expectedMax.toFixed(2)}`,
    );
  }
}
