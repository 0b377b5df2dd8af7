import { parseCliOptions } from "./cli";
import { BENCHMARK_CONFIG, getGuardrails } from "./config";
import {
  evaluateGuardrails,
  printGuardrailFailures,
  printSummary,
} from "./guardrails";
import { measureGeneration } from "./measurements";

function main(argv: readonly string[]): void {
  const options = parseCliOptions(argv);
  console.log(
    `nanoident perf sanity (${options.runChecks ? "guardrail mode" : "report mode"}, alphabet=${options.alphabet}, ${BENCHMARK_CONFIG.idsPerSample} ids/sample)`,
  );

  const metrics = measureGeneration(options.alphabet);
  printSummary(metrics);

  if (!options.runChecks) {
    return;
  }

  const violations = evaluateGuardrails(
    metrics,
    getGuardrails(options.alphabet),
  );
  if (violations.length > 0) {
    printGuardrailFailures(violations);
    process.exitCode = 1;
    return;
  }

  console.log("\nAll performance guardrails passed.");
}

main(process.argv.slice(2));
