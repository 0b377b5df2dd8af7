import { type AlphabetName, alphabets, isAlphabetName } from "@nanoident/core";

import { type PerfCliOptions } from "./config";

function parseAlphabet(rawAlphabet: string): AlphabetName {
  if (isAlphabetName(rawAlphabet)) {
    return rawAlphabet;
  }

  throw new Error(
    `Unsupported alphabet: "${rawAlphabet}". Expected one of ${Object.keys(alphabets).join(", ")}.`,
  );
}

export function parseCliOptions(argv: readonly string[]): PerfCliOptions {
  const runChecks = argv.includes("--check");
  const alphabetArgument = argv.find((argument) =>
    argument.startsWith("--alphabet="),
  );
  const alphabet =
    alphabetArgument === undefined ? "ALPHANUMERIC" : (
      parseAlphabet(alphabetArgument.slice("--alphabet=".length))
    );

  return {
    runChecks,
    alphabet,
  };
}
