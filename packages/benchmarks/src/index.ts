import {
  createIdGenerator,
  customAlphabet,
  HEX_LOWER,
  NanoId,
  nanoid,
} from "@nanoident/core";
import {
  customAlphabet as referenceCustomAlphabet,
  nanoid as referenceNanoid,
} from "nanoid";
import { Bench } from "tinybench";

// ============================================================
// Setup
// ============================================================

const hex = customAlphabet(HEX_LOWER, 32);
const referenceHex = referenceCustomAlphabet(HEX_LOWER, 32);
const configured = createIdGenerator({ alphabet: "BASE58", size: 22 });
const existing = NanoId.generate();

console.log("Starting benchmarks...");

const bench = new Bench({ time: 1000 });

bench
  .add("nanoid()", () => {
    nanoid();
  })
  .add("reference nanoid()", () => {
    referenceNanoid();
  })
  .add("customAlphabet(HEX_LOWER, 32)()", () => {
    hex();
  })
  .add("reference customAlphabet(HEX_LOWER, 32)()", () => {
    referenceHex();
  })
  .add("createIdGenerator(BASE58, 22)()", () => {
    configured();
  })
  .add("NanoId.generate()", () => {
    NanoId.generate();
  })
  .add("NanoId#equals + hashCode", () => {
    NanoId.fromString(existing.toString()).equals(existing);
    existing.hashCode();
  });

await bench.run();

console.table(bench.table());
