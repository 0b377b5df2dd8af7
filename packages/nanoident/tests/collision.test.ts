/**
 * Unit tests for birthday-bound collision math.
 */
import { describe, expect, it } from "vitest";

import {
  collisionProbability,
  entropyBits,
  idsUntilCollision,
} from "../src/utils/collision";

describe("entropyBits", () => {
  it("multiplies bits per symbol by size", () => {
    expect(entropyBits(64, 21)).toBe(126);
    expect(entropyBits(16, 32)).toBe(128);
    expect(entropyBits(2, 0)).toBe(0);
  });
});

describe("collisionProbability", () => {
  it("is zero for fewer than two identifiers", () => {
    expect(collisionProbability(2, 1, 0)).toBe(0);
    expect(collisionProbability(2, 1, 1)).toBe(0);
  });

  it("follows the birthday bound", () => {
    expect(collisionProbability(2, 1, 2)).toBeCloseTo(0.393_469_34, 8);
  });

  it("keeps precision for tiny probabilities", () => {
    const probability = collisionProbability(64, 21, 1_000_000);

    expect(probability).toBeGreaterThan(5.8e-27);
    expect(probability).toBeLessThan(5.9e-27);
  });
});

describe("idsUntilCollision", () => {
  it("inverts the birthday bound", () => {
    expect(idsUntilCollision(16, 4, 0.5)).toBeCloseTo(301.417, 3);
    expect(collisionProbability(16, 4, 301)).toBeCloseTo(0.5, 2);
  });

  it("returns 0 for a zero probability", () => {
    expect(idsUntilCollision(16, 4, 0)).toBe(0);
  });

  it("returns one more than the space size for certainty", () => {
    expect(idsUntilCollision(2, 3, 1)).toBe(9);
  });
});
