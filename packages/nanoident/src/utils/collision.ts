/**
 * Birthday-bound collision math for random identifiers.
 *
 * An identifier of `size` symbols from an alphabet of `alphabetSize`
 * symbols is one of `alphabetSize ** size` equally likely values.
 */

/**
 * Bits of entropy carried by one identifier.
 */
export function entropyBits(alphabetSize: number, size: number): number {
  return Math.log2(alphabetSize) * size;
}

/**
 * Probability that at least two of `count` identifiers are equal.
 */
export function collisionProbability(
  alphabetSize: number,
  size: number,
  count: number,
): number {
  if (count < 2) {
    return 0;
  }
  const space = alphabetSize ** size;
  const exponent = (count * (count - 1)) / (2 * space);
  return -Math.expm1(-exponent);
}

/**
 * Number of identifiers that can be generated before the probability of a
 * collision reaches `probability`.
 */
export function idsUntilCollision(
  alphabetSize: number,
  size: number,
  probability: number,
): number {
  if (probability <= 0) {
    return 0;
  }
  const space = alphabetSize ** size;
  if (probability >= 1) {
    // pigeonhole
    return space + 1;
  }
  return Math.sqrt(2 * space * -Math.log1p(-probability));
}
