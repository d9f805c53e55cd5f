/**
 * @mirrorchain/core/phi-math - Fixed-Point Golden Ratio
 *
 * Φ as a scaled integer, so that anything multiplied by it produces the
 * same bits on every platform. Two independent derivations are provided
 * (closed form and Fibonacci limit) and agree exactly at any precision.
 *
 * Also carries the bidirectional Fibonacci helpers the ledger's numeric
 * model is built from.
 *
 * @module
 */

/**
 * Decimal digits of Φ carried by PHI_FIXED.
 * Large enough that floor(x * Φ) is exact for any 256-bit x.
 */
export const PHI_PRECISION = 100;

/**
 * 10^PHI_PRECISION
 */
export const PHI_SCALE = 10n ** BigInt(PHI_PRECISION);

function scaleFor(precision: number): bigint {
  if (!Number.isInteger(precision) || precision < 0) {
    throw new RangeError(`precision must be a non-negative integer, got ${precision}`);
  }
  return 10n ** BigInt(precision);
}

/**
 * Integer square root: floor(sqrt(n)), Newton iteration
 */
export function isqrt(n: bigint): bigint {
  if (n < 0n) {
    throw new RangeError('isqrt of a negative number');
  }
  if (n < 2n) {
    return n;
  }

  let x = n;
  let y = (x + 1n) / 2n;
  while (y < x) {
    x = y;
    y = (x + n / x) / 2n;
  }
  return x;
}

/**
 * floor(Φ * 10^precision) from Φ = (1 + √5) / 2
 */
export function phiFromClosedForm(precision: number = PHI_PRECISION): bigint {
  const scale = scaleFor(precision);
  return (scale + isqrt(5n * scale * scale)) / 2n;
}

/**
 * floor(Φ * 10^precision) as the limit of F(n+1) / F(n).
 *
 * Consecutive ratios alternate above and below Φ, so once two of them
 * truncate to the same integer that integer is floor(Φ * scale).
 */
export function phiFromFibonacci(precision: number = PHI_PRECISION, maxTerms = 10_000): bigint {
  const scale = scaleFor(precision);
  let a = 1n;
  let b = 1n;
  let previous: bigint | null = null;

  for (let i = 0; i < maxTerms; i++) {
    [a, b] = [b, a + b];
    const ratio = (b * scale) / a;
    if (ratio === previous) {
      return ratio;
    }
    previous = ratio;
  }

  throw new Error(`Fibonacci ratios did not settle within ${maxTerms} terms`);
}

/**
 * floor(Φ * PHI_SCALE)
 */
export const PHI_FIXED = phiFromClosedForm(PHI_PRECISION);

/**
 * floor(Φ² * PHI_SCALE); Φ² = Φ + 1 holds exactly in this representation
 */
export const PHI_SQUARED_FIXED = PHI_FIXED + PHI_SCALE;

/**
 * Convert a fixed-point value to a float. Display and statistics only.
 */
export function fixedToNumber(value: bigint, scale: bigint = PHI_SCALE): number {
  return Number(value) / Number(scale);
}

/**
 * Fixed-point Φ^n for any integer n, truncating at each step.
 * Negative powers use 1/Φ = Φ - 1.
 */
export function phiPower(n: number, precision: number = PHI_PRECISION): bigint {
  if (!Number.isInteger(n)) {
    throw new RangeError(`phiPower exponent must be an integer, got ${n}`);
  }
  const scale = scaleFor(precision);
  const phi = precision === PHI_PRECISION ? PHI_FIXED : phiFromClosedForm(precision);
  const factor = n >= 0 ? phi : phi - scale;

  let result = scale;
  for (let i = 0; i < Math.abs(n); i++) {
    result = (result * factor) / scale;
  }
  return result;
}

/**
 * Bidirectional Fibonacci: F(-n) = (-1)^(n+1) * F(n)
 */
export function fib(n: number): bigint {
  if (!Number.isInteger(n)) {
    throw new RangeError(`Fibonacci index must be an integer, got ${n}`);
  }

  const k = Math.abs(n);
  let a = 0n;
  let b = 1n;
  for (let i = 0; i < k; i++) {
    [a, b] = [b, a + b];
  }

  return n < 0 && k % 2 === 0 ? -a : a;
}

/**
 * Yields F(0) .. F(count - 1)
 */
export function* fibonacci(count: number): Generator<bigint> {
  let a = 0n;
  let b = 1n;

  for (let i = 0; i < count; i++) {
    yield a;
    [a, b] = [b, a + b];
  }
}

/**
 * Zeckendorf representation: the unique sum of non-consecutive Fibonacci
 * numbers, largest first. Terms carry the sign of n; 0 has no terms.
 */
export function zeckendorf(n: bigint): bigint[] {
  const magnitude = n < 0n ? -n : n;
  if (magnitude === 0n) {
    return [];
  }

  // 1, 2, 3, 5, ... (F(2) onwards, so 1 appears once)
  const terms: bigint[] = [];
  let a = 1n;
  let b = 2n;
  while (a <= magnitude) {
    terms.push(a);
    [a, b] = [b, a + b];
  }

  const result: bigint[] = [];
  let remainder = magnitude;
  for (let i = terms.length - 1; i >= 0 && remainder > 0n; i--) {
    const term = terms[i];
    if (term <= remainder) {
      result.push(n < 0n ? -term : term);
      remainder -= term;
    }
  }
  return result;
}

function isPerfectSquare(n: bigint): boolean {
  if (n < 0n) {
    return false;
  }
  const root = isqrt(n);
  return root * root === n;
}

/**
 * n is a Fibonacci number iff 5n² + 4 or 5n² - 4 is a perfect square
 */
export function isFibonacciNumber(n: bigint): boolean {
  if (n < 0n) {
    return false;
  }
  const t = 5n * n * n;
  return isPerfectSquare(t + 4n) || isPerfectSquare(t - 4n);
}
