/**
 * @fileoverview Math utilities and array helpers shared by the tournament,
 * proximity and review code.
 */

/** Source of uniform random numbers in [0, 1); injectable for tests */
export type RandomSource = () => number;

// ============================================================================
// STATISTICAL FUNCTIONS
// ============================================================================

/**
 * Calculates the mean (average) of an array of numbers.
 * Returns 0 for empty arrays.
 *
 * @example
 * mean([1, 2, 3, 4, 5]) // returns 3
 * mean([]) // returns 0
 */
export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, val) => sum + val, 0) / values.length;
}

/**
 * Clamps a value into [min, max].
 *
 * @example
 * clamp(15, 0, 10) // returns 10
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Rounds a number to a specified number of decimal places.
 *
 * @example
 * round(3.14159, 2) // returns 3.14
 */
export function round(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Rounds a number to 1 decimal place.
 */
export function round1(value: number): number {
  return round(value, 1);
}

// ============================================================================
// RANDOM SELECTION
// ============================================================================

/**
 * Random integer in [0, length). `random` must return values in [0, 1).
 */
export function randomIndex(length: number, random: RandomSource = Math.random): number {
  return Math.min(length - 1, Math.floor(random() * length));
}

/**
 * Fisher–Yates shuffle. Returns a new array; the input is untouched.
 *
 * @example
 * shuffle([1, 2, 3], () => 0) // returns [2, 3, 1]
 */
export function shuffle<T>(items: readonly T[], random: RandomSource = Math.random): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = randomIndex(i + 1, random);
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

// ============================================================================
// ARRAY HELPERS
// ============================================================================

/**
 * Splits an array into chunks of specified size.
 *
 * @example
 * chunk([1, 2, 3, 4, 5], 2) // returns [[1, 2], [3, 4], [5]]
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const result: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    result.push(items.slice(i, i + size));
  }
  return result;
}

/**
 * Key for an unordered pair: (a, b) and (b, a) map to the same string.
 */
export function unorderedPairKey(a: string, b: string): string {
  return a < b ? `${a}|${b}` : `${b}|${a}`;
}
