/**
 * Fixed-point helpers for the election math. Everything is bigint; floats only
 * appear when a value leaves the core for reporting.
 *
 * Loads and scores are integers in units of 1 / SCALE. All operands are
 * non-negative, so bigint division is floor division.
 */

export const SCALE = 10n ** 36n;

/** Parts-per-billion, the resolution of reported proportions. */
export const PERBILL = 1_000_000_000n;

export function saturatingSub(a: bigint, b: bigint): bigint {
  return a > b ? a - b : 0n;
}

export function sumBigInt(values: Iterable<bigint>): bigint {
  let total = 0n;
  for (const v of values) total += v;
  return total;
}

/** `part / whole` rounded down to parts-per-billion, as a float in [0, 1]. */
export function proportionOf(part: bigint, whole: bigint): number {
  if (whole === 0n) return 0;
  return Number((part * PERBILL) / whole) / Number(PERBILL);
}
