/**
 * Candidate sets are 9-bit masks: bit (d - 1) is set when digit d is still
 * possible. 0 is the empty set (a dead cell).
 */
export type CandidateMask = number;

export const ALL_DIGITS: CandidateMask = 0x1ff;

export const DIGITS: readonly number[] = [1, 2, 3, 4, 5, 6, 7, 8, 9];

export function digitBit(digit: number): CandidateMask {
  return 1 << (digit - 1);
}

export function hasDigit(mask: CandidateMask, digit: number): boolean {
  return (mask & digitBit(digit)) !== 0;
}

export function popcount(mask: CandidateMask): number {
  let count = 0;
  while (mask) {
    mask &= mask - 1;
    count++;
  }
  return count;
}

export function isSingle(mask: CandidateMask): boolean {
  return mask !== 0 && (mask & (mask - 1)) === 0;
}

/** The digit held by a single-candidate mask, or 0 if the cell is not fixed. */
export function singleDigit(mask: CandidateMask): number {
  if (!isSingle(mask)) return 0;
  return 32 - Math.clz32(mask);
}

/** Digits of a mask in increasing order */
export function digitsOf(mask: CandidateMask): number[] {
  const digits: number[] = [];
  for (const d of DIGITS) {
    if (hasDigit(mask, d)) digits.push(d);
  }
  return digits;
}

export function maskOf(digits: Iterable<number>): CandidateMask {
  let mask = 0;
  for (const d of digits) mask |= digitBit(d);
  return mask;
}

/** True when every digit of `inner` is also in `outer` */
export function isSubsetOf(inner: CandidateMask, outer: CandidateMask): boolean {
  return (inner & ~outer) === 0;
}
