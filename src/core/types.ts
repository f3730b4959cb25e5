/**
 * @file types.ts
 * @description Shared integer aliases and bigint bit helpers for the codec.
 *
 *   int4  → number (bit widths, exponents, precisions)
 *   uintb → bigint (encoded bit patterns of any width)
 */

/** Signed integer that always fits a JS number */
export type int4 = number;

/** Unsigned big integer holding an encoded bit pattern */
export type uintb = bigint;

/** Sign of a value: +1 or -1 */
export type Sign = 1 | -1;

/** Mask for an n-bit value: all 1s in the low `bits` positions. */
export function bitMask(bits: int4): uintb {
  if (bits <= 0) return 0n;
  return (1n << BigInt(bits)) - 1n;
}

/** Number of significant bits in a non-negative bigint (0 for 0n). */
export function bitLength(val: bigint): int4 {
  if (val <= 0n) return 0;
  return val.toString(2).length;
}

/** Absolute value of a bigint */
export function bigAbs(val: bigint): bigint {
  return val < 0n ? -val : val;
}
