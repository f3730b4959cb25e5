/**
 * @file encode.ts
 * @description Encode exact real values into IEEE 754 bit patterns.
 *
 * The magnitude is expanded exactly into a significand holding the mantissa,
 * the implicit bit, GUARD_BITS extra bits and a sticky bit, then rounded to
 * nearest-even.  No host floating point is involved.
 */

import { FloatClass, exponentCodeFor, rowFor } from './classify.js';
import { EncodedValue } from './encoded.js';
import { LowlevelError } from './error.js';
import { type FieldLayout } from './layout.js';
import {
  type ExactRealValue,
  type RealInput,
  type RealValue,
  type Rational,
  ZERO,
  decimalMagnitude,
  floorLog2,
  leadingExponent,
  scaleToInteger,
  toRealValue,
} from './rational.js';
import { type int4, type uintb } from './types.js';

/**
 * Bits kept below the last mantissa bit before rounding.  The lowest of them
 * doubles as the sticky bit.
 */
export const GUARD_BITS = 3;

export interface EncodeOptions {
  /** Encode a zero Rational or bigint input as -0 */
  negativeZero?: boolean;
}

// ---------------------------------------------------------------------------
// Special encodings
// ---------------------------------------------------------------------------

/**
 * Build the encoding of a special class (zero, infinity or NaN) from its
 * classification table row.
 */
export function specialEncoding(cls: FloatClass, sgn: boolean, layout: FieldLayout): EncodedValue {
  const code = exponentCodeFor(cls, layout);
  if (code === null) {
    throw new LowlevelError('Class ' + FloatClass[cls] + ' has no fixed encoding');
  }
  // The nonzero-mantissa special is NaN; use the quiet bit
  const mantissa = rowFor(cls).mantissaZero ? 0n : 1n << BigInt(layout.mantissaBits - 1);
  return EncodedValue.assemble(sgn, code, mantissa, layout);
}

/** Get an encoded zero value */
export function getZeroEncoding(sgn: boolean, layout: FieldLayout): EncodedValue {
  return specialEncoding(FloatClass.zero, sgn, layout);
}

/** Get an encoded infinite value */
export function getInfinityEncoding(sgn: boolean, layout: FieldLayout): EncodedValue {
  return specialEncoding(FloatClass.infinity, sgn, layout);
}

/** Get the canonical quiet NaN: sign 0, exponent all ones, mantissa leading bit set */
export function getNaNEncoding(layout: FieldLayout): EncodedValue {
  return specialEncoding(FloatClass.nan, false, layout);
}

// ---------------------------------------------------------------------------
// Rounding
// ---------------------------------------------------------------------------

/**
 * floor(mag × 2^shift) with the lowest bit forced on when the expansion was
 * inexact, so the rounder can tell an exact tie from a value just above it.
 */
function expandSignificand(mag: Rational, shift: int4): uintb {
  const { quotient, inexact } = scaleToInteger(mag, shift);
  return inexact ? quotient | 1n : quotient;
}

/**
 * Round a significand to the nearest even at the given bit position.
 *
 * Bits below `lowbitpos` are discarded by the caller; this only adds the
 * half-unit when rounding up is required.
 */
export function roundToNearestEven(signif: uintb, lowbitpos: int4): { signif: uintb; rounded: boolean } {
  const lowbitmask = 1n << BigInt(lowbitpos);
  const midbitmask = 1n << BigInt(lowbitpos - 1);
  const epsmask = midbitmask - 1n;
  const odd = (signif & lowbitmask) !== 0n;
  if ((signif & midbitmask) !== 0n && ((signif & epsmask) !== 0n || odd)) {
    return { signif: signif + midbitmask, rounded: true };
  }
  return { signif, rounded: false };
}

// ---------------------------------------------------------------------------
// Range screening of decimal literals
// ---------------------------------------------------------------------------

/**
 * Settle a decimal literal against the range of the layout.
 *
 * A literal whose leading digit sits more than one decimal place above
 * 2^(maxFiniteExponent + 1) is Infinity; one whose next power of ten lies
 * below half the smallest denormal is zero.  Only literals between the two
 * have their power of ten built.
 */
export function resolveReal(real: RealValue, layout: FieldLayout): ExactRealValue {
  if (real.kind !== 'decimal') return real;
  const lead = leadingExponent(real);
  const log10of2 = Math.log10(2);
  if (lead > (layout.maxFiniteExponent() + 1) * log10of2 + 1) {
    return { kind: 'infinity', negative: real.negative };
  }
  if (lead < (layout.minExponent() - layout.mantissaBits - 1) * log10of2 - 1) {
    return { kind: 'finite', negative: real.negative, magnitude: ZERO };
  }
  return { kind: 'finite', negative: real.negative, magnitude: decimalMagnitude(real) };
}

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

/**
 * Encode a parsed real value under the given layout.
 */
export function encodeReal(value: RealValue, layout: FieldLayout): EncodedValue {
  const real = resolveReal(value, layout);
  if (real.kind === 'nan') return getNaNEncoding(layout);
  if (real.kind === 'infinity') return getInfinityEncoding(real.negative, layout);

  const sgn = real.negative;
  const mag = real.magnitude;
  if (mag.num === 0n) return getZeroEncoding(sgn, layout);

  const fracSize = layout.mantissaBits;
  let exp = floorLog2(mag);

  if (exp + layout.bias >= layout.maxExponent) {
    // Exponent is too big to represent
    return getInfinityEncoding(sgn, layout);
  }

  if (exp + layout.bias <= 0) {
    // Must be denormalized: value = mantissa × 2^(minExponent - fracSize)
    const signif = expandSignificand(mag, fracSize - layout.minExponent() + GUARD_BITS);
    const mantissa = roundToNearestEven(signif, GUARD_BITS).signif >> BigInt(GUARD_BITS);
    if (mantissa === 0n) {
      return getZeroEncoding(sgn, layout);
    }
    if ((mantissa >> BigInt(fracSize)) !== 0n) {
      // Rounded up into the smallest normalized value
      return EncodedValue.assemble(sgn, 1, 0n, layout);
    }
    return EncodedValue.assemble(sgn, 0, mantissa, layout);
  }

  // Leading 1 lands at bit fracSize + GUARD_BITS
  const signif = expandSignificand(mag, fracSize - exp + GUARD_BITS);
  let mantissa = roundToNearestEven(signif, GUARD_BITS).signif >> BigInt(GUARD_BITS);
  if ((mantissa >> BigInt(fracSize + 1)) !== 0n) {
    // Carry out of the significand
    mantissa = 1n << BigInt(fracSize);
    exp += 1;
    if (exp + layout.bias >= layout.maxExponent) {
      return getInfinityEncoding(sgn, layout);
    }
  }
  // Cut off the implicit bit
  return EncodedValue.assemble(sgn, exp + layout.bias, mantissa - (1n << BigInt(fracSize)), layout);
}

/**
 * Encode a real number into the given layout.
 *
 * @param value   a decimal string (`"-6.25"`, `"1/3"`, `"inf"`), an exact
 *                Rational, an integer, or a host number taken at its exact
 *                binary64 value
 * @param layout  the target field layout
 * @returns the rounded encoding; overflow gives Infinity, underflow gives a
 *          denormal or signed zero, NaN input gives the canonical quiet NaN
 */
export function encode(value: RealInput, layout: FieldLayout, options: EncodeOptions = {}): EncodedValue {
  return encodeReal(toRealValue(value, options.negativeZero ?? false), layout);
}
