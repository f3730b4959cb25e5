/**
 * @file decode.ts
 * @description Decode IEEE 754 bit patterns into exact values.
 */

import { FloatClass } from './classify.js';
import { EncodedValue } from './encoded.js';
import { MalformedInputError } from './error.js';
import { type FieldLayout } from './layout.js';
import { type Rational, equals, mulPow2 } from './rational.js';
import { type int4, type Sign } from './types.js';

/** A finite nonzero value: sign × significand × 2^(exponent - mantissaBits) */
interface FiniteFields {
  sign: Sign;
  /** The exact value, sign included */
  value: Rational;
  /** Unbiased exponent of the leading significand bit position */
  exponent: int4;
  /** The significand as an integer, implicit bit included when normalized */
  significand: bigint;
}

/** The decoded value of an encoding, tagged by its class */
export type DecodedValue =
  | ({ type: FloatClass.normalized } & FiniteFields)
  | ({ type: FloatClass.denormalized } & FiniteFields)
  | { type: FloatClass.zero; sign: Sign }
  | { type: FloatClass.infinity; sign: Sign }
  | { type: FloatClass.nan };

/** Bits accepted by decode(): an encoding, an unsigned integer or a hex/binary string */
export type BitsInput = EncodedValue | bigint | number | string;

/**
 * Turn any accepted bit input into an EncodedValue under the layout.
 */
export function toEncoded(bits: BitsInput, layout?: FieldLayout): EncodedValue {
  if (bits instanceof EncodedValue) {
    if (layout !== undefined && !layout.equals(bits.layout)) {
      throw new MalformedInputError(
        `Encoding is ${bits.layout.totalBits} bits wide, expected ${layout.totalBits}`, bits.toHex());
    }
    return bits;
  }
  if (layout === undefined) {
    throw new MalformedInputError('A layout is needed to decode raw bits', String(bits));
  }
  if (typeof bits === 'string') return EncodedValue.parse(bits, layout);
  return EncodedValue.fromInteger(bits, layout);
}

/**
 * Decode an encoding into its exact value.
 *
 * @param bits    the encoding, or raw bits to be read under `layout`
 * @param layout  required unless `bits` is already an EncodedValue
 */
export function decode(bits: BitsInput, layout?: FieldLayout): DecodedValue {
  const enc = toEncoded(bits, layout);
  const lay = enc.layout;
  const sign: Sign = enc.extractSign() ? -1 : 1;
  const exp = enc.extractExponentCode();
  const frac = enc.extractFractionalCode();

  switch (enc.getClass()) {
    case FloatClass.zero:
      return { type: FloatClass.zero, sign };
    case FloatClass.infinity:
      return { type: FloatClass.infinity, sign };
    case FloatClass.nan:
      return { type: FloatClass.nan };
    case FloatClass.denormalized: {
      // No implicit bit, exponent pinned at 1 - bias
      const exponent = lay.minExponent();
      return { type: FloatClass.denormalized, sign, exponent, significand: frac, value: finiteValue(sign, frac, exponent, lay) };
    }
    case FloatClass.normalized: {
      const exponent = exp - lay.bias;
      const significand = frac | (1n << BigInt(lay.mantissaBits)); // Stick the implicit bit in at top
      return { type: FloatClass.normalized, sign, exponent, significand, value: finiteValue(sign, significand, exponent, lay) };
    }
  }
}

function finiteValue(sign: Sign, significand: bigint, exponent: int4, layout: FieldLayout): Rational {
  return mulPow2({ num: sign < 0 ? -significand : significand, den: 1n }, exponent - layout.mantissaBits);
}

/**
 * The exact numeric value of a decoded value.
 * @returns the rational value (zero for either signed zero), or null for Infinity and NaN
 */
export function toRational(val: DecodedValue): Rational | null {
  switch (val.type) {
    case FloatClass.zero:
      return { num: 0n, den: 1n };
    case FloatClass.normalized:
    case FloatClass.denormalized:
      return val.value;
    default:
      return null;
  }
}

/**
 * IEEE numeric equality: +0 equals -0, NaN equals nothing, and infinities
 * are equal when their signs match.
 */
export function numericEquals(a: DecodedValue, b: DecodedValue): boolean {
  if (a.type === FloatClass.nan || b.type === FloatClass.nan) return false;
  if (a.type === FloatClass.infinity || b.type === FloatClass.infinity) {
    return a.type === b.type && a.sign === b.sign;
  }
  const ra = toRational(a);
  const rb = toRational(b);
  return ra !== null && rb !== null && equals(ra, rb);
}

/** True for Zero, Denormalized and Normalized values */
export function isFiniteValue(val: DecodedValue): boolean {
  return val.type !== FloatClass.infinity && val.type !== FloatClass.nan;
}
