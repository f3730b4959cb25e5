/**
 * @file decimal.ts
 * @description Decimal printing of decoded values: the exact expansion, and
 * the shortest string that reads back to the same encoding.
 */

import { FloatClass } from './classify.js';
import { type DecodedValue, decode } from './decode.js';
import { encodeReal } from './encode.js';
import { type EncodedValue } from './encoded.js';
import { LowlevelError } from './error.js';
import { type FieldLayout } from './layout.js';
import { type Rational, abs, floorLog10, mulPow10, roundHalfEven } from './rational.js';
import { type int4 } from './types.js';

/** log10(2), as used for decimal precision estimates */
const LOG10_2 = 0.30103;

/** Fewest significant decimal digits any value of the layout is printed with */
export function decimalMinPrecision(layout: FieldLayout): int4 {
  return Math.max(1, Math.floor(layout.mantissaBits * LOG10_2));
}

/**
 * Digits needed to guarantee a binary -> decimal -> binary round trip.
 */
export function decimalMaxPrecision(layout: FieldLayout): int4 {
  return Math.ceil((layout.mantissaBits + 1) * LOG10_2) + 1;
}

function specialText(val: DecodedValue): string | null {
  switch (val.type) {
    case FloatClass.zero:
      return val.sign < 0 ? '-0.0' : '0.0';
    case FloatClass.infinity:
      return val.sign < 0 ? '-Infinity' : 'Infinity';
    case FloatClass.nan:
      return 'NaN';
    default:
      return null;
  }
}

/** Strip trailing fractional zeros, keeping at least one digit after the point */
function trimFraction(intPart: string, fracPart: string): string {
  const frac = fracPart.replace(/0+$/, '');
  return intPart + '.' + (frac.length === 0 ? '0' : frac);
}

// ---------------------------------------------------------------------------
// Exact printing
// ---------------------------------------------------------------------------

/**
 * Write a rational with a terminating decimal expansion (denominator of the
 * form 2^a × 5^b) exactly.  Every finite binary floating-point value
 * qualifies.
 */
export function rationalToDecimal(r: Rational): string {
  let den = r.den;
  let twos = 0;
  let fives = 0;
  while (den % 2n === 0n) { den /= 2n; twos++; }
  while (den % 5n === 0n) { den /= 5n; fives++; }
  if (den !== 1n) {
    throw new LowlevelError(`${r.num}/${r.den} has no terminating decimal expansion`);
  }
  const places = Math.max(twos, fives);
  // Scale numerator so that the denominator becomes 10^places
  const scaled = abs(r).num * 2n ** BigInt(places - twos) * 5n ** BigInt(places - fives);
  const digits = scaled.toString().padStart(places + 1, '0');
  const sign = r.num < 0n ? '-' : '';
  return sign + trimFraction(digits.slice(0, digits.length - places), digits.slice(digits.length - places));
}

/**
 * Print a decoded value exactly: `3.0`, `5.75`, `-0.4375`, `-0.0`,
 * `Infinity`, `NaN`.  No digits are rounded away.
 */
export function formatExact(val: DecodedValue): string {
  const special = specialText(val);
  if (special !== null) return special;
  if (val.type === FloatClass.normalized || val.type === FloatClass.denormalized) {
    return rationalToDecimal(val.value);
  }
  throw new LowlevelError('Unhandled float class ' + FloatClass[val.type]);
}

// ---------------------------------------------------------------------------
// Shortest round-trip printing
// ---------------------------------------------------------------------------

/** A magnitude rounded to a fixed number of significant digits */
interface SignificantDigits {
  /** Exactly `precision` decimal digits */
  digits: string;
  /** Decimal exponent of the first digit */
  exp10: int4;
}

/**
 * Round a positive rational to `precision` significant digits, ties to even.
 */
export function roundToSignificant(r: Rational, precision: int4): SignificantDigits {
  let exp10 = floorLog10(r);
  const scaled = mulPow10(r, precision - 1 - exp10);
  let n = roundHalfEven(scaled.num, scaled.den);
  if (n === 10n ** BigInt(precision)) {
    // Rounded up to the next power of ten
    n = 10n ** BigInt(precision - 1);
    exp10 += 1;
  }
  return { digits: n.toString(), exp10 };
}

function formatScientific(sd: SignificantDigits, strip: boolean): string {
  let frac = sd.digits.slice(1);
  if (strip) frac = frac.replace(/0+$/, '');
  const mant = frac.length > 0 ? sd.digits[0] + '.' + frac : sd.digits[0];
  const esign = sd.exp10 < 0 ? '-' : '+';
  return mant + 'e' + esign + String(Math.abs(sd.exp10)).padStart(2, '0');
}

function formatFixed(sd: SignificantDigits): string {
  if (sd.exp10 >= 0) {
    return trimFraction(sd.digits.slice(0, sd.exp10 + 1), sd.digits.slice(sd.exp10 + 1));
  }
  return trimFraction('0', '0'.repeat(-sd.exp10 - 1) + sd.digits);
}

/**
 * Print an encoding with the minimum number of significant digits that
 * re-encode to the same bits under its layout.
 *
 * Notation follows `%g`: scientific when the decimal exponent is below -4 or
 * at least the precision, with a two-digit exponent and trailing zeros
 * stripped.  With `forcesci` scientific notation is always used and all
 * digits of the chosen precision are kept.
 */
export function formatShortest(enc: EncodedValue, forcesci: boolean = false): string {
  const val = decode(enc);
  const special = specialText(val);
  if (special !== null) return special;
  if (val.type !== FloatClass.normalized && val.type !== FloatClass.denormalized) {
    throw new LowlevelError('Unhandled float class ' + FloatClass[val.type]);
  }

  const layout = enc.layout;
  const negative = val.sign < 0;
  const mag = abs(val.value);
  const maxPrec = decimalMaxPrecision(layout);
  let sd: SignificantDigits = roundToSignificant(mag, maxPrec);
  for (let prec = decimalMinPrecision(layout); prec < maxPrec; ++prec) {
    const cand = roundToSignificant(mag, prec);
    const back = mulPow10({ num: BigInt(cand.digits), den: 1n }, cand.exp10 - prec + 1);
    if (encodeReal({ kind: 'finite', negative, magnitude: back }, layout).bits === enc.bits) {
      sd = cand;
      break;
    }
  }

  const prec = sd.digits.length;
  let res: string;
  if (forcesci) {
    res = formatScientific(sd, false);
  } else if (sd.exp10 < -4 || sd.exp10 >= prec) {
    res = formatScientific(sd, true);
  } else {
    res = formatFixed(sd);
  }
  return negative ? '-' + res : res;
}
