/**
 * @file rational.ts
 * @description Exact rational arithmetic on native BigInt, plus the parser
 * that turns external real-number input into an exact value for the encoder.
 *
 * Every finite binary floating-point value is a dyadic rational (n / 2^k), and
 * every decimal literal is n / 10^k.  Both are held as Rationals; host
 * floating point never enters the conversion.
 */

import { MalformedInputError } from './error.js';
import { type int4, bigAbs, bitLength } from './types.js';

/** Exact rational num / den, with den > 0 and in lowest terms. */
export interface Rational {
  readonly num: bigint;
  readonly den: bigint;
}

export const ZERO: Rational = { num: 0n, den: 1n };

// -- internal helpers -------------------------------------------------------

function gcd(a: bigint, b: bigint): bigint {
  a = bigAbs(a);
  b = bigAbs(b);
  while (b !== 0n) {
    const t = b;
    b = a % b;
    a = t;
  }
  return a;
}

/** Number of decimal digits in a positive bigint */
function decimalLength(val: bigint): int4 {
  return val.toString(10).length;
}

// -- construction -----------------------------------------------------------

/** Reduce to lowest terms, positive denominator. */
export function reduce({ num, den }: Rational): Rational {
  if (num === 0n) return ZERO;
  const g = gcd(num, den);
  const rn = num / g;
  const rd = den / g;
  return rd < 0n ? { num: -rn, den: -rd } : { num: rn, den: rd };
}

/**
 * Build a reduced rational from a numerator/denominator pair.
 * A zero denominator is malformed input.
 */
export function makeRational(num: bigint, den: bigint = 1n): Rational {
  if (den === 0n) {
    throw new MalformedInputError('Zero denominator in rational ' + num + '/' + den, num + '/' + den);
  }
  return reduce({ num, den });
}

/** r × 2^k, exactly */
export function mulPow2(r: Rational, k: int4): Rational {
  if (k >= 0) return reduce({ num: r.num << BigInt(k), den: r.den });
  return reduce({ num: r.num, den: r.den << BigInt(-k) });
}

/** r × 10^k, exactly */
export function mulPow10(r: Rational, k: int4): Rational {
  if (k >= 0) return reduce({ num: r.num * 10n ** BigInt(k), den: r.den });
  return reduce({ num: r.num, den: r.den * 10n ** BigInt(-k) });
}

export function negate(r: Rational): Rational {
  return { num: -r.num, den: r.den };
}

export function abs(r: Rational): Rational {
  return r.num < 0n ? negate(r) : r;
}

// -- comparison -------------------------------------------------------------

/** Three-way comparison: negative if a < b, 0 if equal, positive if a > b */
export function compare(a: Rational, b: Rational): int4 {
  // Denominators are positive, so cross-multiplying keeps the order.
  const lhs = a.num * b.den;
  const rhs = b.num * a.den;
  if (lhs < rhs) return -1;
  if (lhs > rhs) return 1;
  return 0;
}

export function equals(a: Rational, b: Rational): boolean {
  return a.num === b.num && a.den === b.den;
}

// -- logarithms and scaling -------------------------------------------------

/**
 * floor(log2(r)) for r > 0: the E with 2^E <= r < 2^(E+1).
 *
 * With a = bitLength(num) and b = bitLength(den), r lies strictly between
 * 2^(a-b-1) and 2^(a-b+1), so one comparison settles it.
 */
export function floorLog2(r: Rational): int4 {
  const e = bitLength(r.num) - bitLength(r.den);
  const below = e >= 0 ? r.num < (r.den << BigInt(e)) : (r.num << BigInt(-e)) < r.den;
  return below ? e - 1 : e;
}

/** floor(log10(r)) for r > 0, by the same bracketing on decimal digit counts */
export function floorLog10(r: Rational): int4 {
  const e = decimalLength(r.num) - decimalLength(r.den);
  const below = e >= 0 ? r.num < r.den * 10n ** BigInt(e) : r.num * 10n ** BigInt(-e) < r.den;
  return below ? e - 1 : e;
}

/**
 * floor(r × 2^shift) for r >= 0, and whether anything nonzero was dropped.
 */
export function scaleToInteger(r: Rational, shift: int4): { quotient: bigint; inexact: boolean } {
  let num = r.num;
  let den = r.den;
  if (shift >= 0) num <<= BigInt(shift);
  else den <<= BigInt(-shift);
  return { quotient: num / den, inexact: num % den !== 0n };
}

/**
 * Round num / den (both non-negative) to the nearest integer, ties to even.
 */
export function roundHalfEven(num: bigint, den: bigint): bigint {
  const q = num / den;
  const twiceRem = (num % den) * 2n;
  if (twiceRem > den || (twiceRem === den && (q & 1n) === 1n)) return q + 1n;
  return q;
}

// -- host number conversion -------------------------------------------------

const _convBuf = new ArrayBuffer(8);
const _convView = new DataView(_convBuf);

/**
 * Convert a JavaScript number (double) to its IEEE 754 64-bit representation.
 */
export function doubleToRawBits(x: number): bigint {
  _convView.setFloat64(0, x, false); // big-endian
  const hi = _convView.getUint32(0, false);
  const lo = _convView.getUint32(4, false);
  return (BigInt(hi) << 32n) | BigInt(lo);
}

/**
 * Exact rational value of a finite host double.  The sign of -0 is lost;
 * callers that care inspect the raw sign bit.
 */
export function fromHostNumber(x: number): Rational {
  const bits = doubleToRawBits(x);
  const negative = (bits >> 63n) !== 0n;
  const expBits = Number((bits >> 52n) & 0x7FFn);
  let signif = bits & 0x000F_FFFF_FFFF_FFFFn;
  let exp: int4;
  if (expBits === 0) {
    exp = -1074; // denormalized: no implicit bit
  } else {
    signif |= 1n << 52n;
    exp = expBits - 1075;
  }
  return mulPow2({ num: negative ? -signif : signif, den: 1n }, exp);
}

// ---------------------------------------------------------------------------
// Real values: what the encoder accepts
// ---------------------------------------------------------------------------

/** A real value whose magnitude is held exactly, or a special value */
export type ExactRealValue =
  | { kind: 'finite'; negative: boolean; magnitude: Rational }
  | { kind: 'infinity'; negative: boolean }
  | { kind: 'nan' };

/**
 * A decimal literal `digits × 10^exp10`, kept in that form until a layout
 * fixes whether its power of ten is worth building.  `digits` is nonzero
 * with no trailing zeros; `exp10` may be arbitrarily large.
 */
export interface ScaledDecimal {
  kind: 'decimal';
  negative: boolean;
  digits: bigint;
  exp10: number;
}

/** A real number as the encoder sees it, after parsing. */
export type RealValue = ExactRealValue | ScaledDecimal;

/** Anything encode() accepts as a value */
export type RealInput = string | number | bigint | Rational;

const DECIMAL_RE = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;
const FRACTION_RE = /^([+-]?)(\d+)\s*\/\s*(\d+)$/;

/**
 * Parse a decimal string into a real value.  Decimal literals come back as
 * a ScaledDecimal (or an exact zero when every digit is 0); see
 * `decimalMagnitude` for the exact value.
 *
 * Accepted forms: `-6.25`, `.5`, `3.`, `1e-45`, `+2.5E3`, rational pairs
 * `1/3`, and the special names `inf`, `infinity`, `nan` (any case, `inf`
 * and `infinity` may be signed).  Underscores between digits are ignored.
 */
export function parseReal(text: string): RealValue {
  const s = text.trim().replace(/(\d)_(?=\d)/g, '$1');
  const special = /^([+-]?)(inf|infinity|nan)$/i.exec(s);
  if (special !== null) {
    if (special[2].toLowerCase() === 'nan') return { kind: 'nan' };
    return { kind: 'infinity', negative: special[1] === '-' };
  }

  const frac = FRACTION_RE.exec(s);
  if (frac !== null) {
    const den = BigInt(frac[3]);
    if (den === 0n) {
      throw new MalformedInputError('Zero denominator in rational: ' + text, text);
    }
    return { kind: 'finite', negative: frac[1] === '-', magnitude: reduce({ num: BigInt(frac[2]), den }) };
  }

  const m = DECIMAL_RE.exec(s);
  if (m === null || (m[2].length === 0 && (m[3] === undefined || m[3].length === 0))) {
    throw new MalformedInputError('Not a real number: ' + text, text);
  }
  const negative = m[1] === '-';
  const fracDigits = m[3] ?? '';
  const allDigits = m[2] + fracDigits;
  const lead = allDigits.search(/[1-9]/);
  if (lead < 0) {
    // Zero keeps its sign whatever the exponent
    return { kind: 'finite', negative, magnitude: ZERO };
  }
  const trimmed = allDigits.slice(lead).replace(/0+$/, '');
  const dropped = allDigits.length - lead - trimmed.length;
  const written = m[4] !== undefined ? parseInt(m[4], 10) : 0;
  return {
    kind: 'decimal',
    negative,
    digits: BigInt(trimmed),
    exp10: written - fracDigits.length + dropped,
  };
}

/** Decimal exponent of the leading digit of a ScaledDecimal */
export function leadingExponent(d: ScaledDecimal): number {
  return d.exp10 + d.digits.toString().length - 1;
}

/** The exact magnitude of a ScaledDecimal */
export function decimalMagnitude(d: ScaledDecimal): Rational {
  return mulPow10({ num: d.digits, den: 1n }, d.exp10);
}

/**
 * Normalize any accepted input into a RealValue.
 *
 * @param input the value as a decimal string, host number, integer or rational
 * @param negativeZero marks a zero Rational or bigint as -0
 */
export function toRealValue(input: RealInput, negativeZero: boolean = false): RealValue {
  if (typeof input === 'string') return parseReal(input);
  if (typeof input === 'number') {
    if (isNaN(input)) return { kind: 'nan' };
    const negative = (doubleToRawBits(input) >> 63n) !== 0n;
    if (!isFinite(input)) return { kind: 'infinity', negative };
    return { kind: 'finite', negative, magnitude: abs(fromHostNumber(input)) };
  }
  if (typeof input === 'bigint') {
    return { kind: 'finite', negative: input < 0n || (input === 0n && negativeZero), magnitude: { num: bigAbs(input), den: 1n } };
  }
  const r = makeRational(input.num, input.den);
  return { kind: 'finite', negative: r.num < 0n || (r.num === 0n && negativeZero), magnitude: abs(r) };
}
