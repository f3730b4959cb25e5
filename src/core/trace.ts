/**
 * @file trace.ts
 * @description Step-by-step record of converting a real number to IEEE 754,
 * the way the conversion is worked by hand: sign, binary integer part,
 * binary fraction by repeated doubling, normalization, biased exponent and
 * mantissa.  The final fields are read back from encode(), so the trace
 * always agrees with the encoder.
 */

import { FloatClass, className } from './classify.js';
import { GUARD_BITS, encodeReal, resolveReal } from './encode.js';
import { type EncodedValue } from './encoded.js';
import { type FieldLayout } from './layout.js';
import { type RealInput, floorLog2, scaleToInteger, toRealValue } from './rational.js';
import { type int4, bitLength } from './types.js';

/** Everything shown when converting one value */
export interface ConversionTrace {
  /** The input as written by the caller */
  input: string;
  layout: FieldLayout;
  sign: 0 | 1;
  /** Binary digits of the integer part ('' for non-finite input) */
  integerBits: string;
  /** Binary digits after the point, as far as they were expanded */
  fractionBits: string;
  /** True when the fraction ended before the digit budget ran out */
  fractionTerminated: boolean;
  /** floor(log2 |v|) before rounding, or null for zero and non-finite input */
  normalizedExponent: int4 | null;
  /** Class of the resulting encoding */
  cls: FloatClass;
  biasedExponent: int4;
  /** Exponent the encoding stands for (code - bias, or 1 - bias when denormalized) */
  trueExponent: int4 | null;
  mantissa: string;
  encoded: EncodedValue;
}

function describeInput(value: RealInput): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'bigint') return String(value);
  return `${value.num}/${value.den}`;
}

/**
 * Convert a value and record each step.
 */
export function traceEncoding(value: RealInput, layout: FieldLayout): ConversionTrace {
  const real = resolveReal(toRealValue(value), layout);
  const encoded = encodeReal(real, layout);
  const fields = encoded.fieldBits();
  const cls = encoded.getClass();

  let integerBits = '';
  let fractionBits = '';
  let fractionTerminated = true;
  let normalizedExponent: int4 | null = null;

  if (real.kind === 'finite') {
    const { num, den } = real.magnitude;
    const intPart = num / den;
    integerBits = intPart.toString(2);
    if (num !== 0n) normalizedExponent = floorLog2(real.magnitude);

    // Significant digits needed to round, counted from the leading 1
    const needed = layout.mantissaBits + 1 + GUARD_BITS;
    const intSig = bitLength(intPart);
    const leadingZeros = intSig === 0 && normalizedExponent !== null ? -normalizedExponent - 1 : 0;
    const budget = Math.max(0, needed - intSig) + leadingZeros;

    // Fractional part: the first `budget` binary digits after the point
    const rem = num % den;
    if (rem !== 0n) {
      const { quotient, inexact } = scaleToInteger({ num: rem, den }, budget);
      fractionTerminated = !inexact;
      fractionBits = budget > 0 ? quotient.toString(2).padStart(budget, '0') : '';
      if (fractionTerminated) fractionBits = fractionBits.replace(/0+$/, '');
    }
  }

  let trueExponent: int4 | null = null;
  if (cls === FloatClass.normalized) trueExponent = encoded.extractExponentCode() - layout.bias;
  else if (cls === FloatClass.denormalized) trueExponent = layout.minExponent();

  return {
    input: describeInput(value),
    layout,
    sign: encoded.extractSign() ? 1 : 0,
    integerBits,
    fractionBits,
    fractionTerminated,
    normalizedExponent,
    cls,
    biasedExponent: encoded.extractExponentCode(),
    trueExponent,
    mantissa: fields.mantissa,
    encoded,
  };
}

/**
 * Render a trace as numbered lines for display.
 */
export function formatTrace(t: ConversionTrace): string[] {
  const lay = t.layout;
  const fields = t.encoded.fieldBits();
  const lines: string[] = [];
  lines.push(`Converting ${t.input} to ${lay.name}:`);
  lines.push(`1. Sign bit: ${t.sign} (${t.sign === 0 ? 'positive' : 'negative'})`);

  if (t.integerBits.length === 0) {
    lines.push(`2. Special value: ${className(t.cls)}`);
  } else {
    const more = t.fractionTerminated ? '' : '...';
    const frac = t.fractionBits.length > 0 ? t.fractionBits : '0';
    lines.push(`2. Binary: ${t.integerBits}.${frac}${more}`);
    if (t.normalizedExponent === null) {
      lines.push('3. Zero: no leading 1 to normalize');
    } else {
      lines.push(`3. Normalized: 1.x × 2^${t.normalizedExponent}`);
    }
  }

  switch (t.cls) {
    case FloatClass.normalized:
      lines.push(`4. Biased exponent: ${t.trueExponent} + ${lay.bias} = ${t.biasedExponent} (${fields.exponent})`);
      lines.push(`5. Mantissa (${lay.mantissaBits} bits): ${fields.mantissa}`);
      break;
    case FloatClass.denormalized:
      lines.push(`4. Denormalized: 0.x × 2^${t.trueExponent}, exponent field ${fields.exponent}`);
      lines.push(`5. Mantissa (${lay.mantissaBits} bits): ${fields.mantissa}`);
      break;
    default:
      lines.push(`4. Result is ${className(t.cls)}: exponent field ${fields.exponent}`);
      lines.push(`5. Mantissa (${lay.mantissaBits} bits): ${fields.mantissa}`);
      break;
  }
  lines.push(`6. Sign | Exponent | Mantissa: ${fields.sign} | ${fields.exponent} | ${fields.mantissa}`);
  lines.push(`   Complete: ${t.encoded.toBinary()} (${t.encoded.toHex()})`);
  return lines;
}
