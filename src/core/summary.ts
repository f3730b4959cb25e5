/**
 * @file summary.ts
 * @description Range and precision summary of a layout, the table of special
 * encodings, and conversion between layouts.
 */

import { FloatClass } from './classify.js';
import { type BitsInput, decode, toEncoded } from './decode.js';
import { decimalMaxPrecision, decimalMinPrecision } from './decimal.js';
import { encodeReal, getInfinityEncoding, getNaNEncoding, getZeroEncoding } from './encode.js';
import { EncodedValue } from './encoded.js';
import { type FieldLayout } from './layout.js';
import { type RealValue, abs } from './rational.js';
import { type int4, bitMask } from './types.js';

/** Range and precision facts about a layout */
export interface LayoutSummary {
  layout: FieldLayout;
  /** Decimal digits always preserved */
  minPrecision: int4;
  /** Decimal digits needed for a binary -> decimal -> binary round trip */
  maxPrecision: int4;
  minDenormal: EncodedValue;
  minNormal: EncodedValue;
  maxFinite: EncodedValue;
}

export function describeLayout(layout: FieldLayout): LayoutSummary {
  return {
    layout,
    minPrecision: decimalMinPrecision(layout),
    maxPrecision: decimalMaxPrecision(layout),
    minDenormal: EncodedValue.assemble(false, 0, 1n, layout),
    minNormal: EncodedValue.assemble(false, 1, 0n, layout),
    maxFinite: EncodedValue.assemble(false, layout.maxExponent - 1, bitMask(layout.mantissaBits), layout),
  };
}

/** A labelled special encoding */
export interface SpecialValue {
  label: string;
  encoded: EncodedValue;
}

/**
 * Encodings of zero, negative zero, the infinities, one, negative one and
 * the canonical NaN.
 */
export function specialValues(layout: FieldLayout): SpecialValue[] {
  const one: RealValue = { kind: 'finite', negative: false, magnitude: { num: 1n, den: 1n } };
  const negOne: RealValue = { kind: 'finite', negative: true, magnitude: { num: 1n, den: 1n } };
  return [
    { label: 'Zero', encoded: getZeroEncoding(false, layout) },
    { label: 'Negative Zero', encoded: getZeroEncoding(true, layout) },
    { label: 'Positive Infinity', encoded: getInfinityEncoding(false, layout) },
    { label: 'Negative Infinity', encoded: getInfinityEncoding(true, layout) },
    { label: 'One', encoded: encodeReal(one, layout) },
    { label: 'Negative One', encoded: encodeReal(negOne, layout) },
    { label: 'NaN', encoded: getNaNEncoding(layout) },
  ];
}

/**
 * Re-encode a value from one layout into another, rounding to nearest-even.
 * NaN payloads are not carried over; any NaN becomes the canonical NaN.
 */
export function convert(bits: BitsInput, from: FieldLayout, to: FieldLayout): EncodedValue {
  const val = decode(toEncoded(bits, from));
  switch (val.type) {
    case FloatClass.nan:
      return getNaNEncoding(to);
    case FloatClass.infinity:
      return getInfinityEncoding(val.sign < 0, to);
    case FloatClass.zero:
      return getZeroEncoding(val.sign < 0, to);
    default:
      return encodeReal({ kind: 'finite', negative: val.sign < 0, magnitude: abs(val.value) }, to);
  }
}
