/**
 * @file index.ts
 * @description Public API of the IEEE 754 binary codec.
 */

export { type int4, type uintb, type Sign } from './core/types.js';
export { LowlevelError, InvalidLayoutError, MalformedInputError } from './core/error.js';
export { FieldLayout, SINGLE, DOUBLE, HALF, MAX_EXPONENT_BITS, layoutByName } from './core/layout.js';
export { FloatClass, CLASSIFICATION_TABLE, type ClassRow, classify, classifyFields, className } from './core/classify.js';
export {
  type Rational,
  type RealInput,
  type RealValue,
  type ExactRealValue,
  type ScaledDecimal,
  makeRational,
  parseReal,
  toRealValue,
} from './core/rational.js';
export { EncodedValue, type FieldBits } from './core/encoded.js';
export { encode, encodeReal, resolveReal, type EncodeOptions, getZeroEncoding, getInfinityEncoding, getNaNEncoding } from './core/encode.js';
export { decode, toRational, numericEquals, isFiniteValue, type DecodedValue, type BitsInput } from './core/decode.js';
export { formatExact, formatShortest, rationalToDecimal } from './core/decimal.js';
export { traceEncoding, formatTrace, type ConversionTrace } from './core/trace.js';
export { describeLayout, specialValues, convert, type LayoutSummary, type SpecialValue } from './core/summary.js';
