/**
 * @file rational.test.ts
 * @description Unit tests for exact rational arithmetic and real-number parsing.
 */

import { describe, it, expect } from 'vitest';
import {
  compare,
  decimalMagnitude,
  floorLog10,
  floorLog2,
  fromHostNumber,
  leadingExponent,
  makeRational,
  mulPow2,
  parseReal,
  reduce,
  roundHalfEven,
  scaleToInteger,
  toRealValue,
} from '../../src/core/rational.js';
import { MalformedInputError } from '../../src/core/error.js';

describe('rational arithmetic', () => {
  it('reduces to lowest terms with a positive denominator', () => {
    expect(reduce({ num: 6n, den: -4n })).toEqual({ num: -3n, den: 2n });
    expect(reduce({ num: 0n, den: 7n })).toEqual({ num: 0n, den: 1n });
  });

  it('rejects a zero denominator', () => {
    expect(() => makeRational(1n, 0n)).toThrow(MalformedInputError);
  });

  it('scales by powers of two', () => {
    expect(mulPow2({ num: 3n, den: 1n }, -3)).toEqual({ num: 3n, den: 8n });
    expect(mulPow2({ num: 3n, den: 8n }, 4)).toEqual({ num: 6n, den: 1n });
  });

  it('compares by cross multiplication', () => {
    expect(compare({ num: 1n, den: 3n }, { num: 1n, den: 2n })).toBe(-1);
    expect(compare({ num: -1n, den: 3n }, { num: -1n, den: 2n })).toBe(1);
    expect(compare({ num: 2n, den: 4n }, { num: 1n, den: 2n })).toBe(0);
  });

  it('computes floor(log2)', () => {
    expect(floorLog2({ num: 1n, den: 1n })).toBe(0);
    expect(floorLog2({ num: 23n, den: 4n })).toBe(2); // 5.75
    expect(floorLog2({ num: 5n, den: 32n })).toBe(-3); // 0.15625
    expect(floorLog2({ num: 1n, den: 8n })).toBe(-3);
    expect(floorLog2({ num: 7n, den: 8n })).toBe(-1);
    expect(floorLog2({ num: 1n, den: 10n })).toBe(-4);
  });

  it('computes floor(log10)', () => {
    expect(floorLog10({ num: 1n, den: 1n })).toBe(0);
    expect(floorLog10({ num: 99n, den: 1n })).toBe(1);
    expect(floorLog10({ num: 100n, den: 1n })).toBe(2);
    expect(floorLog10({ num: 1n, den: 10n })).toBe(-1);
    expect(floorLog10({ num: 1n, den: 11n })).toBe(-2);
  });

  it('scales to an integer and reports inexactness', () => {
    expect(scaleToInteger({ num: 1n, den: 3n }, 4)).toEqual({ quotient: 5n, inexact: true });
    expect(scaleToInteger({ num: 3n, den: 4n }, 2)).toEqual({ quotient: 3n, inexact: false });
    expect(scaleToInteger({ num: 10n, den: 1n }, -2)).toEqual({ quotient: 2n, inexact: true });
  });

  it('rounds half to even', () => {
    expect(roundHalfEven(5n, 2n)).toBe(2n);
    expect(roundHalfEven(7n, 2n)).toBe(4n);
    expect(roundHalfEven(11n, 4n)).toBe(3n);
    expect(roundHalfEven(9n, 4n)).toBe(2n);
  });

  it('converts host doubles exactly', () => {
    expect(fromHostNumber(5.75)).toEqual({ num: 23n, den: 4n });
    expect(fromHostNumber(-0.15625)).toEqual({ num: -5n, den: 32n });
    expect(fromHostNumber(0.1)).toEqual({ num: 3602879701896397n, den: 36028797018963968n });
    expect(fromHostNumber(5e-324)).toEqual({ num: 1n, den: 2n ** 1074n });
  });
});

describe('parseReal', () => {
  it('parses decimal literals into digits and a power of ten', () => {
    expect(parseReal('-6.25')).toEqual({ kind: 'decimal', negative: true, digits: 625n, exp10: -2 });
    expect(parseReal('12.375')).toEqual({ kind: 'decimal', negative: false, digits: 12375n, exp10: -3 });
    expect(parseReal('.5')).toEqual({ kind: 'decimal', negative: false, digits: 5n, exp10: -1 });
    expect(parseReal('3.')).toEqual({ kind: 'decimal', negative: false, digits: 3n, exp10: 0 });
    expect(parseReal('1e-3')).toEqual({ kind: 'decimal', negative: false, digits: 1n, exp10: -3 });
    expect(parseReal('-2.5E3')).toEqual({ kind: 'decimal', negative: true, digits: 25n, exp10: 2 });
  });

  it('strips leading and trailing zeros', () => {
    expect(parseReal(' 1_000 ')).toEqual({ kind: 'decimal', negative: false, digits: 1n, exp10: 3 });
    expect(parseReal('0.0015')).toEqual({ kind: 'decimal', negative: false, digits: 15n, exp10: -4 });
    expect(parseReal('0.' + '0'.repeat(100001) + '1')).toEqual({ kind: 'decimal', negative: false, digits: 1n, exp10: -100002 });
    expect(parseReal('1.' + '0'.repeat(100001))).toEqual({ kind: 'decimal', negative: false, digits: 1n, exp10: 0 });
  });

  it('accepts any decimal exponent', () => {
    expect(parseReal('1e999999')).toEqual({ kind: 'decimal', negative: false, digits: 1n, exp10: 999999 });
    expect(parseReal('-25e-100001')).toEqual({ kind: 'decimal', negative: true, digits: 25n, exp10: -100001 });
  });

  it('builds the exact magnitude on request', () => {
    const d = parseReal('-6.25');
    expect(d.kind).toBe('decimal');
    if (d.kind !== 'decimal') return;
    expect(decimalMagnitude(d)).toEqual({ num: 25n, den: 4n });
    expect(leadingExponent(d)).toBe(0);
    expect(leadingExponent({ kind: 'decimal', negative: false, digits: 12375n, exp10: -3 })).toBe(1);
  });

  it('keeps the sign of zero whatever the exponent', () => {
    expect(parseReal('-0')).toEqual({ kind: 'finite', negative: true, magnitude: { num: 0n, den: 1n } });
    expect(parseReal('0.000')).toEqual({ kind: 'finite', negative: false, magnitude: { num: 0n, den: 1n } });
    expect(parseReal('-0e100001')).toEqual({ kind: 'finite', negative: true, magnitude: { num: 0n, den: 1n } });
  });

  it('parses rational pairs', () => {
    expect(parseReal('1/3')).toEqual({ kind: 'finite', negative: false, magnitude: { num: 1n, den: 3n } });
    expect(parseReal('-6 / 8')).toEqual({ kind: 'finite', negative: true, magnitude: { num: 3n, den: 4n } });
    expect(() => parseReal('1/0')).toThrow(MalformedInputError);
  });

  it('parses special names', () => {
    expect(parseReal('NaN')).toEqual({ kind: 'nan' });
    expect(parseReal('-inf')).toEqual({ kind: 'infinity', negative: true });
    expect(parseReal('Infinity')).toEqual({ kind: 'infinity', negative: false });
  });

  it('rejects strings that are not real numbers', () => {
    for (const bad of ['', '.', 'abc', '1.2.3', 'e5', '0x10', '--1', '1e']) {
      expect(() => parseReal(bad)).toThrow(MalformedInputError);
    }
  });
});

describe('toRealValue', () => {
  it('accepts host numbers including signed zero and specials', () => {
    expect(toRealValue(-0)).toEqual({ kind: 'finite', negative: true, magnitude: { num: 0n, den: 1n } });
    expect(toRealValue(-Infinity)).toEqual({ kind: 'infinity', negative: true });
    expect(toRealValue(NaN)).toEqual({ kind: 'nan' });
  });

  it('accepts integers and rationals with a negative-zero flag', () => {
    expect(toRealValue(-12n)).toEqual({ kind: 'finite', negative: true, magnitude: { num: 12n, den: 1n } });
    expect(toRealValue(0n, true)).toEqual({ kind: 'finite', negative: true, magnitude: { num: 0n, den: 1n } });
    expect(toRealValue({ num: 3n, den: -6n })).toEqual({ kind: 'finite', negative: true, magnitude: { num: 1n, den: 2n } });
  });
});
