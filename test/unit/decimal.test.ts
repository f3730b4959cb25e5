/**
 * @file decimal.test.ts
 * @description Tests for exact and shortest round-trip decimal printing.
 */

import { describe, it, expect } from 'vitest';
import {
  decimalMaxPrecision,
  decimalMinPrecision,
  formatExact,
  formatShortest,
  rationalToDecimal,
  roundToSignificant,
} from '../../src/core/decimal.js';
import { decode } from '../../src/core/decode.js';
import { EncodedValue } from '../../src/core/encoded.js';
import { LowlevelError } from '../../src/core/error.js';
import { DOUBLE, HALF, SINGLE } from '../../src/core/layout.js';

function shortest(hex: string, layout = SINGLE, forcesci = false): string {
  return formatShortest(EncodedValue.fromHex(hex, layout), forcesci);
}

describe('decimal precision', () => {
  it('single', () => {
    expect(decimalMinPrecision(SINGLE)).toBe(6);
    expect(decimalMaxPrecision(SINGLE)).toBe(9);
  });

  it('double', () => {
    expect(decimalMinPrecision(DOUBLE)).toBe(15);
    expect(decimalMaxPrecision(DOUBLE)).toBe(17);
  });

  it('half', () => {
    expect(decimalMinPrecision(HALF)).toBe(3);
    expect(decimalMaxPrecision(HALF)).toBe(5);
  });
});

describe('rationalToDecimal', () => {
  it('writes terminating expansions exactly', () => {
    expect(rationalToDecimal({ num: 3n, den: 1n })).toBe('3.0');
    expect(rationalToDecimal({ num: -7n, den: 16n })).toBe('-0.4375');
    expect(rationalToDecimal({ num: 1n, den: 5n })).toBe('0.2');
    expect(rationalToDecimal({ num: 123n, den: 40n })).toBe('3.075');
    expect(rationalToDecimal({ num: 0n, den: 1n })).toBe('0.0');
  });

  it('rejects repeating expansions', () => {
    expect(() => rationalToDecimal({ num: 1n, den: 3n })).toThrow(LowlevelError);
  });
});

describe('formatExact', () => {
  it('prints every digit of the binary value', () => {
    expect(formatExact(decode(0x3DCCCCCDn, SINGLE))).toBe('0.100000001490116119384765625');
    expect(formatExact(decode(0x3F800001n, SINGLE))).toBe('1.00000011920928955078125');
    expect(formatExact(decode(0x4B800000n, SINGLE))).toBe('16777216.0');
  });
});

describe('roundToSignificant', () => {
  it('rounds ties to even', () => {
    expect(roundToSignificant({ num: 125n, den: 1n }, 2)).toEqual({ digits: '12', exp10: 2 });
    expect(roundToSignificant({ num: 135n, den: 1n }, 2)).toEqual({ digits: '14', exp10: 2 });
  });

  it('carries into the next power of ten', () => {
    expect(roundToSignificant({ num: 9999n, den: 1000n }, 3)).toEqual({ digits: '100', exp10: 1 });
  });
});

describe('formatShortest', () => {
  it('single precision', () => {
    expect(shortest('0x40400000')).toBe('3.0');
    expect(shortest('0x3DCCCCCD')).toBe('0.1');
    expect(shortest('0x3E800000')).toBe('0.25');
    expect(shortest('0x3EAAAAAB')).toBe('0.33333334');
    expect(shortest('0x3DE3EE46')).toBe('0.111294314');
    expect(shortest('0xBEE00000')).toBe('-0.4375');
    expect(shortest('0x40B80000')).toBe('5.75');
  });

  it('switches to scientific notation like %g', () => {
    expect(shortest('0x34000001')).toBe('1.192093e-07');
    expect(shortest('0x34800000')).toBe('2.3841858e-07');
    expect(shortest('0x00000001')).toBe('1.4013e-45');
    expect(shortest('0x00800000')).toBe('1.1754944e-38');
    expect(shortest('0x7F7FFFFF')).toBe('3.4028235e+38');
  });

  it('double precision', () => {
    expect(shortest('0x3FC5555555555555', DOUBLE)).toBe('0.16666666666666666');
    expect(shortest('0x7FEFFFFFFFFFFFFF', DOUBLE)).toBe('1.7976931348623157e+308');
    expect(shortest('0x3FD555555C7DDA4B', DOUBLE)).toBe('0.33333334');
    expect(shortest('0x3FD0000000000000', DOUBLE)).toBe('0.25');
    expect(shortest('0x3FB999999999999A', DOUBLE)).toBe('0.1');
    expect(shortest('0x0000000000000001', DOUBLE)).toBe('4.94065645841247e-324');
    expect(shortest('0x0010000000000000', DOUBLE)).toBe('2.2250738585072014e-308');
  });

  it('forced scientific notation keeps all digits', () => {
    expect(shortest('0x3FBF7CED916872B0', DOUBLE, true)).toBe('1.23000000000000e-01');
  });

  it('half precision', () => {
    expect(shortest('0x0001', HALF)).toBe('5.96e-08');
    expect(shortest('0x0400', HALF)).toBe('6.104e-05');
    expect(shortest('0x7BFF', HALF)).toBe('6.55e+04');
    expect(shortest('0x3C00', HALF)).toBe('1.0');
    expect(shortest('0x3555', HALF)).toBe('0.3333');
  });

  it('special values', () => {
    expect(shortest('0x00000000')).toBe('0.0');
    expect(shortest('0x80000000')).toBe('-0.0');
    expect(shortest('0x7F800000')).toBe('Infinity');
    expect(shortest('0xFF800000')).toBe('-Infinity');
    expect(shortest('0x7FC00000')).toBe('NaN');
  });
});
