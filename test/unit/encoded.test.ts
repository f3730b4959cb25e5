/**
 * @file encoded.test.ts
 * @description Unit tests for EncodedValue field packing and external forms.
 */

import { describe, it, expect } from 'vitest';
import { EncodedValue } from '../../src/core/encoded.js';
import { FloatClass } from '../../src/core/classify.js';
import { SINGLE, DOUBLE, HALF } from '../../src/core/layout.js';
import { MalformedInputError } from '../../src/core/error.js';

describe('EncodedValue', () => {
  it('extracts fields with shifts and masks', () => {
    const enc = EncodedValue.fromInteger(0x40B80000n, SINGLE);
    expect(enc.extractSign()).toBe(false);
    expect(enc.extractExponentCode()).toBe(129);
    expect(enc.extractFractionalCode()).toBe(0x380000n);
  });

  it('extracts fields at the 64-bit boundary', () => {
    const enc = EncodedValue.fromInteger(0xFFF0000000000001n, DOUBLE);
    expect(enc.extractSign()).toBe(true);
    expect(enc.extractExponentCode()).toBe(2047);
    expect(enc.extractFractionalCode()).toBe(1n);
    expect(enc.getClass()).toBe(FloatClass.nan);
  });

  it('assembles fields', () => {
    expect(EncodedValue.assemble(true, 129, 0x480000n, SINGLE).bits).toBe(0xC0C80000n);
    expect(EncodedValue.assemble(false, 1020, 1n << 50n, DOUBLE).toHex()).toBe('0x3FC4000000000000');
  });

  it('writes hex and binary forms', () => {
    const enc = EncodedValue.fromInteger(0x40B80000, SINGLE);
    expect(enc.toHex()).toBe('0x40B80000');
    expect(enc.toString()).toBe('0x40B80000');
    expect(enc.toBinary()).toBe('01000000101110000000000000000000');
    expect(enc.toBinary(true)).toBe('0 10000001 01110000000000000000000');
    expect(EncodedValue.fromInteger(1, HALF).toHex()).toBe('0x0001');
  });

  it('parses hex, binary and decimal integer forms', () => {
    expect(EncodedValue.fromHex('0x40b80000', SINGLE).bits).toBe(0x40B80000n);
    expect(EncodedValue.fromHex('4040_0000', SINGLE).bits).toBe(0x40400000n);
    expect(EncodedValue.fromBinary('0b0_01111101_11001000000000000000000', SINGLE).bits).toBe(0x3EE40000n);
    expect(EncodedValue.parse('0b0 10000000 10000000000000000000000', SINGLE).bits).toBe(0x40400000n);
    expect(EncodedValue.parse('0x3FF0000000000000', DOUBLE).extractExponentCode()).toBe(1023);
    expect(EncodedValue.parse('1065353216', SINGLE).bits).toBe(0x3F800000n);
  });

  it('rejects patterns of the wrong width', () => {
    expect(() => EncodedValue.fromHex('0x40B8000', SINGLE)).toThrow(
      'Hex pattern has 7 digits, single needs 8: 0x40B8000');
    expect(() => EncodedValue.fromHex('0x40B80000', DOUBLE)).toThrow(MalformedInputError);
    expect(() => EncodedValue.fromBinary('0b0101', SINGLE)).toThrow(
      'Binary pattern has 4 bits, single needs 32: 0b0101');
    expect(() => EncodedValue.fromInteger(1n << 32n, SINGLE)).toThrow(MalformedInputError);
    expect(() => EncodedValue.fromInteger(-1n, SINGLE)).toThrow(MalformedInputError);
    expect(() => EncodedValue.fromInteger(1.5, SINGLE)).toThrow(MalformedInputError);
  });

  it('rejects bad digits', () => {
    expect(() => EncodedValue.fromHex('0x40G80000', SINGLE)).toThrow(MalformedInputError);
    expect(() => EncodedValue.fromBinary('0b2', SINGLE)).toThrow(MalformedInputError);
    expect(() => EncodedValue.parse('forty', SINGLE)).toThrow('Unrecognized bit pattern: forty');
  });

  it('flips the sign bit', () => {
    const enc = EncodedValue.fromInteger(0x40B80000n, SINGLE);
    expect(enc.negate().toHex()).toBe('0xC0B80000');
    expect(enc.negate().negate().equals(enc)).toBe(true);
  });

  it('gives fields as digit strings', () => {
    expect(EncodedValue.fromInteger(0xBE200000n, SINGLE).fieldBits()).toEqual({
      sign: '1',
      exponent: '01111100',
      mantissa: '01000000000000000000000',
    });
  });
});
