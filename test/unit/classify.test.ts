/**
 * @file classify.test.ts
 * @description Unit tests for the shared classification table.
 */

import { describe, it, expect } from 'vitest';
import { FloatClass, CLASSIFICATION_TABLE, classify, classifyFields, className, exponentCodeFor } from '../../src/core/classify.js';
import { SINGLE, DOUBLE } from '../../src/core/layout.js';

describe('classification table', () => {
  it('has one row per class', () => {
    const classes = CLASSIFICATION_TABLE.map((r) => r.cls).sort();
    expect(classes).toEqual([
      FloatClass.normalized,
      FloatClass.infinity,
      FloatClass.zero,
      FloatClass.nan,
      FloatClass.denormalized,
    ]);
  });

  it('classifies by (expAllZero, expAllOnes, mantissaZero)', () => {
    expect(classifyFields(true, false, true)).toBe(FloatClass.zero);
    expect(classifyFields(true, false, false)).toBe(FloatClass.denormalized);
    expect(classifyFields(false, true, true)).toBe(FloatClass.infinity);
    expect(classifyFields(false, true, false)).toBe(FloatClass.nan);
    expect(classifyFields(false, false, true)).toBe(FloatClass.normalized);
    expect(classifyFields(false, false, false)).toBe(FloatClass.normalized);
  });

  it('classifies raw fields against a layout', () => {
    expect(classify(255, 0n, SINGLE)).toBe(FloatClass.infinity);
    expect(classify(255, 0n, DOUBLE)).toBe(FloatClass.normalized);
    expect(classify(2047, 1n, DOUBLE)).toBe(FloatClass.nan);
    expect(classify(0, 5n, SINGLE)).toBe(FloatClass.denormalized);
  });

  it('gives the fixed exponent codes of special classes', () => {
    expect(exponentCodeFor(FloatClass.zero, SINGLE)).toBe(0);
    expect(exponentCodeFor(FloatClass.denormalized, DOUBLE)).toBe(0);
    expect(exponentCodeFor(FloatClass.infinity, DOUBLE)).toBe(2047);
    expect(exponentCodeFor(FloatClass.nan, SINGLE)).toBe(255);
    expect(exponentCodeFor(FloatClass.normalized, SINGLE)).toBeNull();
  });

  it('names classes', () => {
    expect(className(FloatClass.denormalized)).toBe('denormalized');
    expect(className(FloatClass.nan)).toBe('nan');
  });
});
