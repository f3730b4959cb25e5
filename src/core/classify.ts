/**
 * @file classify.ts
 * @description The five-way classification of binary floating-point
 * encodings, shared by the encoder and the decoder.
 */

import { LowlevelError } from './error.js';
import { type FieldLayout } from './layout.js';
import { type uintb } from './types.js';

/** The various classes of floating-point encodings */
export enum FloatClass {
  normalized = 0,
  infinity = 1,
  zero = 2,
  nan = 3,
  denormalized = 4,
}

/** How the exponent field of a class looks */
export type ExponentShape = 'allZero' | 'allOnes' | 'other';

/**
 * One row of the classification table.  `mantissaZero` is null when the row
 * matches either mantissa.
 */
export interface ClassRow {
  readonly cls: FloatClass;
  readonly exponent: ExponentShape;
  readonly mantissaZero: boolean | null;
}

/**
 * Keyed by (isExponentAllZero, isExponentAllOnes, isMantissaZero).
 */
export const CLASSIFICATION_TABLE: readonly ClassRow[] = [
  { cls: FloatClass.zero, exponent: 'allZero', mantissaZero: true },
  { cls: FloatClass.denormalized, exponent: 'allZero', mantissaZero: false },
  { cls: FloatClass.infinity, exponent: 'allOnes', mantissaZero: true },
  { cls: FloatClass.nan, exponent: 'allOnes', mantissaZero: false },
  { cls: FloatClass.normalized, exponent: 'other', mantissaZero: null },
];

function shapeOf(expAllZero: boolean, expAllOnes: boolean): ExponentShape {
  if (expAllZero) return 'allZero';
  if (expAllOnes) return 'allOnes';
  return 'other';
}

/**
 * Look up the class of an encoding from its three field predicates.
 */
export function classifyFields(expAllZero: boolean, expAllOnes: boolean, mantissaZero: boolean): FloatClass {
  const shape = shapeOf(expAllZero, expAllOnes);
  for (const row of CLASSIFICATION_TABLE) {
    if (row.exponent === shape && (row.mantissaZero === null || row.mantissaZero === mantissaZero)) {
      return row.cls;
    }
  }
  throw new LowlevelError(`No classification for exponent ${shape}, mantissa ${mantissaZero ? 'zero' : 'nonzero'}`);
}

/** Classify raw exponent and mantissa field values under a layout */
export function classify(exponentCode: number, mantissa: uintb, layout: FieldLayout): FloatClass {
  return classifyFields(exponentCode === 0, exponentCode === layout.maxExponent, mantissa === 0n);
}

/** The table row describing a class */
export function rowFor(cls: FloatClass): ClassRow {
  const row = CLASSIFICATION_TABLE.find((r) => r.cls === cls);
  if (row === undefined) {
    throw new LowlevelError('Unknown float class ' + cls);
  }
  return row;
}

/**
 * Exponent field code a class uses under a layout, or null for a normalized
 * value whose code depends on its exponent.
 */
export function exponentCodeFor(cls: FloatClass, layout: FieldLayout): number | null {
  switch (rowFor(cls).exponent) {
    case 'allZero':
      return 0;
    case 'allOnes':
      return layout.maxExponent;
    case 'other':
      return null;
  }
}

/** Lower-case display name of a class */
export function className(cls: FloatClass): string {
  return FloatClass[cls];
}
