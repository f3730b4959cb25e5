/**
 * @file layout.ts
 * @description Field layout descriptors for IEEE 754 binary formats.
 */

import { InvalidLayoutError } from './error.js';
import { type int4 } from './types.js';

/**
 * Widest exponent field a layout may have.  Finite values reach 2^±bias, so
 * exact decoding and printing cost grows with 2^exponentBits.
 */
export const MAX_EXPONENT_BITS = 20;

/**
 * Bit widths and bias of a single binary floating-point format.
 *
 * The encoding is laid out most-significant bit first as
 * sign (1 bit) | biased exponent (exponentBits) | mantissa (mantissaBits).
 * The bias is always 2^(exponentBits-1) - 1.
 */
export class FieldLayout {
  readonly totalBits: int4;
  readonly exponentBits: int4;
  readonly mantissaBits: int4;
  readonly bias: int4;
  /** The all-ones exponent code, used by Infinity and NaN */
  readonly maxExponent: int4;
  readonly signBitPos: int4;
  readonly exponentPos: int4;
  /** Optional display name ("single", "double", ...) */
  readonly name: string;

  /**
   * @param totalBits     width of the whole encoding
   * @param exponentBits  width of the biased exponent field
   * @param mantissaBits  width of the stored fraction (no implicit bit)
   * @param name          display name, defaults to `binary<totalBits>`
   */
  constructor(totalBits: int4, exponentBits: int4, mantissaBits: int4, name?: string) {
    for (const [label, width] of [['totalBits', totalBits], ['exponentBits', exponentBits], ['mantissaBits', mantissaBits]] as const) {
      if (!Number.isInteger(width) || width < 1) {
        throw new InvalidLayoutError(`Layout field ${label} must be a positive integer, got ${width}`);
      }
    }
    if (exponentBits < 2) {
      throw new InvalidLayoutError(`Layout needs at least 2 exponent bits, got ${exponentBits}`);
    }
    if (1 + exponentBits + mantissaBits !== totalBits) {
      throw new InvalidLayoutError(
        `Layout widths do not add up: 1 + ${exponentBits} + ${mantissaBits} != ${totalBits}`);
    }
    if (exponentBits > MAX_EXPONENT_BITS) {
      throw new InvalidLayoutError(`Layout exponent field too wide: ${exponentBits} bits`);
    }
    this.totalBits = totalBits;
    this.exponentBits = exponentBits;
    this.mantissaBits = mantissaBits;
    this.bias = (1 << (exponentBits - 1)) - 1;
    this.maxExponent = (1 << exponentBits) - 1;
    this.signBitPos = totalBits - 1;
    this.exponentPos = mantissaBits;
    this.name = name ?? `binary${totalBits}`;
  }

  /** Number of hex digits needed to write an encoding of this layout */
  hexDigits(): int4 {
    return Math.ceil(this.totalBits / 4);
  }

  /** Unbiased exponent of the smallest normalized value, also used by denormals */
  minExponent(): int4 {
    return 1 - this.bias;
  }

  /** Unbiased exponent of the largest finite value */
  maxFiniteExponent(): int4 {
    return this.maxExponent - 1 - this.bias;
  }

  equals(op2: FieldLayout): boolean {
    return this.totalBits === op2.totalBits &&
      this.exponentBits === op2.exponentBits &&
      this.mantissaBits === op2.mantissaBits;
  }

  toString(): string {
    return `${this.name} (${this.totalBits} bits: 1 sign, ${this.exponentBits} exponent, ` +
      `${this.mantissaBits} mantissa, bias ${this.bias})`;
  }
}

/** IEEE 754 single precision (binary32) */
export const SINGLE = new FieldLayout(32, 8, 23, 'single');

/** IEEE 754 double precision (binary64) */
export const DOUBLE = new FieldLayout(64, 11, 52, 'double');

/** IEEE 754 half precision (binary16) */
export const HALF = new FieldLayout(16, 5, 10, 'half');

const NAMED_LAYOUTS: ReadonlyMap<string, FieldLayout> = new Map([
  ['single', SINGLE],
  ['float', SINGLE],
  ['binary32', SINGLE],
  ['double', DOUBLE],
  ['binary64', DOUBLE],
  ['half', HALF],
  ['binary16', HALF],
]);

/**
 * Look up one of the named layouts.
 * @returns the layout, or null if the name is not recognized
 */
export function layoutByName(name: string): FieldLayout | null {
  return NAMED_LAYOUTS.get(name.toLowerCase()) ?? null;
}
