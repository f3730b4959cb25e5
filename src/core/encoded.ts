/**
 * @file encoded.ts
 * @description A fixed-width IEEE 754 bit pattern and its external forms.
 */

import { classify, type FloatClass } from './classify.js';
import { MalformedInputError } from './error.js';
import { type FieldLayout } from './layout.js';
import { type int4, type uintb, bitMask } from './types.js';

/** The three fields of an encoding written out as binary digit strings */
export interface FieldBits {
  sign: string;
  exponent: string;
  mantissa: string;
}

/**
 * An encoded floating-point value: `layout.totalBits` bits holding
 * sign | biased exponent | mantissa, most-significant bit first.
 *
 * Fields are packed and extracted with shifts and masks on the underlying
 * bigint; digit strings are only produced for display.
 */
export class EncodedValue {
  readonly bits: uintb;
  readonly layout: FieldLayout;

  /**
   * @param bits    the encoding as an unsigned integer
   * @param layout  the layout the encoding is read under
   */
  constructor(bits: uintb, layout: FieldLayout) {
    if (bits < 0n || bits > bitMask(layout.totalBits)) {
      throw new MalformedInputError(
        `Bit pattern 0x${bits.toString(16)} does not fit ${layout.totalBits} bits`, bits.toString());
    }
    this.bits = bits;
    this.layout = layout;
  }

  // -----------------------------------------------------------------------
  // Assembly
  // -----------------------------------------------------------------------

  /**
   * Pack the three fields into an encoding.  Each field is masked to its
   * width, so callers must range-check beforehand.
   */
  static assemble(sign: boolean, exponentCode: int4, mantissa: uintb, layout: FieldLayout): EncodedValue {
    let res = mantissa & bitMask(layout.mantissaBits);
    res |= (BigInt(exponentCode) & bitMask(layout.exponentBits)) << BigInt(layout.exponentPos);
    if (sign) res |= 1n << BigInt(layout.signBitPos);
    return new EncodedValue(res, layout);
  }

  // -----------------------------------------------------------------------
  // External forms
  // -----------------------------------------------------------------------

  /** Wrap an unsigned integer, which must fit the layout */
  static fromInteger(value: bigint | number, layout: FieldLayout): EncodedValue {
    if (typeof value === 'number') {
      if (!Number.isSafeInteger(value)) {
        throw new MalformedInputError('Bit pattern is not a safe integer: ' + value, String(value));
      }
      value = BigInt(value);
    }
    return new EncodedValue(value, layout);
  }

  /**
   * Parse a hexadecimal encoding such as `0x40B80000`.  The digit count must
   * match the layout exactly; underscores between digits are ignored.
   */
  static fromHex(text: string, layout: FieldLayout): EncodedValue {
    const digits = text.trim().replace(/^0x/i, '').replace(/_/g, '');
    if (!/^[0-9a-fA-F]+$/.test(digits)) {
      throw new MalformedInputError('Bad hexadecimal bit pattern: ' + text, text);
    }
    if (digits.length !== layout.hexDigits()) {
      throw new MalformedInputError(
        `Hex pattern has ${digits.length} digits, ${layout.name} needs ${layout.hexDigits()}: ${text}`, text);
    }
    return new EncodedValue(BigInt('0x' + digits), layout);
  }

  /**
   * Parse a binary encoding such as `0b0_01111101_1100...`.  Exactly
   * `totalBits` digits are required; underscores and spaces are ignored.
   */
  static fromBinary(text: string, layout: FieldLayout): EncodedValue {
    const digits = text.trim().replace(/^0b/i, '').replace(/[_\s]/g, '');
    if (!/^[01]+$/.test(digits)) {
      throw new MalformedInputError('Bad binary bit pattern: ' + text, text);
    }
    if (digits.length !== layout.totalBits) {
      throw new MalformedInputError(
        `Binary pattern has ${digits.length} bits, ${layout.name} needs ${layout.totalBits}: ${text}`, text);
    }
    return new EncodedValue(BigInt('0b' + digits), layout);
  }

  /**
   * Parse any external form: `0x` hex, `0b` binary, or a plain unsigned
   * decimal integer.
   */
  static parse(text: string, layout: FieldLayout): EncodedValue {
    const s = text.trim();
    if (/^0x/i.test(s)) return EncodedValue.fromHex(s, layout);
    if (/^0b/i.test(s)) return EncodedValue.fromBinary(s, layout);
    if (/^\d+$/.test(s)) return new EncodedValue(BigInt(s), layout);
    throw new MalformedInputError('Unrecognized bit pattern: ' + text, text);
  }

  /** Upper-case hex with `0x` prefix, zero-padded to the layout width */
  toHex(): string {
    return '0x' + this.bits.toString(16).toUpperCase().padStart(this.layout.hexDigits(), '0');
  }

  /**
   * Binary digits of the whole encoding.
   * @param grouped  separate sign, exponent and mantissa with spaces
   */
  toBinary(grouped: boolean = false): string {
    if (!grouped) return this.bits.toString(2).padStart(this.layout.totalBits, '0');
    const f = this.fieldBits();
    return `${f.sign} ${f.exponent} ${f.mantissa}`;
  }

  /** Each field as a zero-padded binary digit string */
  fieldBits(): FieldBits {
    return {
      sign: this.extractSign() ? '1' : '0',
      exponent: this.extractExponentCode().toString(2).padStart(this.layout.exponentBits, '0'),
      mantissa: this.extractFractionalCode().toString(2).padStart(this.layout.mantissaBits, '0'),
    };
  }

  toString(): string {
    return this.toHex();
  }

  // -----------------------------------------------------------------------
  // Field extraction
  // -----------------------------------------------------------------------

  /** Extract the sign bit from the encoding */
  extractSign(): boolean {
    return ((this.bits >> BigInt(this.layout.signBitPos)) & 1n) !== 0n;
  }

  /** Extract the biased exponent code from the encoding */
  extractExponentCode(): int4 {
    return Number((this.bits >> BigInt(this.layout.exponentPos)) & bitMask(this.layout.exponentBits));
  }

  /** Extract the stored mantissa (fraction) field, aligned to the bottom of the word */
  extractFractionalCode(): uintb {
    return this.bits & bitMask(this.layout.mantissaBits);
  }

  /** The class of this encoding, from the shared classification table */
  getClass(): FloatClass {
    return classify(this.extractExponentCode(), this.extractFractionalCode(), this.layout);
  }

  /** The same encoding with the sign bit flipped */
  negate(): EncodedValue {
    return new EncodedValue(this.bits ^ (1n << BigInt(this.layout.signBitPos)), this.layout);
  }

  equals(op2: EncodedValue): boolean {
    return this.bits === op2.bits && this.layout.equals(op2.layout);
  }
}
