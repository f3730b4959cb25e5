/**
 * @file error.ts
 * @description Error classes raised by the codec.
 *
 * Overflow, underflow and invalid results are never errors: they are encoded
 * as Infinity, zero and NaN.  Only bad configuration and malformed external
 * input surface as exceptions.
 */

/**
 * The lowest level error generated by the codec.
 *
 * The `explain` field holds the human readable description that the console
 * prints.
 */
export class LowlevelError extends Error {
  explain: string;
  constructor(message: string) {
    super(message);
    this.name = 'LowlevelError';
    this.explain = message;
  }
}

/**
 * A field layout whose widths do not describe a valid binary interchange
 * format.  Raised only when a FieldLayout is constructed.
 */
export class InvalidLayoutError extends LowlevelError {
  constructor(s: string) {
    super(s);
    this.name = 'InvalidLayoutError';
  }
}

/**
 * External input that cannot be interpreted: a bit pattern of the wrong
 * width, bad digits, or a decimal string that is not a real number.
 */
export class MalformedInputError extends LowlevelError {
  /** The offending input, as given */
  readonly input: string;

  constructor(s: string, input: string) {
    super(s);
    this.name = 'MalformedInputError';
    this.input = input;
  }
}
