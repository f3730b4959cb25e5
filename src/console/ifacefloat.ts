/**
 * @file ifacefloat.ts
 * @description Console commands for encoding, decoding and inspecting IEEE 754
 * values.  All commands of the "float" module share the current layout.
 */

import { FloatClass, className } from '../core/classify.js';
import { decode } from '../core/decode.js';
import { formatExact, formatShortest } from '../core/decimal.js';
import { encode } from '../core/encode.js';
import { EncodedValue } from '../core/encoded.js';
import { FieldLayout, SINGLE, layoutByName } from '../core/layout.js';
import { describeLayout, specialValues, convert } from '../core/summary.js';
import { formatTrace, traceEncoding } from '../core/trace.js';
import {
  IfaceCommand,
  IfaceData,
  IfaceExecutionError,
  IfaceParseError,
  type IfaceStatus,
  InputStream,
} from './interface.js';
import { writeLine } from '../util/writer.js';

/**
 * Data shared by the float commands: the layout values are read under.
 */
export class IfaceFloatData extends IfaceData {
  layout: FieldLayout;

  constructor(layout: FieldLayout = SINGLE) {
    super();
    this.layout = layout;
  }
}

/**
 * Root class for all float commands.
 */
export abstract class IfaceFloatCommand extends IfaceCommand {
  protected status!: IfaceStatus;
  protected fdata!: IfaceFloatData;

  setData(root: IfaceStatus, data: IfaceData | null): void {
    if (!(data instanceof IfaceFloatData)) {
      throw new IfaceExecutionError('Float command registered without float data');
    }
    this.status = root;
    this.fdata = data;
  }

  getModule(): string {
    return 'float';
  }

  createData(): IfaceData | null {
    return new IfaceFloatData();
  }

  /** Read the rest of the line as a required parameter */
  protected readParam(s: InputStream, what: string): string {
    const rest = s.readRest().trim();
    if (rest.length === 0) {
      throw new IfaceParseError('Missing ' + what);
    }
    return rest;
  }

  protected write(line: string): void {
    writeLine(this.status.optr, line);
  }

  /** Write the field breakdown shared by encode and decode */
  protected writeFields(enc: EncodedValue): void {
    const f = enc.fieldBits();
    const cls = enc.getClass();
    const code = enc.extractExponentCode();
    let expnote = `biased: ${code}`;
    if (cls === FloatClass.normalized) expnote += `, actual: ${code - enc.layout.bias}`;
    else if (cls === FloatClass.denormalized) expnote += `, actual: ${enc.layout.minExponent()}`;
    this.write(`  Sign:     ${f.sign} (${f.sign === '1' ? '-' : '+'})`);
    this.write(`  Exponent: ${f.exponent} (${expnote})`);
    this.write(`  Mantissa: ${f.mantissa}`);
    this.write(`  Class:    ${className(cls)}`);
    this.write(`  Hex:      ${enc.toHex()}`);
  }
}

/**
 * Encode a real number in the current layout: `encode <value>`
 */
export class IfcEncode extends IfaceFloatCommand {
  execute(s: InputStream): void {
    const text = this.readParam(s, 'value to encode');
    const enc = encode(text, this.fdata.layout);
    this.write(`Number: ${text} (${this.fdata.layout.name})`);
    this.writeFields(enc);
    this.write(`  Complete: ${enc.toBinary()}`);
  }
}

/**
 * Decode a bit pattern in the current layout: `decode <bits>`
 *
 * Bits are given as `0x` hex, `0b` binary or an unsigned decimal integer.
 */
export class IfcDecode extends IfaceFloatCommand {
  execute(s: InputStream): void {
    const text = this.readParam(s, 'bit pattern to decode');
    const enc = EncodedValue.parse(text, this.fdata.layout);
    this.write(`Bits: ${enc.toBinary(true)} (${this.fdata.layout.name})`);
    this.writeFields(enc);
    this.write(`  Value:    ${formatExact(decode(enc))}`);
    this.write(`  Shortest: ${formatShortest(enc)}`);
  }
}

/**
 * Show the manual conversion steps for a value: `trace <value>`
 */
export class IfcTrace extends IfaceFloatCommand {
  execute(s: InputStream): void {
    const text = this.readParam(s, 'value to trace');
    for (const line of formatTrace(traceEncoding(text, this.fdata.layout))) {
      this.write(line);
    }
  }
}

/**
 * Re-encode a bit pattern into another layout: `convert <bits> <format>`
 */
export class IfcConvert extends IfaceFloatCommand {
  execute(s: InputStream): void {
    const bits = s.readToken();
    const target = s.readToken();
    if (bits.length === 0 || target.length === 0) {
      throw new IfaceParseError('Usage: convert <bits> <format>');
    }
    if (!s.eof()) {
      throw new IfaceParseError('Too many parameters to convert');
    }
    const to = layoutByName(target);
    if (to === null) {
      throw new IfaceParseError('Unknown format: ' + target);
    }
    const from = this.fdata.layout;
    const src = EncodedValue.parse(bits, from);
    const res = convert(src, from, to);
    this.write(`${src.toHex()} (${from.name}) -> ${res.toHex()} (${to.name})`);
    this.write(`  Value: ${formatShortest(src)} -> ${formatShortest(res)}`);
  }
}

/**
 * Show or set the current layout.
 *
 *   `format`
 *   `format <name>`
 *   `format custom <total> <exponent> <mantissa>`
 */
export class IfcFormat extends IfaceFloatCommand {
  execute(s: InputStream): void {
    if (s.eof()) {
      this.write('Format: ' + this.fdata.layout.toString());
      return;
    }
    const name = s.readToken();
    let layout: FieldLayout | null;
    if (name === 'custom') {
      const total = s.readNumber();
      const exponent = s.readNumber();
      const mantissa = s.readNumber();
      if (isNaN(total) || isNaN(exponent) || isNaN(mantissa)) {
        throw new IfaceParseError('Usage: format custom <total> <exponent> <mantissa>');
      }
      layout = new FieldLayout(total, exponent, mantissa);
    } else {
      layout = layoutByName(name);
      if (layout === null) {
        throw new IfaceParseError('Unknown format: ' + name);
      }
    }
    if (!s.eof()) {
      throw new IfaceParseError('Too many parameters to format');
    }
    this.fdata.layout = layout;
    this.write('Format set to ' + layout.toString());
  }
}

/**
 * Summarize the range and precision of the current layout: `layout`
 */
export class IfcLayout extends IfaceFloatCommand {
  execute(s: InputStream): void {
    if (!s.eof()) {
      throw new IfaceParseError('Too many parameters to layout');
    }
    const sum = describeLayout(this.fdata.layout);
    this.write(sum.layout.toString());
    this.write(`  Significant digits: ${sum.minPrecision} to ${sum.maxPrecision}`);
    this.write(`  Smallest denormal:  ${formatShortest(sum.minDenormal)} (${sum.minDenormal.toHex()})`);
    this.write(`  Smallest normal:    ${formatShortest(sum.minNormal)} (${sum.minNormal.toHex()})`);
    this.write(`  Largest finite:     ${formatShortest(sum.maxFinite)} (${sum.maxFinite.toHex()})`);
  }
}

/**
 * Print the encodings of the special values: `specials`
 */
export class IfcSpecials extends IfaceFloatCommand {
  execute(s: InputStream): void {
    if (!s.eof()) {
      throw new IfaceParseError('Too many parameters to specials');
    }
    this.write('Value             | Sign | Exponent | Mantissa | Hex');
    for (const sv of specialValues(this.fdata.layout)) {
      const f = sv.encoded.fieldBits();
      this.write(`${sv.label.padEnd(17)} | ${f.sign}    | ${f.exponent} | ${f.mantissa} | ${sv.encoded.toHex()}`);
    }
  }
}

/**
 * Register the float module's commands and set its starting layout.
 */
export function registerFloatCommands(status: IfaceStatus, layout: FieldLayout): void {
  status.registerCom(new IfcEncode(), 'encode');
  status.registerCom(new IfcDecode(), 'decode');
  status.registerCom(new IfcTrace(), 'trace');
  status.registerCom(new IfcConvert(), 'convert');
  status.registerCom(new IfcFormat(), 'format');
  status.registerCom(new IfcLayout(), 'layout');
  status.registerCom(new IfcSpecials(), 'specials');
  const data = status.getData('float');
  if (data instanceof IfaceFloatData) {
    data.layout = layout;
  }
}
