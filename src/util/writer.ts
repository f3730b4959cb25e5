/**
 * @file writer.ts
 * @description Writer interface used for all console output.
 */

/**
 * Abstract writer interface.
 * Implementations can write to strings, files, or other destinations.
 */
export interface Writer {
  write(s: string): void;
}

/**
 * Writer that accumulates output into a string buffer.
 */
export class StringWriter implements Writer {
  private buf: string[] = [];

  write(s: string): void {
    this.buf.push(s);
  }

  toString(): string {
    return this.buf.join('');
  }

  /** Output split into lines, without the empty string after a final newline */
  lines(): string[] {
    const res = this.toString().split('\n');
    if (res.length > 0 && res[res.length - 1] === '') res.pop();
    return res;
  }

  clear(): void {
    this.buf.length = 0;
  }
}

/**
 * Writer that writes to process stdout.
 */
export class ConsoleWriter implements Writer {
  write(s: string): void {
    process.stdout.write(s);
  }
}

/**
 * Utility: write one line followed by a newline.
 */
export function writeLine(w: Writer, s: string): void {
  w.write(s);
  w.write('\n');
}
