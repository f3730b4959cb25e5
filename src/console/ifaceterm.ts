/**
 * @file ifaceterm.ts
 * @description Implement the command-line interface on top of a specific input stream.
 *
 * Input is line-buffered: a LineSource hands out complete lines, and scripts
 * are stacked as further sources.
 */

import * as fs from 'fs';
import { IfaceStatus } from './interface.js';
import { type Writer } from '../util/writer.js';

/**
 * A source of input lines for the terminal.
 */
export interface LineSource {
  /** Read the next line, or return null if the source is exhausted. */
  nextLine(): string | null;

  /** Return true if the source has no more lines. */
  isEof(): boolean;
}

/**
 * A LineSource backed by an array of strings (e.g., lines from a script file).
 */
export class ArrayLineSource implements LineSource {
  private lines: string[];
  private pos: number = 0;

  constructor(lines: string[]) {
    this.lines = lines;
  }

  nextLine(): string | null {
    if (this.pos >= this.lines.length) return null;
    return this.lines[this.pos++];
  }

  isEof(): boolean {
    return this.pos >= this.lines.length;
  }
}

/**
 * A LineSource reading all of standard input on first use.
 * Only suited to piped or redirected input.
 */
export class StdinLineSource implements LineSource {
  private inner: ArrayLineSource | null = null;

  private load(): ArrayLineSource {
    if (this.inner === null) {
      let content = '';
      try {
        content = fs.readFileSync(0, 'utf-8'); // fd 0 = stdin
      } catch (err) {
        // A closed or absent stdin reads as empty
        if (!(err instanceof Error) || !('code' in err) || (err.code !== 'EAGAIN' && err.code !== 'EOF')) throw err;
      }
      this.inner = new ArrayLineSource(content.split('\n'));
    }
    return this.inner;
  }

  nextLine(): string | null {
    return this.load().nextLine();
  }

  isEof(): boolean {
    return this.load().isEof();
  }
}

/**
 * Implement the command-line interface on top of a specific input stream.
 *
 * An initial input source is provided as the base stream to parse for commands.
 * Additional input sources can be stacked by invoking scripts.
 */
export class IfaceTerm extends IfaceStatus {
  private sptr: LineSource;
  private inputstack: LineSource[] = [];

  /**
   * @param prmpt - the command prompt string
   * @param input - the initial input source
   * @param output - the Writer for command output
   */
  constructor(prmpt: string, input: LineSource, output: Writer) {
    super(prmpt, output);
    this.sptr = input;
  }

  /**
   * Read the next command line from the current input source.
   */
  protected readLine(): string {
    const result = this.sptr.nextLine();
    if (result === null) return '';
    // Strip trailing newline / carriage-return if present
    return result.replace(/[\r\n]+$/, '');
  }

  /**
   * Push new script lines onto the stack.
   *
   * The current source is saved and restored when the new source is exhausted.
   */
  pushScript(lines: string[], newprompt: string): void {
    this.inputstack.push(this.sptr);
    this.sptr = new ArrayLineSource(lines);
    super.pushScript(lines, newprompt);
  }

  /**
   * Restore the previous input source from the stack.
   */
  popScript(): void {
    const prev = this.inputstack.pop();
    if (prev === undefined) return;
    this.sptr = prev;
    super.popScript();
  }

  /**
   * Processing is finished if the done flag is set, an error is pending,
   * or the underlying input source has reached EOF.
   */
  isStreamFinished(): boolean {
    if (this.done || this.inerror) return true;
    return this.sptr.isEof();
  }
}
