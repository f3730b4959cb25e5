/**
 * @file interface.ts
 * @description Classes and utilities for a generic command-line interface.
 */

import * as fs from 'fs';
import { type Writer } from '../util/writer.js';

// ---------------------------------------------------------------------------
// InputStream: command parameter parsing
// ---------------------------------------------------------------------------

/**
 * Simple string-based input stream for command parsing.
 * Commands use this to read additional parameters from the command line.
 */
export class InputStream {
  private str: string;
  private pos: number;

  constructor(s: string) {
    this.str = s;
    this.pos = 0;
  }

  /** Skip whitespace and return true if at end of input. */
  eof(): boolean {
    this.skipWhitespace();
    return this.pos >= this.str.length;
  }

  /** Read the next whitespace-delimited token. Returns empty string if at EOF. */
  readToken(): string {
    this.skipWhitespace();
    if (this.pos >= this.str.length) return '';
    const start = this.pos;
    while (this.pos < this.str.length && !this.isWhitespace(this.str[this.pos])) {
      this.pos++;
    }
    return this.str.substring(start, this.pos);
  }

  /** Read the remaining content (trimmed of leading whitespace). */
  readRest(): string {
    this.skipWhitespace();
    const rest = this.str.substring(this.pos);
    this.pos = this.str.length;
    return rest;
  }

  /** Read the next token as a decimal integer. Returns NaN if not a valid number. */
  readNumber(): number {
    const tok = this.readToken();
    if (!/^-?\d+$/.test(tok)) return NaN;
    return parseInt(tok, 10);
  }

  /** Skip whitespace characters, advancing the position. */
  skipWhitespace(): void {
    while (this.pos < this.str.length && this.isWhitespace(this.str[this.pos])) {
      this.pos++;
    }
  }

  private isWhitespace(c: string): boolean {
    return c === ' ' || c === '\t' || c === '\n' || c === '\r';
  }
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * An exception specific to the command line interface.
 */
export class IfaceError extends Error {
  readonly explain: string;

  constructor(s: string) {
    super(s);
    this.name = 'IfaceError';
    this.explain = s;
  }
}

/**
 * An exception describing a parsing error in a command line.
 *
 * Options are missing or are in the wrong form etc.
 */
export class IfaceParseError extends IfaceError {
  constructor(s: string) {
    super(s);
    this.name = 'IfaceParseError';
  }
}

/**
 * An exception thrown during the execution of a command.
 */
export class IfaceExecutionError extends IfaceError {
  constructor(s: string) {
    super(s);
    this.name = 'IfaceExecutionError';
  }
}

// ---------------------------------------------------------------------------
// IfaceData / IfaceCommand
// ---------------------------------------------------------------------------

/**
 * Data shared by all commands of one module.  Concrete modules add fields.
 */
export class IfaceData {}

/**
 * A command that can be executed from the command line.
 *
 * The command is associated with a specific sequence of words (tokens)
 * that should appear at the start of the command line, and reads any
 * further parameters from the InputStream passed to execute().
 */
export abstract class IfaceCommand {
  private com: string[] = [];

  /**
   * Associate the interface and the module's data object with this command.
   */
  abstract setData(root: IfaceStatus, data: IfaceData | null): void;

  /** Execute this command, reading parameters from the given stream. */
  abstract execute(s: InputStream): void;

  /**
   * Get the formal module name to which this command belongs.
   * Commands in the same module share data through their registered IfaceData object.
   */
  abstract getModule(): string;

  /**
   * Create the data object for this command's module.
   * Only called for the first command registered in a module.
   */
  abstract createData(): IfaceData | null;

  /** Add a token to the command line string associated with this command. */
  addWord(temp: string): void {
    this.com.push(temp);
  }

  /** Get the i-th command token. */
  getCommandWord(i: number): string {
    return this.com[i];
  }

  /** Return the number of tokens in the command line string. */
  numWords(): number {
    return this.com.length;
  }

  /** Get the complete command line string. */
  commandString(): string {
    return IfaceStatus.wordsToString(this.com);
  }
}

// ---------------------------------------------------------------------------
// IfaceStatus
// ---------------------------------------------------------------------------

/**
 * A generic console mode interface and command executor.
 *
 * Input is provided one command line at a time via readLine().
 * Output goes to a provided Writer, optr.
 *
 * A derived IfaceCommand is attached to a command string via registerCom():
 * ```
 *   stat.registerCom(new IfcQuit(), "quit");
 * ```
 *
 * Command words only have to match enough to disambiguate from other commands.
 */
export abstract class IfaceStatus {
  private promptstack: string[] = [];
  private flagstack: number[] = [];
  private prompt: string;
  private maxhistory: number;
  private curhistory: number = 0;
  private history: string[] = [];
  private errorisdone: boolean = false;
  private lastfailed: boolean = false;

  protected inerror: boolean = false;
  protected comlist: IfaceCommand[] = [];
  protected datamap: Map<string, IfaceData | null> = new Map();

  done: boolean = false;
  optr: Writer;

  /**
   * @param prmpt - the base command line prompt
   * @param os - the Writer to send output to
   * @param mxhist - the maximum number of lines to store in history
   */
  constructor(prmpt: string, os: Writer, mxhist: number = 10) {
    this.optr = os;
    this.prompt = prmpt;
    this.maxhistory = mxhist;
  }

  /** Set if processing should terminate on an error. */
  setErrorIsDone(val: boolean): void {
    this.errorisdone = val;
  }

  /**
   * Provide new script lines to execute, with an associated command prompt.
   *
   * Subclasses make the lines the primary source for new commands; this base
   * implementation saves the prompt and error flags, so processing resumes
   * unchanged when popScript() is called.  Errors in a script abort it.
   */
  pushScript(_lines: string[], newprompt: string): void {
    this.promptstack.push(this.prompt);
    this.flagstack.push(this.errorisdone ? 1 : 0);
    this.errorisdone = true;  // Abort on first exception in a script
    this.prompt = newprompt;
  }

  /**
   * Read a script file and push its lines.
   * @throws IfaceParseError if the file cannot be read
   */
  pushScriptFile(filename: string, newprompt: string): void {
    let content: string;
    try {
      content = fs.readFileSync(filename, 'utf-8');
    } catch (_e) {
      throw new IfaceParseError('Unable to open script file: ' + filename);
    }
    this.pushScript(content.split('\n'), newprompt);
  }

  /** Return to processing the parent stream. */
  popScript(): void {
    const prompt = this.promptstack.pop();
    const flags = this.flagstack.pop();
    if (prompt === undefined || flags === undefined) return;
    this.prompt = prompt;
    this.errorisdone = (flags & 1) !== 0;
    this.inerror = false;
  }

  /** Get depth of script nesting. */
  getNumInputStreamSize(): number {
    return this.promptstack.length;
  }

  /** Write the current command prompt to the output stream. */
  writePrompt(): void {
    this.optr.write(this.prompt);
  }

  /**
   * Register a command with this interface under one or more tokens.
   *
   * @param fptr - the IfaceCommand object
   * @param words - the tokens representing the command
   */
  registerCom(fptr: IfaceCommand, ...words: string[]): void {
    for (const w of words) fptr.addWord(w);
    this.comlist.push(fptr);

    const nm = fptr.getModule();
    let data: IfaceData | null;
    if (!this.datamap.has(nm)) {
      data = fptr.createData();
      this.datamap.set(nm, data);
    } else {
      data = this.datamap.get(nm) ?? null;
    }
    fptr.setData(this, data);
  }

  /**
   * Get data associated with an IfaceCommand module.
   * @returns the IfaceData object or null
   */
  getData(nm: string): IfaceData | null {
    return this.datamap.get(nm) ?? null;
  }

  /**
   * Run the next command.
   *
   * A single command line is read (via readLine) and executed.  Errors
   * raised while matching or executing the command propagate to the caller.
   * @returns true if a command was executed, false for a blank line
   */
  runCommand(): boolean {
    const line = this.readLine();
    if (line.trim().length === 0) return false;
    this.saveHistory(line);

    const is = new InputStream(line);
    this.expandCom(is).execute(is);
    return true;
  }

  /**
   * Get the i-th command line from history.
   * @param i - the number of steps back to go
   */
  getHistory(i: number): string {
    if (i >= this.history.length) return '';
    let idx = this.curhistory - 1 - i;
    if (idx < 0) idx += this.maxhistory;
    return this.history[idx];
  }

  /** Get the number of command lines in history. */
  getHistorySize(): number {
    return this.history.length;
  }

  /** Return true if the current stream is finished. */
  abstract isStreamFinished(): boolean;

  /** Return true if the last command failed. */
  isInError(): boolean {
    return this.inerror;
  }

  /** Return true if the most recent non-blank command line failed. */
  didLastCommandFail(): boolean {
    return this.lastfailed;
  }

  /** Record whether the most recent command line failed. */
  setLastCommandFailed(val: boolean): void {
    this.lastfailed = val;
  }

  /** Adjust which stream to process based on last error. */
  evaluateError(): void {
    if (this.errorisdone) {
      this.optr.write('Aborting process\n');
      this.inerror = true;
      this.done = true;
      return;
    }
    if (this.getNumInputStreamSize() !== 0) {
      this.optr.write('Aborting ' + this.prompt + '\n');
      this.inerror = true;
      return;
    }
    this.inerror = false;
  }

  /**
   * Concatenate a list of tokens into a single string, separated by a space character.
   */
  static wordsToString(list: string[]): string {
    return list.join(' ');
  }

  /** Read the next command line. */
  protected abstract readLine(): string;

  /** The line is saved in a circular history buffer. */
  private saveHistory(line: string): void {
    if (this.history.length < this.maxhistory) {
      this.history.push(line);
    } else {
      this.history[this.curhistory] = line;
    }
    this.curhistory += 1;
    if (this.curhistory === this.maxhistory) {
      this.curhistory = 0;
    }
  }

  /**
   * Match tokens from the input stream against the registered commands.
   *
   * Each token narrows the candidates to commands whose word at that
   * position equals the token, or failing that starts with it.  Reading
   * stops as soon as one command has all of its words matched; the rest
   * of the stream is left for the command's parameters.
   * @throws IfaceParseError if no command, or more than one, matches
   */
  protected expandCom(s: InputStream): IfaceCommand {
    let candidates = this.comlist;
    for (let pos = 0; ; ++pos) {
      if (candidates.every((c) => c.numWords() === pos)) {
        if (candidates.length === 1) return candidates[0];
        throw new IfaceParseError('Ambiguous command: ' + candidates.map((c) => c.commandString()).join(', '));
      }
      if (s.eof()) {
        throw new IfaceParseError('Incomplete command');
      }
      const tok = s.readToken();
      const remaining = candidates.filter((c) => c.numWords() > pos);
      const exact = remaining.filter((c) => c.getCommandWord(pos) === tok);
      candidates = exact.length > 0 ? exact : remaining.filter((c) => c.getCommandWord(pos).startsWith(tok));
      if (candidates.length === 0) {
        throw new IfaceParseError('Invalid command: ' + tok);
      }
    }
  }
}

// ---------------------------------------------------------------------------
// IfaceBaseCommand
// ---------------------------------------------------------------------------

/**
 * A root class for a basic set of commands.
 *
 * Commands derived from this class are in the "base" module.
 * They are useful as part of any interface.
 */
export abstract class IfaceBaseCommand extends IfaceCommand {
  protected status!: IfaceStatus;

  setData(root: IfaceStatus, _data: IfaceData | null): void {
    this.status = root;
  }

  getModule(): string {
    return 'base';
  }

  createData(): IfaceData | null {
    return null;
  }
}

// ---------------------------------------------------------------------------
// Built-in commands
// ---------------------------------------------------------------------------

/**
 * Quit command to terminate processing from the given interface.
 */
export class IfcQuit extends IfaceBaseCommand {
  execute(s: InputStream): void {
    if (!s.eof()) {
      throw new IfaceParseError('Too many parameters to quit');
    }
    this.status.done = true;  // Set flag to drop out of mainloop
  }
}

/**
 * History command to list the most recent successful commands.
 */
export class IfcHistory extends IfaceBaseCommand {
  execute(s: InputStream): void {
    let num: number;

    if (!s.eof()) {
      num = s.readNumber();
      if (isNaN(num)) {
        throw new IfaceParseError('Bad number parameter to history');
      }
      if (!s.eof()) {
        throw new IfaceParseError('Too many parameters to history');
      }
    } else {
      num = 10;  // Default number of history lines
    }

    if (num > this.status.getHistorySize()) {
      num = this.status.getHistorySize();
    }

    for (let i = num - 1; i >= 0; --i) {
      // List oldest to newest
      this.status.optr.write(this.status.getHistory(i) + '\n');
    }
  }
}

/**
 * Echo command to echo the rest of the command line to the output.
 */
export class IfcEcho extends IfaceBaseCommand {
  execute(s: InputStream): void {
    this.status.optr.write(s.readRest() + '\n');
  }
}

/** Register the base module's commands */
export function registerBaseCommands(status: IfaceStatus): void {
  status.registerCom(new IfcQuit(), 'quit');
  status.registerCom(new IfcHistory(), 'history');
  status.registerCom(new IfcEcho(), 'echo');
}
