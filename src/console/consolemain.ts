#!/usr/bin/env node
/**
 * @file consolemain.ts
 * @description Main entry point for the floatcodec console.
 *
 *   floatcodec [-f format] [-i initscript] [command words...]
 *
 * With command words the single command is executed; otherwise commands are
 * read from standard input, one per line.  `FLOATCODEC_FORMAT` supplies the
 * starting format when -f is absent.
 */

import * as fs from 'fs';
import { fileURLToPath } from 'url';

import { InvalidLayoutError, LowlevelError, MalformedInputError } from '../core/error.js';
import { type FieldLayout, SINGLE, layoutByName } from '../core/layout.js';
import { registerFloatCommands } from './ifacefloat.js';
import { ArrayLineSource, IfaceTerm, type LineSource, StdinLineSource } from './ifaceterm.js';
import {
  IfaceError,
  IfaceExecutionError,
  IfaceParseError,
  type IfaceStatus,
  registerBaseCommands,
} from './interface.js';
import { ConsoleWriter, type Writer } from '../util/writer.js';

/** Environment variable naming the starting format */
export const FORMAT_ENV = 'FLOATCODEC_FORMAT';

/** Options gathered from the command line and environment */
export interface ConsoleOptions {
  layout: FieldLayout;
  initscript: string | null;
  /** Command words to run instead of reading stdin */
  command: string[];
}

/**
 * Parse command-line arguments.
 *
 * @param args - arguments without the node / script prefix
 * @param env - environment to read FLOATCODEC_FORMAT from
 * @throws IfaceParseError for unknown options or formats
 */
export function parseArgs(args: string[], env: NodeJS.ProcessEnv = process.env): ConsoleOptions {
  let formatName: string | undefined = env[FORMAT_ENV];
  let initscript: string | null = null;
  let i = 0;
  while (i < args.length && args[i].startsWith('-') && args[i].length > 1 && !/^-[\d.]/.test(args[i])) {
    const opt = args[i];
    if (opt === '--') {
      i += 1;
      break;
    }
    if (i + 1 >= args.length) {
      throw new IfaceParseError('Missing argument to ' + opt);
    }
    if (opt === '-f' || opt === '--format') {
      formatName = args[i + 1];
    } else if (opt === '-i' || opt === '--init') {
      initscript = args[i + 1];
    } else {
      throw new IfaceParseError('Unknown option: ' + opt);
    }
    i += 2;
  }

  let layout = SINGLE;
  if (formatName !== undefined && formatName.length > 0) {
    const named = layoutByName(formatName);
    if (named === null) {
      throw new IfaceParseError('Unknown format: ' + formatName);
    }
    layout = named;
  }
  return { layout, initscript, command: args.slice(i) };
}

/**
 * Execute one command and process any error.
 *
 * Errors are reported on the console output and the interface decides
 * whether to abort the current script.
 *
 * @param status - the console interface
 */
export function execute(status: IfaceStatus): void {
  try {
    if (status.runCommand()) status.setLastCommandFailed(false);
    return;
  } catch (err) {
    status.setLastCommandFailed(true);
    if (err instanceof IfaceParseError) {
      status.optr.write('Command parsing error: ' + err.explain + '\n');
    } else if (err instanceof IfaceExecutionError) {
      status.optr.write('Execution error: ' + err.explain + '\n');
    } else if (err instanceof IfaceError) {
      status.optr.write('ERROR: ' + err.explain + '\n');
    } else if (err instanceof MalformedInputError) {
      status.optr.write('Input ERROR: ' + err.explain + '\n');
    } else if (err instanceof InvalidLayoutError) {
      status.optr.write('Layout ERROR: ' + err.explain + '\n');
    } else if (err instanceof LowlevelError) {
      status.optr.write('Low-level ERROR: ' + err.explain + '\n');
    } else {
      throw err;
    }
  }
  status.evaluateError();
}

/**
 * Execute commands as they become available.
 *
 * Execution loops until either the `done` field in the console is set or all
 * streams have ended, popping script states pushed by the init script.
 *
 * @param status - the console interface
 * @param prompt - write the prompt before each command
 */
export function mainloop(status: IfaceStatus, prompt: boolean = true): void {
  for (;;) {
    while (!status.isStreamFinished()) {
      if (prompt) status.writePrompt();
      execute(status);
    }
    if (status.done) break;
    if (status.getNumInputStreamSize() === 0) break;
    status.popScript();
  }
}

/**
 * Build a console on the given input and output, with all commands registered.
 */
export function createConsole(input: LineSource, output: Writer, layout: FieldLayout): IfaceTerm {
  const status = new IfaceTerm('[float]> ', input, output);
  registerBaseCommands(status);
  registerFloatCommands(status, layout);
  return status;
}

/**
 * Main entry point for the console.
 *
 * 1. Parse command-line arguments and FLOATCODEC_FORMAT.
 * 2. Create the console and register all commands.
 * 3. If an init script was specified, push it.
 * 4. Run the single command given on the command line, or the main loop on stdin.
 *
 * @param args - command-line arguments (without the node / script prefix)
 * @param output - where console output goes
 * @param env - environment variables
 * @returns exit code: 1 if the last command failed, otherwise 0
 */
export function main(args: string[], output: Writer = new ConsoleWriter(), env: NodeJS.ProcessEnv = process.env): number {
  let opts: ConsoleOptions;
  try {
    opts = parseArgs(args, env);
  } catch (err) {
    if (err instanceof IfaceError) {
      process.stderr.write(err.explain + '\n');
      return 1;
    }
    throw err;
  }

  const oneShot = opts.command.length > 0;
  const input: LineSource = oneShot
    ? new ArrayLineSource([opts.command.join(' ')])
    : new StdinLineSource();
  const status = createConsole(input, output, opts.layout);
  if (oneShot) {
    status.setErrorIsDone(true);
  }

  if (opts.initscript !== null) {
    try {
      status.pushScriptFile(opts.initscript, 'init> ');
    } catch (err) {
      if (err instanceof IfaceParseError) {
        status.optr.write(err.explain + '\n');
        return 1;
      }
      throw err;
    }
  }

  mainloop(status, !oneShot && process.stdin.isTTY === true);
  return status.didLastCommandFail() ? 1 : 0;
}

// ---------------------------------------------------------------------------
// CLI entry point
// ---------------------------------------------------------------------------

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (script === undefined) return false;
  try {
    return fs.realpathSync(script) === fs.realpathSync(fileURLToPath(import.meta.url));
  } catch (_e) {
    return false;
  }
}

if (isEntryPoint()) {
  process.exitCode = main(process.argv.slice(2));
}
