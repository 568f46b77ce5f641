#!/usr/bin/env node
/**
 * IPPcode parser CLI
 *
 * Usage: ipp-parse [-h|--help] < program.ipp > program.xml
 */

import { readFileSync, realpathSync, writeFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { ConfigError, resolveConfig } from './config.js';
import { ErrorKind, type ValidationError } from './parser/errors.js';
import { assembleProgram } from './parser/program.js';
import { renderProgram } from './xml/renderer.js';

export const EXIT_SUCCESS = 0;

export const EXIT_CODES: Readonly<Record<ErrorKind, number>> = {
  [ErrorKind.PARAMETER]: 10,
  [ErrorKind.INPUT]: 11,
  [ErrorKind.OUTPUT]: 12,
  [ErrorKind.HEADER]: 21,
  [ErrorKind.UNKNOWN_OPCODE]: 22,
  [ErrorKind.ARITY]: 23,
  [ErrorKind.OPERAND_SYNTAX]: 23,
  [ErrorKind.UNDECLARED_VARIABLE]: 23,
  [ErrorKind.MULTIPLE_OPCODE]: 23,
  [ErrorKind.INTERNAL]: 99,
};

export interface CliIO {
  readInput(): string;
  writeOutput(text: string): void;
  env: NodeJS.ProcessEnv;
}

const STDIN_FD = 0;
const STDOUT_FD = 1;

const defaultIO: CliIO = {
  readInput: () => readFileSync(STDIN_FD, 'utf-8'),
  writeOutput: text => writeFileSync(STDOUT_FD, text),
  env: process.env,
};

type CliCommand =
  | { type: 'translate' }
  | { type: 'help' }
  | { type: 'invalid'; message: string };

function parseArgs(args: string[]): CliCommand {
  const cliArgs = args.slice(2); // Skip node and script path

  if (cliArgs.length === 0) {
    return { type: 'translate' };
  }

  const isHelp = (arg: string) => arg === '-h' || arg === '--help';

  if (cliArgs.length === 1 && isHelp(cliArgs[0])) {
    return { type: 'help' };
  }

  if (cliArgs.some(isHelp)) {
    return { type: 'invalid', message: '--help cannot be combined with other parameters' };
  }

  return { type: 'invalid', message: `Unknown option '${cliArgs[0]}'` };
}

function printUsage(): void {
  console.log(`IPPcode parser

Reads IPPcode source from standard input and writes its XML
representation (UTF-8) to standard output.

Usage: ipp-parse [options] < program.ipp

Options:
  -h, --help  Show this help message

Environment:
  IPPCODE_LANGUAGE  Language version to accept (default: IPPcode24)`);
}

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function formatDiagnostic(error: ValidationError): string {
  return `<stdin>:${error.line}:${error.column}: ${error.message}`;
}

function run(args: string[], io: CliIO): number {
  const command = parseArgs(args);

  if (command.type === 'invalid') {
    console.error(`Error: ${command.message}`);
    return EXIT_CODES[ErrorKind.PARAMETER];
  }

  if (command.type === 'help') {
    printUsage();
    return EXIT_SUCCESS;
  }

  let language: string;
  try {
    language = resolveConfig(io.env).language;
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(`Error: ${e.message}`);
      return EXIT_CODES[ErrorKind.PARAMETER];
    }
    throw e;
  }

  let source: string;
  try {
    source = io.readInput();
  } catch (e) {
    console.error(`Error: Cannot read standard input: ${describe(e)}`);
    return EXIT_CODES[ErrorKind.INPUT];
  }

  const result = assembleProgram(source, { language });

  if (!result.success) {
    console.error(formatDiagnostic(result.error));
    return EXIT_CODES[result.error.kind];
  }

  try {
    io.writeOutput(renderProgram(result.value));
  } catch (e) {
    console.error(`Error: Cannot write standard output: ${describe(e)}`);
    return EXIT_CODES[ErrorKind.OUTPUT];
  }

  return EXIT_SUCCESS;
}

export function main(args: string[] = process.argv, io: CliIO = defaultIO): number {
  try {
    return run(args, io);
  } catch (e) {
    console.error(`Internal error: ${describe(e)}`);
    return EXIT_CODES[ErrorKind.INTERNAL];
  }
}

/**
 * True when `script` resolves to this module, also through the npm bin
 * symlink. A path that does not exist is never this module.
 */
export function isEntryScript(script: string | undefined, moduleUrl: string = import.meta.url): boolean {
  if (script === undefined) {
    return false;
  }
  try {
    return realpathSync(script) === fileURLToPath(moduleUrl);
  } catch {
    return false;
  }
}

if (isEntryScript(process.argv[1])) {
  process.exitCode = main();
}
