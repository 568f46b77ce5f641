/**
 * IPPcode program assembler
 *
 * Runs the preprocessor and the instruction parser over a whole source
 * text and stops at the first error.
 */

import { type ParseResult, succeed } from './errors.js';
import { type Instruction, InstructionParser, createParseContext } from './parser.js';
import { preprocess } from './preprocessor.js';

export const DEFAULT_LANGUAGE = 'IPPcode24';

export interface Program {
  language: string;
  instructions: Instruction[];
}

export interface AssembleOptions {
  /** Language version; the header must read `.` followed by it. */
  language?: string;
}

export function splitLines(source: string): string[] {
  if (source.length === 0) {
    return [];
  }
  const lines = source.split(/\r?\n/);
  // A trailing newline does not open another line
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export class ProgramAssembler {
  private lines: readonly string[];
  private language: string;

  constructor(source: string | readonly string[], options: AssembleOptions = {}) {
    this.lines = typeof source === 'string' ? splitLines(source) : source;
    this.language = options.language ?? DEFAULT_LANGUAGE;
  }

  assemble(): ParseResult<Program> {
    const preprocessed = preprocess(this.lines, this.language);
    if (!preprocessed.success) {
      return preprocessed;
    }

    // Fresh declarations and order counter for every run
    const parser = new InstructionParser(createParseContext());
    const instructions: Instruction[] = [];

    for (const line of preprocessed.value.lines) {
      const result = parser.parseLine(line);
      if (!result.success) {
        return result;
      }
      instructions.push(result.value);
    }

    return succeed<Program>({
      language: this.language,
      instructions,
    });
  }
}

export function assembleProgram(source: string | readonly string[], options: AssembleOptions = {}): ParseResult<Program> {
  return new ProgramAssembler(source, options).assemble();
}
