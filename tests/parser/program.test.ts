import { describe, it, expect } from 'vitest';
import {
  DEFAULT_LANGUAGE,
  type Program,
  ProgramAssembler,
  assembleProgram,
  splitLines,
} from '../../src/parser/program.js';
import { ErrorKind, type ParseResult } from '../../src/parser/errors.js';
import { OperandKind } from '../../src/parser/operand.js';

function expectProgram(result: ParseResult<Program>): Program {
  if (!result.success) {
    throw new Error(`Expected a program, got: ${result.error.message}`);
  }
  return result.value;
}

function expectError(result: ParseResult<Program>) {
  if (result.success) {
    throw new Error(`Expected an error, got ${result.value.instructions.length} instruction(s)`);
  }
  return result.error;
}

describe('ProgramAssembler', () => {
  describe('splitLines', () => {
    it('should split on LF and CRLF', () => {
      expect(splitLines('a\nb\r\nc')).toEqual(['a', 'b', 'c']);
    });

    it('should ignore one trailing newline', () => {
      expect(splitLines('a\nb\n')).toEqual(['a', 'b']);
    });

    it('should return no lines for empty input', () => {
      expect(splitLines('')).toEqual([]);
    });
  });

  describe('end-to-end', () => {
    it('should parse declarations, moves and writes in order', () => {
      const program = expectProgram(assembleProgram('.IPPcode24\nDEFVAR GF@x\nMOVE GF@x int@42\nWRITE GF@x'));

      expect(program.language).toBe('IPPcode24');
      expect(program.instructions.map(i => [i.opcode, i.order])).toEqual([
        ['DEFVAR', 1],
        ['MOVE', 2],
        ['WRITE', 3],
      ]);

      const value = program.instructions[1].operands[1];
      expect(value.kind).toBe(OperandKind.INT);
      if (value.kind === OperandKind.INT) {
        expect(value.integer).toBe(42n);
        expect(value.value).toBe('42');
      }
    });

    it('should fail with a header error when the header is missing', () => {
      const error = expectError(assembleProgram('DEFVAR GF@x\nWRITE GF@x'));
      expect(error.kind).toBe(ErrorKind.HEADER);
    });

    it('should fail with an arity error for missing operands', () => {
      const error = expectError(assembleProgram('.IPPcode24\nADD GF@x GF@x'));
      expect(error.kind).toBe(ErrorKind.ARITY);
      expect(error.line).toBe(2);
    });

    it('should decode escape sequences in string literals', () => {
      const program = expectProgram(assembleProgram('.IPPcode24\nDEFVAR GF@x\nMOVE GF@x string@ab\\065c'));
      expect(program.instructions[1].operands[1].value).toBe('abAc');
    });

    it('should reject the escape example when GF@x was never declared', () => {
      const error = expectError(assembleProgram('.IPPcode24\nMOVE GF@x string@ab\\065c'));
      expect(error).toMatchObject({
        kind: ErrorKind.UNDECLARED_VARIABLE,
        message: "Variable 'GF@x' is used before its DEFVAR",
        line: 2,
        column: 6,
      });
    });

    it('should accept a non-breaking space between opcode and operand', () => {
      const program = expectProgram(assembleProgram('.IPPcode24\nDEFVAR\u00a0GF@x'));
      expect(program.instructions[0].opcode).toBe('DEFVAR');
      expect(program.instructions[0].operands[0].text).toBe('GF@x');
    });

    it('should fail with an unknown opcode error for unknown instructions', () => {
      const error = expectError(assembleProgram('.IPPcode24\nFOO GF@x'));
      expect(error.kind).toBe(ErrorKind.UNKNOWN_OPCODE);
      expect(error.kind).not.toBe(ErrorKind.ARITY);
      expect(error.kind).not.toBe(ErrorKind.OPERAND_SYNTAX);
    });
  });

  describe('preprocessing', () => {
    it('should number instructions without gaps across comments and blank lines', () => {
      const source = [
        '# leading comment',
        '.IPPcode24 # header',
        '',
        'CREATEFRAME',
        '   # nothing here',
        'PUSHFRAME # push it',
        '',
        '',
        'POPFRAME',
      ].join('\n');

      const program = expectProgram(assembleProgram(source));
      expect(program.instructions.map(i => i.order)).toEqual([1, 2, 3]);
      expect(program.instructions.map(i => i.line)).toEqual([4, 6, 9]);
    });

    it('should accept a header with no instructions as an empty program', () => {
      const program = expectProgram(assembleProgram('.IPPcode24\n# nothing else\n'));
      expect(program.instructions).toEqual([]);
    });

    it('should report the header before any instruction error', () => {
      const error = expectError(assembleProgram('FOO\n.IPPcode24'));
      expect(error.kind).toBe(ErrorKind.HEADER);
    });

    it('should accept an array of lines', () => {
      const program = expectProgram(new ProgramAssembler(['.IPPcode24', 'BREAK']).assemble());
      expect(program.instructions).toHaveLength(1);
    });
  });

  describe('fail-fast', () => {
    it('should stop at the first error', () => {
      const error = expectError(assembleProgram('.IPPcode24\nWRITE GF@a\nFOO'));
      expect(error.kind).toBe(ErrorKind.UNDECLARED_VARIABLE);
      expect(error.line).toBe(2);
      expect(error.column).toBe(7);
    });

    it('should only allow variables declared on earlier lines', () => {
      const error = expectError(assembleProgram('.IPPcode24\nMOVE GF@x int@1\nDEFVAR GF@x'));
      expect(error.kind).toBe(ErrorKind.UNDECLARED_VARIABLE);
    });
  });

  describe('runs', () => {
    it('should start every run with fresh declarations and order numbers', () => {
      const assembler = new ProgramAssembler('.IPPcode24\nDEFVAR GF@x\nWRITE GF@x');
      const first = expectProgram(assembler.assemble());
      const second = expectProgram(assembler.assemble());
      expect(second.instructions.map(i => i.order)).toEqual([1, 2]);
      expect(second).toEqual(first);
    });

    it('should not share declarations between programs', () => {
      expectProgram(assembleProgram('.IPPcode24\nDEFVAR GF@shared'));
      const error = expectError(assembleProgram('.IPPcode24\nWRITE GF@shared'));
      expect(error.kind).toBe(ErrorKind.UNDECLARED_VARIABLE);
    });
  });

  describe('language version', () => {
    it('should default to IPPcode24', () => {
      expect(DEFAULT_LANGUAGE).toBe('IPPcode24');
    });

    it('should expect the header of the configured language', () => {
      const program = expectProgram(assembleProgram('.IPPcode23\nBREAK', { language: 'IPPcode23' }));
      expect(program.language).toBe('IPPcode23');
      expect(expectError(assembleProgram('.IPPcode24\nBREAK', { language: 'IPPcode23' })).kind).toBe(
        ErrorKind.HEADER
      );
    });
  });
});
