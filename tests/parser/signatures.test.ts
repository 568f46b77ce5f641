import { describe, it, expect } from 'vitest';
import { OPCODES, OperandCategory, isOpcode, lookupSignature } from '../../src/parser/signatures.js';

const { VARIABLE, SYMBOL, LABEL, TYPE } = OperandCategory;

const EXPECTED_ARITY: Record<string, number> = {
  CREATEFRAME: 0, PUSHFRAME: 0, POPFRAME: 0, RETURN: 0, BREAK: 0,
  DEFVAR: 1, POPS: 1, CALL: 1, LABEL: 1, JUMP: 1, PUSHS: 1, WRITE: 1, EXIT: 1, DPRINT: 1,
  MOVE: 2, INT2CHAR: 2, STRLEN: 2, TYPE: 2, NOT: 2, READ: 2,
  ADD: 3, SUB: 3, MUL: 3, IDIV: 3, LT: 3, GT: 3, EQ: 3, AND: 3, OR: 3,
  STRI2INT: 3, CONCAT: 3, GETCHAR: 3, SETCHAR: 3, JUMPIFEQ: 3, JUMPIFNEQ: 3,
};

describe('Instruction signatures', () => {
  it('should list every IPPcode instruction exactly once', () => {
    expect(OPCODES).toHaveLength(35);
    expect(new Set(OPCODES).size).toBe(35);
    expect([...OPCODES].sort()).toEqual(Object.keys(EXPECTED_ARITY).sort());
  });

  it('should match the documented arity of every opcode', () => {
    for (const [opcode, arity] of Object.entries(EXPECTED_ARITY)) {
      expect(lookupSignature(opcode)?.operands).toHaveLength(arity);
    }
  });

  it('should look up opcodes case-insensitively', () => {
    expect(lookupSignature('move')?.opcode).toBe('MOVE');
    expect(lookupSignature('Jumpifeq')?.opcode).toBe('JUMPIFEQ');
  });

  it('should return undefined for unknown opcodes', () => {
    expect(lookupSignature('FOO')).toBeUndefined();
    expect(lookupSignature('')).toBeUndefined();
    expect(lookupSignature('GF@x')).toBeUndefined();
    expect(lookupSignature('.IPPcode24')).toBeUndefined();
  });

  describe('operand categories', () => {
    it('should expect var and symb for MOVE', () => {
      expect(lookupSignature('MOVE')?.operands).toEqual([VARIABLE, SYMBOL]);
    });

    it('should expect var and type for READ', () => {
      expect(lookupSignature('READ')?.operands).toEqual([VARIABLE, TYPE]);
    });

    it('should expect a label and two symbols for conditional jumps', () => {
      expect(lookupSignature('JUMPIFEQ')?.operands).toEqual([LABEL, SYMBOL, SYMBOL]);
      expect(lookupSignature('JUMPIFNEQ')?.operands).toEqual([LABEL, SYMBOL, SYMBOL]);
    });

    it('should expect var, symb, symb for arithmetic', () => {
      for (const opcode of ['ADD', 'SUB', 'MUL', 'IDIV']) {
        expect(lookupSignature(opcode)?.operands).toEqual([VARIABLE, SYMBOL, SYMBOL]);
      }
    });

    it('should expect a single label for CALL, LABEL and JUMP', () => {
      for (const opcode of ['CALL', 'LABEL', 'JUMP']) {
        expect(lookupSignature(opcode)?.operands).toEqual([LABEL]);
      }
    });
  });

  it('should recognize opcodes with isOpcode', () => {
    expect(isOpcode('WRITE')).toBe(true);
    expect(isOpcode('write')).toBe(true);
    expect(isOpcode('WRITELN')).toBe(false);
  });
});
