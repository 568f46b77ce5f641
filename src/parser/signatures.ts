/**
 * IPPcode instruction signatures
 *
 * Maps every opcode to the ordered operand categories it expects.
 */

export enum OperandCategory {
  VARIABLE = 'var',
  SYMBOL = 'symb',
  LABEL = 'label',
  TYPE = 'type',
}

export interface InstructionSignature {
  opcode: string;
  operands: readonly OperandCategory[];
}

const { VARIABLE, SYMBOL, LABEL, TYPE } = OperandCategory;

const SIGNATURE_LIST: readonly InstructionSignature[] = [
  // Frames and function calls
  { opcode: 'MOVE', operands: [VARIABLE, SYMBOL] },
  { opcode: 'CREATEFRAME', operands: [] },
  { opcode: 'PUSHFRAME', operands: [] },
  { opcode: 'POPFRAME', operands: [] },
  { opcode: 'DEFVAR', operands: [VARIABLE] },
  { opcode: 'CALL', operands: [LABEL] },
  { opcode: 'RETURN', operands: [] },

  // Data stack
  { opcode: 'PUSHS', operands: [SYMBOL] },
  { opcode: 'POPS', operands: [VARIABLE] },

  // Arithmetic, relational, boolean and conversion
  { opcode: 'ADD', operands: [VARIABLE, SYMBOL, SYMBOL] },
  { opcode: 'SUB', operands: [VARIABLE, SYMBOL, SYMBOL] },
  { opcode: 'MUL', operands: [VARIABLE, SYMBOL, SYMBOL] },
  { opcode: 'IDIV', operands: [VARIABLE, SYMBOL, SYMBOL] },
  { opcode: 'LT', operands: [VARIABLE, SYMBOL, SYMBOL] },
  { opcode: 'GT', operands: [VARIABLE, SYMBOL, SYMBOL] },
  { opcode: 'EQ', operands: [VARIABLE, SYMBOL, SYMBOL] },
  { opcode: 'AND', operands: [VARIABLE, SYMBOL, SYMBOL] },
  { opcode: 'OR', operands: [VARIABLE, SYMBOL, SYMBOL] },
  { opcode: 'NOT', operands: [VARIABLE, SYMBOL] },
  { opcode: 'INT2CHAR', operands: [VARIABLE, SYMBOL] },
  { opcode: 'STRI2INT', operands: [VARIABLE, SYMBOL, SYMBOL] },

  // Input/output
  { opcode: 'READ', operands: [VARIABLE, TYPE] },
  { opcode: 'WRITE', operands: [SYMBOL] },

  // Strings
  { opcode: 'CONCAT', operands: [VARIABLE, SYMBOL, SYMBOL] },
  { opcode: 'STRLEN', operands: [VARIABLE, SYMBOL] },
  { opcode: 'GETCHAR', operands: [VARIABLE, SYMBOL, SYMBOL] },
  { opcode: 'SETCHAR', operands: [VARIABLE, SYMBOL, SYMBOL] },

  // Types
  { opcode: 'TYPE', operands: [VARIABLE, SYMBOL] },

  // Flow control
  { opcode: 'LABEL', operands: [LABEL] },
  { opcode: 'JUMP', operands: [LABEL] },
  { opcode: 'JUMPIFEQ', operands: [LABEL, SYMBOL, SYMBOL] },
  { opcode: 'JUMPIFNEQ', operands: [LABEL, SYMBOL, SYMBOL] },
  { opcode: 'EXIT', operands: [SYMBOL] },

  // Debugging
  { opcode: 'DPRINT', operands: [SYMBOL] },
  { opcode: 'BREAK', operands: [] },
];

const SIGNATURES: ReadonlyMap<string, InstructionSignature> = new Map<string, InstructionSignature>(
  SIGNATURE_LIST.map(signature => [signature.opcode, Object.freeze(signature)])
);

export const OPCODES: readonly string[] = SIGNATURE_LIST.map(s => s.opcode);

/**
 * Finds the signature of an opcode, ignoring case.
 * Returns undefined for anything that is not an IPPcode instruction.
 */
export function lookupSignature(opcode: string): InstructionSignature | undefined {
  return SIGNATURES.get(opcode.toUpperCase());
}

export function isOpcode(token: string): boolean {
  return SIGNATURES.has(token.toUpperCase());
}
