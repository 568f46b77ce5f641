/**
 * IPPcode instruction parser
 *
 * Turns one logical line into a validated instruction. The parser is
 * stateful across lines: it remembers DEFVAR declarations and hands out
 * order numbers, both kept in the ParseContext of a single run.
 */

import { ErrorKind, type ParseResult, fail, succeed } from './errors.js';
import { LineLexer, type Token } from './lexer.js';
import { type DeclaredVariables, Frame, type Operand, OperandKind, classifyOperand } from './operand.js';
import type { LogicalLine } from './preprocessor.js';
import { type InstructionSignature, OperandCategory, isOpcode, lookupSignature } from './signatures.js';

export interface Instruction {
  /** Canonical upper-case opcode. */
  opcode: string;
  operands: Operand[];
  /** 1-based position among the parsed instructions. */
  order: number;
  line: number;
}

export interface ParseContext {
  declared: DeclaredVariables;
  nextOrder: number;
}

export function createParseContext(): ParseContext {
  return {
    declared: {
      global: new Set<string>(),
      local: new Set<string>(),
    },
    nextOrder: 1,
  };
}

export class InstructionParser {
  private context: ParseContext;

  constructor(context: ParseContext = createParseContext()) {
    this.context = context;
  }

  parseLine(line: LogicalLine): ParseResult<Instruction> {
    const [opcodeToken, ...operandTokens] = new LineLexer(line).tokenize();
    const signature = lookupSignature(opcodeToken.value);

    const extraOpcode = this.findExtraOpcode(signature, operandTokens);
    if (extraOpcode) {
      return fail<Instruction>({
        kind: ErrorKind.MULTIPLE_OPCODE,
        message: `Unexpected second instruction '${extraOpcode.value}' on one line`,
        line: extraOpcode.line,
        column: extraOpcode.column,
        token: extraOpcode.value,
      });
    }

    if (!signature) {
      return fail<Instruction>({
        kind: ErrorKind.UNKNOWN_OPCODE,
        message: `Unknown instruction '${opcodeToken.value}'`,
        line: opcodeToken.line,
        column: opcodeToken.column,
        token: opcodeToken.value,
      });
    }

    if (operandTokens.length !== signature.operands.length) {
      return fail<Instruction>({
        kind: ErrorKind.ARITY,
        message: `${signature.opcode} expects ${signature.operands.length} operand(s), got ${operandTokens.length}`,
        line: opcodeToken.line,
        column: opcodeToken.column,
        token: opcodeToken.value,
      });
    }

    const operands: Operand[] = [];
    const isDefvar = signature.opcode === 'DEFVAR';

    for (let i = 0; i < operandTokens.length; i++) {
      const result = classifyOperand(operandTokens[i], signature.operands[i], {
        declared: this.context.declared,
        checkDeclarations: !isDefvar,
      });
      if (!result.success) {
        return result;
      }
      operands.push(result.value);
    }

    if (isDefvar) {
      this.declare(operands[0]);
    }

    return succeed<Instruction>({
      opcode: signature.opcode,
      operands,
      order: this.context.nextOrder++,
      line: line.line,
    });
  }

  /**
   * Token 0 counts as an opcode when it names one. An operand token counts
   * when it spells an opcode in upper case and its position does not take
   * a label, where such names are legal. Returns the second opcode found.
   */
  private findExtraOpcode(signature: InstructionSignature | undefined, operandTokens: Token[]): Token | undefined {
    const opcodeLike = operandTokens.filter((token, index) => {
      if (signature?.operands[index] === OperandCategory.LABEL) {
        return false;
      }
      return token.value === token.value.toUpperCase() && isOpcode(token.value);
    });

    return signature ? opcodeLike[0] : opcodeLike[1];
  }

  private declare(operand: Operand): void {
    if (operand.kind !== OperandKind.VAR) {
      return;
    }

    switch (operand.frame) {
      case Frame.GLOBAL:
        this.context.declared.global.add(operand.name);
        break;
      case Frame.LOCAL:
        this.context.declared.local.add(operand.name);
        break;
      case Frame.TEMPORARY:
        // Temporary frames are not tracked
        break;
    }
  }
}
