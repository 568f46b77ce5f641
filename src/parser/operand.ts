/**
 * IPPcode operand classifier
 *
 * Resolves a raw operand token against the category its instruction
 * expects at that position and decodes literal values.
 */

import { ErrorKind, type ParseResult, SyntaxSubject, fail, succeed } from './errors.js';
import { OperandCategory } from './signatures.js';
import type { Token } from './lexer.js';

export enum OperandKind {
  VAR = 'var',
  INT = 'int',
  BOOL = 'bool',
  STRING = 'string',
  NIL = 'nil',
  LABEL = 'label',
  TYPE = 'type',
}

export enum Frame {
  GLOBAL = 'GF',
  LOCAL = 'LF',
  TEMPORARY = 'TF',
}

interface OperandBase {
  /** Element text in the XML output. */
  text: string;
}

export interface VarOperand extends OperandBase {
  kind: OperandKind.VAR;
  value: string;
  frame: Frame;
  name: string;
}

export interface IntOperand extends OperandBase {
  kind: OperandKind.INT;
  value: string;
  integer: bigint;
}

export interface BoolOperand extends OperandBase {
  kind: OperandKind.BOOL;
  value: string;
  boolean: boolean;
}

export interface StringOperand extends OperandBase {
  kind: OperandKind.STRING;
  /** Decoded text, escape sequences replaced. */
  value: string;
}

export interface NilOperand extends OperandBase {
  kind: OperandKind.NIL;
  value: 'nil';
}

export interface LabelOperand extends OperandBase {
  kind: OperandKind.LABEL;
  value: string;
}

export interface TypeOperand extends OperandBase {
  kind: OperandKind.TYPE;
  value: string;
}

export type Operand =
  | VarOperand
  | IntOperand
  | BoolOperand
  | StringOperand
  | NilOperand
  | LabelOperand
  | TypeOperand;

export interface DeclaredVariables {
  global: Set<string>;
  local: Set<string>;
}

export interface ClassifyScope {
  declared: DeclaredVariables;
  /** Off only for the variable a DEFVAR introduces. */
  checkDeclarations: boolean;
}

const NAME_PATTERN = /^[A-Za-z_\-$&%*!?][\w\-$&%*!?]*$/;
const DECIMAL_PATTERN = /^[+-]?\d+$/;
const OCTAL_PATTERN = /^0[oO][0-7]+$/;
const HEX_PATTERN = /^0[xX][0-9a-fA-F]+$/;
const BAD_ESCAPE_PATTERN = /\\(?!\d{3})/;
const ESCAPE_PATTERN = /\\(\d{3})/g;
// Raw C0 controls have no XML 1.0 form; they must be written as \DDD
const CONTROL_CHARACTER_PATTERN = /[\u0000-\u001f]/;

const FRAMES: ReadonlyMap<string, Frame> = new Map([
  ['GF', Frame.GLOBAL],
  ['LF', Frame.LOCAL],
  ['TF', Frame.TEMPORARY],
]);

const DATA_TYPES = new Set(['int', 'bool', 'string']);

export function isValidName(name: string): boolean {
  return NAME_PATTERN.test(name);
}

/**
 * Decodes an integer literal in decimal, `0o` octal or `0x` hexadecimal
 * notation. Returns null if the text is none of them.
 */
export function parseIntegerLiteral(literal: string): bigint | null {
  if (!DECIMAL_PATTERN.test(literal) && !OCTAL_PATTERN.test(literal) && !HEX_PATTERN.test(literal)) {
    return null;
  }
  // BigInt takes 0o/0x prefixes in either case
  return BigInt(literal);
}

/**
 * Replaces every `\DDD` escape by the character with decimal code DDD.
 * Returns null if a backslash is not followed by exactly three digits, or
 * if the literal holds a raw control character.
 */
export function decodeStringLiteral(literal: string): string | null {
  if (BAD_ESCAPE_PATTERN.test(literal) || CONTROL_CHARACTER_PATTERN.test(literal)) {
    return null;
  }
  return literal.replace(ESCAPE_PATTERN, (_, code: string) => String.fromCodePoint(parseInt(code, 10)));
}

function syntaxError<T>(token: Token, subject: SyntaxSubject, message: string): ParseResult<T> {
  return fail<T>({
    kind: ErrorKind.OPERAND_SYNTAX,
    message,
    line: token.line,
    column: token.column,
    token: token.value,
    subject,
  });
}

function splitAtSign(value: string): [string, string] | null {
  const at = value.indexOf('@');
  if (at === -1) {
    return null;
  }
  return [value.slice(0, at), value.slice(at + 1)];
}

function classifyVariable(token: Token, scope: ClassifyScope): ParseResult<VarOperand> {
  const parts = splitAtSign(token.value);
  const frame = parts ? FRAMES.get(parts[0]) : undefined;

  if (!parts || !frame || !isValidName(parts[1])) {
    return syntaxError<VarOperand>(token, SyntaxSubject.VARIABLE, `Invalid variable '${token.value}'`);
  }

  const name = parts[1];

  if (scope.checkDeclarations && frame !== Frame.TEMPORARY) {
    const declared = frame === Frame.GLOBAL ? scope.declared.global : scope.declared.local;
    if (!declared.has(name)) {
      return fail<VarOperand>({
        kind: ErrorKind.UNDECLARED_VARIABLE,
        message: `Variable '${token.value}' is used before its DEFVAR`,
        line: token.line,
        column: token.column,
        token: token.value,
      });
    }
  }

  return succeed<VarOperand>({
    kind: OperandKind.VAR,
    value: token.value,
    text: token.value,
    frame,
    name,
  });
}

function classifyConstant(token: Token): ParseResult<Operand> {
  const parts = splitAtSign(token.value);
  const invalid = () => syntaxError<Operand>(token, SyntaxSubject.LITERAL, `Invalid constant '${token.value}'`);

  if (!parts) {
    return invalid();
  }

  const [type, literal] = parts;

  switch (type) {
    case 'int': {
      const integer = parseIntegerLiteral(literal);
      if (integer === null) return invalid();
      return succeed<Operand>({ kind: OperandKind.INT, value: literal, text: literal, integer });
    }

    case 'bool':
      if (literal !== 'true' && literal !== 'false') return invalid();
      return succeed<Operand>({ kind: OperandKind.BOOL, value: literal, text: literal, boolean: literal === 'true' });

    case 'nil':
      if (literal !== 'nil') return invalid();
      return succeed<Operand>({ kind: OperandKind.NIL, value: 'nil', text: literal });

    case 'string': {
      const decoded = decodeStringLiteral(literal);
      if (decoded === null) return invalid();
      return succeed<Operand>({ kind: OperandKind.STRING, value: decoded, text: literal });
    }

    default:
      return invalid();
  }
}

/**
 * Classifies one operand token. Reads, but never changes, the declared
 * variable sets of the scope.
 */
export function classifyOperand(token: Token, category: OperandCategory, scope: ClassifyScope): ParseResult<Operand> {
  switch (category) {
    case OperandCategory.VARIABLE:
      return classifyVariable(token, scope);

    case OperandCategory.SYMBOL: {
      const parts = splitAtSign(token.value);
      if (parts && FRAMES.has(parts[0])) {
        return classifyVariable(token, scope);
      }
      return classifyConstant(token);
    }

    case OperandCategory.LABEL:
      if (!isValidName(token.value)) {
        return syntaxError<Operand>(token, SyntaxSubject.LABEL, `Invalid label '${token.value}'`);
      }
      return succeed<Operand>({ kind: OperandKind.LABEL, value: token.value, text: token.value });

    case OperandCategory.TYPE:
      if (!DATA_TYPES.has(token.value)) {
        return syntaxError<Operand>(token, SyntaxSubject.TYPE, `Invalid type '${token.value}'`);
      }
      return succeed<Operand>({ kind: OperandKind.TYPE, value: token.value, text: token.value });
  }
}
