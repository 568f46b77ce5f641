/**
 * IPPcode parse errors
 *
 * Every failure is a value. Layers return `ParseResult`s and only the CLI
 * turns an error kind into a process exit code.
 */

export enum ErrorKind {
  // Source errors
  HEADER = 'HEADER',
  UNKNOWN_OPCODE = 'UNKNOWN_OPCODE',
  ARITY = 'ARITY',
  OPERAND_SYNTAX = 'OPERAND_SYNTAX',
  UNDECLARED_VARIABLE = 'UNDECLARED_VARIABLE',
  MULTIPLE_OPCODE = 'MULTIPLE_OPCODE',

  // Driver errors
  PARAMETER = 'PARAMETER',
  INPUT = 'INPUT',
  OUTPUT = 'OUTPUT',
  INTERNAL = 'INTERNAL',
}

/** Which grammar an operand token failed. */
export enum SyntaxSubject {
  VARIABLE = 'variable',
  LITERAL = 'literal',
  LABEL = 'label',
  TYPE = 'type',
}

export interface ValidationError {
  kind: ErrorKind;
  message: string;
  line: number;
  column: number;
  token?: string;
  subject?: SyntaxSubject;
}

export type ParseResult<T> =
  | { success: true; value: T }
  | { success: false; error: ValidationError };

export function succeed<T>(value: T): ParseResult<T> {
  return { success: true, value };
}

export function fail<T>(error: ValidationError): ParseResult<T> {
  return { success: false, error };
}
