/**
 * IPPcode line preprocessor
 *
 * Strips `#` comments and surrounding whitespace, drops blank lines and
 * checks the `.IPPcodeNN` header before any instruction is looked at.
 */

import { ErrorKind, type ParseResult, fail, succeed } from './errors.js';

export interface LogicalLine {
  /** Comment-free, trimmed content; never empty. */
  text: string;
  /** 1-based physical line number. */
  line: number;
  /** 1-based column of the first character of `text`. */
  column: number;
}

export interface PreprocessedSource {
  header: LogicalLine;
  lines: LogicalLine[];
}

export const COMMENT_MARKER = '#';

/**
 * Cuts a physical line at its first comment marker and trims it.
 * Returns null when nothing is left.
 */
export function stripLine(raw: string, line: number): LogicalLine | null {
  const commentStart = raw.indexOf(COMMENT_MARKER);
  const code = commentStart === -1 ? raw : raw.slice(0, commentStart);
  const text = code.trim();

  if (text.length === 0) {
    return null;
  }

  return {
    text,
    line,
    column: code.length - code.trimStart().length + 1,
  };
}

/**
 * The header is the first logical line: comments and blank lines may come
 * before it, and it is compared after its own comment has been removed.
 */
export function preprocess(rawLines: readonly string[], language: string): ParseResult<PreprocessedSource> {
  const logical: LogicalLine[] = [];

  rawLines.forEach((raw, index) => {
    const stripped = stripLine(raw, index + 1);
    if (stripped) {
      logical.push(stripped);
    }
  });

  const [header, ...lines] = logical;
  const expected = `.${language}`;

  if (!header) {
    return fail({
      kind: ErrorKind.HEADER,
      message: `Missing header '${expected}'`,
      line: rawLines.length === 0 ? 1 : rawLines.length,
      column: 1,
    });
  }

  if (header.text !== expected) {
    return fail({
      kind: ErrorKind.HEADER,
      message: `Invalid header '${header.text}', expected '${expected}'`,
      line: header.line,
      column: header.column,
      token: header.text,
    });
  }

  return succeed({ header, lines });
}
