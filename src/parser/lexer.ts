/**
 * IPPcode line lexer
 *
 * Splits one logical line into whitespace-separated tokens that remember
 * where they started in the physical source line.
 */

import type { LogicalLine } from './preprocessor.js';

// Same set String.prototype.trim removes
const WHITESPACE_PATTERN = /\s/;

export interface Token {
  value: string;
  line: number;
  column: number;
}

export class LineLexer {
  private text: string;
  private line: number;
  private firstColumn: number;
  private pos: number = 0;
  private tokens: Token[] = [];

  constructor(logicalLine: LogicalLine) {
    this.text = logicalLine.text;
    this.line = logicalLine.line;
    this.firstColumn = logicalLine.column;
  }

  tokenize(): Token[] {
    this.tokens = [];
    this.pos = 0;

    while (!this.isAtEnd()) {
      if (this.isWhitespace(this.peek())) {
        this.pos++;
      } else {
        this.scanToken();
      }
    }

    return this.tokens;
  }

  private isAtEnd(): boolean {
    return this.pos >= this.text.length;
  }

  private peek(): string {
    return this.text[this.pos];
  }

  private isWhitespace(char: string): boolean {
    return WHITESPACE_PATTERN.test(char);
  }

  private scanToken(): void {
    const start = this.pos;
    while (!this.isAtEnd() && !this.isWhitespace(this.peek())) {
      this.pos++;
    }

    this.tokens.push({
      value: this.text.slice(start, this.pos),
      line: this.line,
      column: this.firstColumn + start,
    });
  }
}
