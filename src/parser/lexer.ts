/**
 * Lexer - Converts source text into a token stream
 *
 * Whitespace, `-- line` comments and `(* block *)` comments are skipped.
 * Lexical errors are collected rather than thrown so the caller sees every
 * bad character in one pass.
 */

import { KEYWORDS, type Token, type TokenKind } from './tokens.js';

export interface ParseError {
  message: string;
  line: number;
  column: number;
}

export interface LexResult {
  /** Tokens, always terminated by a single 'eof' token */
  tokens: Token[];
  errors: ParseError[];
}

const SINGLE_CHAR_TOKENS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
  ['+', 'plus'],
  ['*', 'star'],
  ['/', 'slash'],
  ['~', 'tilde'],
  ['(', 'lparen'],
  [')', 'rparen'],
]);

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

function isWordChar(ch: string): boolean {
  return isLetter(ch) || isDigit(ch) || ch === '_';
}

/**
 * Exact value of an integer literal, or null when the text is not one.
 *
 * Accepts decimal (`42`), hexadecimal (`0x2A`), binary (`0b101010`) and
 * octal with a leading zero (`052`). `08` is neither octal nor decimal.
 */
export function integerValue(text: string): bigint | null {
  if (/^0[xX][0-9a-fA-F]+$/.test(text)) {
    return BigInt(`0x${text.slice(2)}`);
  }
  if (/^0[bB][01]+$/.test(text)) {
    return BigInt(`0b${text.slice(2)}`);
  }
  if (/^0[0-7]+$/.test(text)) {
    return BigInt(`0o${text.slice(1)}`);
  }
  if (/^(0|[1-9][0-9]*)$/.test(text)) {
    return BigInt(text);
  }
  return null;
}

export class Lexer {
  private position = 0;
  private line = 1;
  private lineStart = 0;
  private readonly tokens: Token[] = [];
  private readonly errors: ParseError[] = [];

  constructor(private readonly source: string) {}

  tokenize(): LexResult {
    while (this.position < this.source.length) {
      this.scanToken();
    }
    this.tokens.push({ kind: 'eof', text: '', line: this.line, column: this.column() });
    return { tokens: this.tokens, errors: this.errors };
  }

  private column(): number {
    return this.position - this.lineStart;
  }

  private peek(offset = 0): string {
    return this.source.charAt(this.position + offset);
  }

  private advance(): string {
    const ch = this.source.charAt(this.position);
    this.position++;
    if (ch === '\n') {
      this.line++;
      this.lineStart = this.position;
    }
    return ch;
  }

  private scanToken(): void {
    const ch = this.peek();
    const line = this.line;
    const column = this.column();

    if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n') {
      this.advance();
      return;
    }

    if (ch === '-' && this.peek(1) === '-') {
      while (this.position < this.source.length && this.peek() !== '\n') {
        this.advance();
      }
      return;
    }

    if (ch === '(' && this.peek(1) === '*') {
      this.skipBlockComment(line, column);
      return;
    }

    if (isDigit(ch)) {
      const text = this.readWhile(isWordChar);
      if (integerValue(text) === null) {
        this.error(`Invalid number literal '${text}'`, line, column);
        return;
      }
      this.push('number', text, line, column);
      return;
    }

    if (isLetter(ch)) {
      const text = this.readWhile(isWordChar);
      this.push(KEYWORDS.get(text) ?? 'identifier', text, line, column);
      return;
    }

    this.advance();
    const next = this.peek();

    switch (ch) {
      case '<':
        if (next === '-') {
          this.advance();
          this.push('assign', '<-', line, column);
        } else if (next === '=') {
          this.advance();
          this.push('lessEqual', '<=', line, column);
        } else {
          this.push('less', '<', line, column);
        }
        return;
      case '>':
        if (next === '=') {
          this.advance();
          this.push('greaterEqual', '>=', line, column);
        } else {
          this.push('greater', '>', line, column);
        }
        return;
      case '=':
        if (next === '=') {
          this.advance();
          this.push('equal', '==', line, column);
        } else {
          this.push('equal', '=', line, column);
        }
        return;
      case '-':
        this.push('minus', '-', line, column);
        return;
    }

    const kind = SINGLE_CHAR_TOKENS.get(ch);
    if (kind) {
      this.push(kind, ch, line, column);
      return;
    }

    this.error(`Unexpected character '${ch}'`, line, column);
  }

  private skipBlockComment(line: number, column: number): void {
    this.advance();
    this.advance();
    while (this.position < this.source.length) {
      if (this.peek() === '*' && this.peek(1) === ')') {
        this.advance();
        this.advance();
        return;
      }
      this.advance();
    }
    this.error('Unterminated block comment', line, column);
  }

  private readWhile(predicate: (ch: string) => boolean): string {
    const start = this.position;
    while (this.position < this.source.length && predicate(this.peek())) {
      this.advance();
    }
    return this.source.slice(start, this.position);
  }

  private push(kind: TokenKind, text: string, line: number, column: number): void {
    this.tokens.push({ kind, text, line, column });
  }

  private error(message: string, line: number, column: number): void {
    this.errors.push({ message, line, column });
  }
}

/**
 * Tokenize source text
 */
export function tokenize(source: string): LexResult {
  return new Lexer(source).tokenize();
}
