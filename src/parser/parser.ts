/**
 * Parser - Recursive descent parser for the let/if expression language
 *
 * Precedence, loosest first:
 *   if-then-else, or, and, = / ==, < <= > >=, + -, * /, ~ / not
 * All binary operators are left-associative. A conditional may also be an
 * operand, and its else branch then extends as far right as possible.
 *
 * `end` closes the innermost open `let`. At the outermost level, where no
 * `let` is open, a conditional may carry an optional closing `end`.
 */

import {
  AST,
  type BinaryOperator,
  type Expression,
  type SourceLocation,
} from './ast.js';
import { tokenize, integerValue, type ParseError } from './lexer.js';
import { describeTokenKind, type Token, type TokenKind } from './tokens.js';

export type { ParseError } from './lexer.js';

export interface ParseResult {
  /** The parsed AST, or null when the source has errors */
  ast: Expression | null;
  /** Lexical and syntax errors */
  errors: ParseError[];
}

class ParseFailure extends Error {
  constructor(message: string, readonly token: Token) {
    super(message);
    this.name = 'ParseFailure';
  }

  toParseError(): ParseError {
    return { message: this.message, line: this.token.line, column: this.token.column };
  }
}

const EQUALITY_OPERATORS: ReadonlyMap<TokenKind, BinaryOperator> = new Map<TokenKind, BinaryOperator>([
  ['equal', 'eql'],
]);

const COMPARISON_OPERATORS: ReadonlyMap<TokenKind, BinaryOperator> = new Map<TokenKind, BinaryOperator>([
  ['less', 'lt'],
  ['lessEqual', 'le'],
  ['greater', 'gt'],
  ['greaterEqual', 'ge'],
]);

const ADDITIVE_OPERATORS: ReadonlyMap<TokenKind, BinaryOperator> = new Map<TokenKind, BinaryOperator>([
  ['plus', 'add'],
  ['minus', 'sub'],
]);

const MULTIPLICATIVE_OPERATORS: ReadonlyMap<TokenKind, BinaryOperator> = new Map<TokenKind, BinaryOperator>([
  ['star', 'mul'],
  ['slash', 'div'],
]);

export class Parser {
  private current = 0;
  /** Number of `let` expressions whose `end` has not been read yet */
  private openLets = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  /**
   * Parse a whole program: one expression followed by end of input
   */
  parseProgram(): Expression {
    const expr = this.parseExpression();
    this.expect('eof');
    return expr;
  }

  private parseExpression(): Expression {
    if (this.check('if')) {
      return this.parseIfThenElse();
    }
    return this.parseBinary(0);
  }

  private parseIfThenElse(): Expression {
    const start = this.advance();
    const condition = this.parseExpression();
    this.expect('then');
    const consequent = this.parseExpression();
    this.expect('else');
    const alternate = this.parseExpression();
    if (this.openLets === 0 && this.check('end')) {
      this.advance();
    }
    return AST.ifThenElse(condition, consequent, alternate, this.loc(start));
  }

  /**
   * Binary operator levels, loosest first. Each level is a map from token
   * kind to operator; `or` and `and` are keyword tokens.
   */
  private static readonly LEVELS: readonly ReadonlyMap<TokenKind, BinaryOperator>[] = [
    new Map<TokenKind, BinaryOperator>([['or', 'or']]),
    new Map<TokenKind, BinaryOperator>([['and', 'and']]),
    EQUALITY_OPERATORS,
    COMPARISON_OPERATORS,
    ADDITIVE_OPERATORS,
    MULTIPLICATIVE_OPERATORS,
  ];

  private parseBinary(level: number): Expression {
    const operators = Parser.LEVELS[level];
    if (operators === undefined) {
      return this.parseUnary();
    }

    let left = this.parseBinary(level + 1);
    for (;;) {
      const operator = operators.get(this.peek().kind);
      if (operator === undefined) {
        return left;
      }
      const token = this.advance();
      const right = this.parseBinary(level + 1);
      left = AST.binary(operator, left, right, left.loc ?? this.loc(token));
    }
  }

  private parseUnary(): Expression {
    if (this.check('tilde')) {
      const token = this.advance();
      return AST.unary('neg', this.parseUnary(), this.loc(token));
    }
    if (this.check('not')) {
      const token = this.advance();
      return AST.unary('not', this.parseUnary(), this.loc(token));
    }
    return this.parsePrimary();
  }

  private parsePrimary(): Expression {
    const token = this.peek();

    switch (token.kind) {
      case 'number': {
        this.advance();
        const value = integerValue(token.text);
        if (value === null) {
          throw new ParseFailure(`Invalid number literal '${token.text}'`, token);
        }
        return AST.int(value, this.loc(token));
      }
      case 'true':
        this.advance();
        return AST.bool(true, this.loc(token));
      case 'false':
        this.advance();
        return AST.bool(false, this.loc(token));
      case 'identifier':
        this.advance();
        return AST.variable(token.text, this.loc(token));
      case 'lparen': {
        this.advance();
        const expr = this.parseExpression();
        this.expect('rparen');
        return expr;
      }
      case 'let':
        return this.parseLet();
      case 'if':
        return this.parseIfThenElse();
      default:
        throw new ParseFailure(`Unexpected ${describeTokenKind(token.kind)}`, token);
    }
  }

  private parseLet(): Expression {
    const start = this.advance();
    const name = this.expect('identifier').text;
    this.expect('assign');

    this.openLets++;
    const bound = this.parseExpression();
    this.expect('in');
    const body = this.parseExpression();
    this.expect('end');
    this.openLets--;

    return AST.let(name, bound, body, this.loc(start));
  }

  private peek(): Token {
    const token = this.tokens[this.current] ?? this.tokens[this.tokens.length - 1];
    if (token === undefined) {
      throw new Error('Token stream must end with an eof token');
    }
    return token;
  }

  private check(kind: TokenKind): boolean {
    return this.peek().kind === kind;
  }

  private advance(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') {
      this.current++;
    }
    return token;
  }

  private expect(kind: TokenKind): Token {
    const token = this.peek();
    if (token.kind !== kind) {
      throw new ParseFailure(
        `Expected ${describeTokenKind(kind)} but found ${describeTokenKind(token.kind)}`,
        token
      );
    }
    return this.advance();
  }

  private loc(token: Token): SourceLocation {
    return { line: token.line, column: token.column };
  }
}

/**
 * Parse source code into an expression tree
 */
export function parse(source: string): ParseResult {
  const { tokens, errors } = tokenize(source);
  if (errors.length > 0) {
    return { ast: null, errors };
  }

  try {
    return { ast: new Parser(tokens).parseProgram(), errors: [] };
  } catch (err) {
    if (err instanceof ParseFailure) {
      return { ast: null, errors: [err.toParseError()] };
    }
    throw err;
  }
}

/**
 * Parse a single expression, throwing on any error
 */
export function parseExpression(source: string): Expression {
  const { ast, errors } = parse(source);
  if (ast === null) {
    const first = errors[0];
    const detail = first ? `: ${first.message} (line ${first.line}, column ${first.column})` : '';
    throw new Error(`Failed to parse expression${detail}`);
  }
  return ast;
}
