/**
 * Parser module exports
 */

export { parse, parseExpression, Parser } from './parser.js';
export type { ParseResult, ParseError } from './parser.js';

export { tokenize, integerValue, Lexer } from './lexer.js';
export type { LexResult } from './lexer.js';

export { KEYWORDS, describeTokenKind } from './tokens.js';
export type { Token, TokenKind } from './tokens.js';

export {
  AST,
  OPERATOR_SYMBOLS,
  printExpression,
  isArithmeticOperator,
  isLogicalOperator,
  isComparisonOperator,
} from './ast.js';
export type {
  Expression,
  IntLiteral,
  BoolLiteral,
  Variable,
  LetExpression,
  IfThenElse,
  UnaryOp,
  BinaryOp,
  UnaryOperator,
  BinaryOperator,
  ArithmeticOperator,
  LogicalOperator,
  ComparisonOperator,
  SourceLocation,
} from './ast.js';
