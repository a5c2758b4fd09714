/**
 * AST - Expression tree of the let/if language
 *
 * The tree is built once by the parser (or by hand through the `AST`
 * factory) and is read-only afterwards. Every consumer switches on the
 * `type` discriminant.
 */

/**
 * Position of a node's first token
 */
export interface SourceLocation {
  /** Line number (1-indexed) */
  readonly line: number;
  /** Column number (0-indexed) */
  readonly column: number;
}

interface NodeBase {
  readonly loc?: SourceLocation;
}

export interface IntLiteral extends NodeBase {
  readonly type: 'IntLiteral';
  readonly value: bigint;
}

export interface BoolLiteral extends NodeBase {
  readonly type: 'BoolLiteral';
  readonly value: boolean;
}

export interface Variable extends NodeBase {
  readonly type: 'Variable';
  readonly name: string;
}

/**
 * let <name> <- <bound> in <body> end
 */
export interface LetExpression extends NodeBase {
  readonly type: 'Let';
  readonly name: string;
  readonly bound: Expression;
  readonly body: Expression;
}

export interface IfThenElse extends NodeBase {
  readonly type: 'IfThenElse';
  readonly condition: Expression;
  readonly consequent: Expression;
  readonly alternate: Expression;
}

export type UnaryOperator = 'neg' | 'not';

export interface UnaryOp extends NodeBase {
  readonly type: 'UnaryOp';
  readonly operator: UnaryOperator;
  readonly operand: Expression;
}

export type ArithmeticOperator = 'add' | 'sub' | 'mul' | 'div';
export type LogicalOperator = 'and' | 'or';
export type ComparisonOperator = 'lt' | 'le' | 'gt' | 'ge';
export type BinaryOperator = ArithmeticOperator | LogicalOperator | ComparisonOperator | 'eql';

export interface BinaryOp extends NodeBase {
  readonly type: 'BinaryOp';
  readonly operator: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
}

export type Expression =
  | IntLiteral
  | BoolLiteral
  | Variable
  | LetExpression
  | IfThenElse
  | UnaryOp
  | BinaryOp
  ;

/**
 * Surface syntax of each operator, used when printing expressions
 */
export const OPERATOR_SYMBOLS: Readonly<Record<BinaryOperator | UnaryOperator, string>> = {
  add: '+',
  sub: '-',
  mul: '*',
  div: '/',
  and: 'and',
  or: 'or',
  eql: '=',
  lt: '<',
  le: '<=',
  gt: '>',
  ge: '>=',
  neg: '~',
  not: 'not',
};

export function isArithmeticOperator(op: BinaryOperator): op is ArithmeticOperator {
  return op === 'add' || op === 'sub' || op === 'mul' || op === 'div';
}

export function isLogicalOperator(op: BinaryOperator): op is LogicalOperator {
  return op === 'and' || op === 'or';
}

export function isComparisonOperator(op: BinaryOperator): op is ComparisonOperator {
  return op === 'lt' || op === 'le' || op === 'gt' || op === 'ge';
}

/**
 * Node factory
 */
export const AST = {
  int(value: bigint, loc?: SourceLocation): IntLiteral {
    return { type: 'IntLiteral', value, loc };
  },

  bool(value: boolean, loc?: SourceLocation): BoolLiteral {
    return { type: 'BoolLiteral', value, loc };
  },

  variable(name: string, loc?: SourceLocation): Variable {
    return { type: 'Variable', name, loc };
  },

  let(name: string, bound: Expression, body: Expression, loc?: SourceLocation): LetExpression {
    return { type: 'Let', name, bound, body, loc };
  },

  ifThenElse(
    condition: Expression,
    consequent: Expression,
    alternate: Expression,
    loc?: SourceLocation
  ): IfThenElse {
    return { type: 'IfThenElse', condition, consequent, alternate, loc };
  },

  unary(operator: UnaryOperator, operand: Expression, loc?: SourceLocation): UnaryOp {
    return { type: 'UnaryOp', operator, operand, loc };
  },

  binary(operator: BinaryOperator, left: Expression, right: Expression, loc?: SourceLocation): BinaryOp {
    return { type: 'BinaryOp', operator, left, right, loc };
  },
};

/**
 * Print an expression back in concrete syntax, fully parenthesized
 */
export function printExpression(expr: Expression): string {
  switch (expr.type) {
    case 'IntLiteral':
      return String(expr.value);
    case 'BoolLiteral':
      return expr.value ? 'true' : 'false';
    case 'Variable':
      return expr.name;
    case 'Let':
      return `let ${expr.name} <- ${printExpression(expr.bound)} in ${printExpression(expr.body)} end`;
    case 'IfThenElse':
      return `(if ${printExpression(expr.condition)} then ${printExpression(expr.consequent)} else ${printExpression(expr.alternate)})`;
    case 'UnaryOp':
      return `(${OPERATOR_SYMBOLS[expr.operator]} ${printExpression(expr.operand)})`;
    case 'BinaryOp':
      return `(${printExpression(expr.left)} ${OPERATOR_SYMBOLS[expr.operator]} ${printExpression(expr.right)})`;
  }
}
