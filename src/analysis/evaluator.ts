/**
 * Evaluator - Reference interpreter for the expression language
 *
 * Checks operand types dynamically, so it can run programs the type
 * checker has not seen. Integers are unbounded. `and` and `or`
 * short-circuit; integer division truncates toward zero.
 */

import type { BinaryOp, Expression } from '../parser/index.js';

export type Value = bigint | boolean;

export type EvalErrorKind =
  | 'type-error'
  | 'undefined-variable'
  | 'division-by-zero'
  ;

export interface EvalError {
  readonly kind: EvalErrorKind;
  readonly message: string;
}

export type EvalResult =
  | { readonly success: true; readonly value: Value }
  | { readonly success: false; readonly error: EvalError }
  ;

class EvaluationError extends Error {
  constructor(readonly kind: EvalErrorKind, message: string) {
    super(message);
    this.name = 'EvaluationError';
  }
}

type Environment = ReadonlyMap<string, Value>;

function expectInt(value: Value, what: string): bigint {
  if (typeof value !== 'bigint') {
    throw new EvaluationError('type-error', `${what} must be int, got bool`);
  }
  return value;
}

function expectBool(value: Value, what: string): boolean {
  if (typeof value !== 'boolean') {
    throw new EvaluationError('type-error', `${what} must be bool, got int`);
  }
  return value;
}

function evalBinary(expr: BinaryOp, env: Environment): Value {
  const op = expr.operator;

  if (op === 'and' || op === 'or') {
    const left = expectBool(evalExpression(expr.left, env), `left operand of ${op}`);
    if (op === 'and' ? !left : left) {
      return left;
    }
    return expectBool(evalExpression(expr.right, env), `right operand of ${op}`);
  }

  const left = evalExpression(expr.left, env);
  const right = evalExpression(expr.right, env);

  if (op === 'eql') {
    if (typeof left !== typeof right) {
      throw new EvaluationError('type-error', 'operands of = must have the same type');
    }
    return left === right;
  }

  const l = expectInt(left, `left operand of ${op}`);
  const r = expectInt(right, `right operand of ${op}`);

  switch (op) {
    case 'add':
      return l + r;
    case 'sub':
      return l - r;
    case 'mul':
      return l * r;
    case 'div':
      if (r === 0n) {
        throw new EvaluationError('division-by-zero', 'division by zero');
      }
      return l / r;
    case 'lt':
      return l < r;
    case 'le':
      return l <= r;
    case 'gt':
      return l > r;
    case 'ge':
      return l >= r;
  }
}

function evalExpression(expr: Expression, env: Environment): Value {
  switch (expr.type) {
    case 'IntLiteral':
      return expr.value;
    case 'BoolLiteral':
      return expr.value;
    case 'Variable': {
      const value = env.get(expr.name);
      if (value === undefined) {
        throw new EvaluationError('undefined-variable', `undefined variable '${expr.name}'`);
      }
      return value;
    }
    case 'Let': {
      const bound = evalExpression(expr.bound, env);
      const inner = new Map(env);
      inner.set(expr.name, bound);
      return evalExpression(expr.body, inner);
    }
    case 'IfThenElse': {
      const condition = expectBool(evalExpression(expr.condition, env), 'condition');
      return evalExpression(condition ? expr.consequent : expr.alternate, env);
    }
    case 'UnaryOp': {
      const operand = evalExpression(expr.operand, env);
      if (expr.operator === 'neg') {
        return -expectInt(operand, 'operand of ~');
      }
      return !expectBool(operand, 'operand of not');
    }
    case 'BinaryOp':
      return evalBinary(expr, env);
  }
}

/**
 * Evaluate a program
 */
export function evaluate(expr: Expression, env: Environment = new Map()): EvalResult {
  try {
    return { success: true, value: evalExpression(expr, env) };
  } catch (err) {
    if (err instanceof EvaluationError) {
      return { success: false, error: { kind: err.kind, message: err.message } };
    }
    throw err;
  }
}
