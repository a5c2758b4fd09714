/**
 * Constraint Generator - Generates type constraints from AST traversal
 *
 * This module walks the AST and assigns every node a type term, emitting
 * equality constraints between terms along the way. It does NOT detect type
 * errors; the solver does that once all constraints are known.
 *
 * Constraints are emitted in a fixed order (children first, left to right,
 * then the node's own constraints), so two runs over the same tree produce
 * the same list.
 */

import type { BinaryOp, Expression, IfThenElse, LetExpression, UnaryOp } from '../parser/index.js';
import { isArithmeticOperator, isComparisonOperator, isLogicalOperator } from '../parser/index.js';
import type { ConstraintSet, InferenceConfig, TypeTerm } from './types.js';
import { ConstraintCollector, ConstraintEnv } from './collector.js';
import { TypeVarManager } from './type-variable.js';
import { Types } from './terms.js';

export const DEFAULT_CONFIG: Readonly<InferenceConfig> = Object.freeze({
  comparisonOperands: 'int',
});

/**
 * Main constraint generator class
 */
export class ConstraintGenerator {
  private readonly collector: ConstraintCollector;
  private readonly config: InferenceConfig;

  constructor(typeVars: TypeVarManager = new TypeVarManager(), config: Partial<InferenceConfig> = {}) {
    this.collector = new ConstraintCollector(typeVars);
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Generate constraints for a whole program
   */
  generate(program: Expression): ConstraintSet {
    const root = this.generateExpression(program, new ConstraintEnv());
    return this.collector.getConstraintSet(root);
  }

  private generateExpression(expr: Expression, env: ConstraintEnv): TypeTerm {
    const term = this.termOf(expr, env);
    this.collector.recordNodeType(expr, term);
    return term;
  }

  private termOf(expr: Expression, env: ConstraintEnv): TypeTerm {
    switch (expr.type) {
      case 'IntLiteral':
        return Types.int;

      case 'BoolLiteral':
        return Types.bool;

      case 'Variable': {
        const term = env.lookup(expr.name);
        if (term === undefined) {
          throw new Error(`Unbound variable '${expr.name}' reached constraint generation`);
        }
        return term;
      }

      case 'Let':
        return this.generateLet(expr, env);

      case 'IfThenElse':
        return this.generateIfThenElse(expr, env);

      case 'UnaryOp':
        return this.generateUnary(expr, env);

      case 'BinaryOp':
        return this.generateBinary(expr, env);
    }
  }

  /**
   * let x <- e1 in e2 end
   *
   * x is monomorphic: every use of x inside e2 shares the binder's term.
   * The binder is constrained even when x is never used.
   */
  private generateLet(expr: LetExpression, env: ConstraintEnv): TypeTerm {
    const boundType = this.generateExpression(expr.bound, env);

    const binder = this.collector.bind(expr);
    this.collector.equal(binder, boundType, expr, `binding of '${expr.name}'`);

    const bodyEnv = env.extend();
    bodyEnv.bind(expr.name, binder);
    const bodyType = this.generateExpression(expr.body, bodyEnv);

    const result = this.collector.fresh();
    this.collector.equal(result, bodyType, expr, 'let result is its body');
    return result;
  }

  private generateIfThenElse(expr: IfThenElse, env: ConstraintEnv): TypeTerm {
    const condType = this.generateExpression(expr.condition, env);
    const thenType = this.generateExpression(expr.consequent, env);
    const elseType = this.generateExpression(expr.alternate, env);

    this.collector.equal(condType, Types.bool, expr, 'condition must be bool');
    this.collector.equal(thenType, elseType, expr, 'branches must agree');
    return thenType;
  }

  private generateUnary(expr: UnaryOp, env: ConstraintEnv): TypeTerm {
    const operandType = this.generateExpression(expr.operand, env);
    const type = expr.operator === 'neg' ? Types.int : Types.bool;
    this.collector.equal(operandType, type, expr, `operand of ${expr.operator}`);
    return type;
  }

  private generateBinary(expr: BinaryOp, env: ConstraintEnv): TypeTerm {
    const leftType = this.generateExpression(expr.left, env);
    const rightType = this.generateExpression(expr.right, env);
    const op = expr.operator;

    if (isArithmeticOperator(op)) {
      this.constrainOperands(expr, leftType, rightType, Types.int);
      return Types.int;
    }

    if (isLogicalOperator(op)) {
      this.constrainOperands(expr, leftType, rightType, Types.bool);
      return Types.bool;
    }

    if (isComparisonOperator(op) && this.config.comparisonOperands === 'int') {
      this.constrainOperands(expr, leftType, rightType, Types.int);
      return Types.bool;
    }

    // eql, and comparisons under comparisonOperands: 'same'.
    // Operands share a fresh variable: same type, but either ground type.
    this.constrainOperands(expr, leftType, rightType, this.collector.fresh());
    return Types.bool;
  }

  private constrainOperands(expr: BinaryOp, left: TypeTerm, right: TypeTerm, operandType: TypeTerm): void {
    this.collector.equal(left, operandType, expr, `left operand of ${expr.operator}`);
    this.collector.equal(right, operandType, expr, `right operand of ${expr.operator}`);
  }
}

/**
 * Generate constraints for a program with a fresh variable source
 */
export function generateConstraints(program: Expression, config: Partial<InferenceConfig> = {}): ConstraintSet {
  return new ConstraintGenerator(new TypeVarManager(), config).generate(program);
}
