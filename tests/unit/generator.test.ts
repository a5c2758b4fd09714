/**
 * Tests for constraint generation
 */

import { describe, it, expect } from 'vitest';
import { AST, parseExpression } from '../../src/parser/index.js';
import { Types, generateConstraints } from '../../src/constraint/index.js';
import { formatConstraints } from '../../src/output/index.js';

function constraintsOf(source: string, comparisonOperands: 'int' | 'same' = 'int'): string {
  return formatConstraints(generateConstraints(parseExpression(source), { comparisonOperands }).constraints);
}

describe('ConstraintGenerator', () => {
  describe('literals', () => {
    it('should emit no constraints for a literal', () => {
      const set = generateConstraints(AST.int(7n));
      expect(set.constraints).toEqual([]);
      expect(set.root).toBe(Types.int);
      expect(set.typeVars).toEqual([]);
    });
  });

  describe('let', () => {
    it('should bind, use and close a let', () => {
      expect(constraintsOf('let x <- 1 in x + 2 end')).toBe(
        ['(x, int)', '(x, int)', '(int, int)', '(TV_1, int)'].join('\n')
      );
    });

    it('should give the let its fresh variable as result', () => {
      const set = generateConstraints(parseExpression('let x <- 1 in x + 2 end'));
      expect(set.root).toEqual({ kind: 'typevar', id: 1, name: 'TV_1' });
      expect(set.typeVars).toEqual([set.root]);
    });

    it('should constrain an unused binder', () => {
      expect(constraintsOf('let x <- 1 in true end')).toBe(['(x, int)', '(TV_1, bool)'].join('\n'));
    });

    it('should describe where each constraint came from', () => {
      const program = parseExpression('let x <- 1 in x + 2 end');
      const [binding, left, right, result] = generateConstraints(program).constraints;
      expect(binding?.source).toEqual({ node: program, description: "binding of 'x'" });
      expect(left?.source.description).toBe('left operand of add');
      expect(right?.source.description).toBe('right operand of add');
      expect(result?.source.description).toBe('let result is its body');
    });

    it('should give shadowing binders distinct terms', () => {
      const set = generateConstraints(parseExpression('let x <- 1 in let x <- true in x end end'));
      expect(formatConstraints(set.constraints)).toBe(
        ['(x, int)', '(x#1, bool)', '(TV_1, x#1)', '(TV_2, TV_1)'].join('\n')
      );
      expect(set.bindings.map(b => b.term)).toEqual([Types.named('x', 0), Types.named('x', 1)]);
    });
  });

  describe('if-then-else', () => {
    it('should constrain the condition and the branches', () => {
      const set = generateConstraints(parseExpression('if true then 1 else 2'));
      expect(formatConstraints(set.constraints)).toBe(['(bool, bool)', '(int, int)'].join('\n'));
      expect(set.root).toBe(Types.int);
    });

    it('should use the then-branch term as result', () => {
      const set = generateConstraints(parseExpression('let y <- 1 in if false then y else 2 end'));
      expect(formatConstraints(set.constraints)).toBe(
        ['(y, int)', '(bool, bool)', '(y, int)', '(TV_1, y)'].join('\n')
      );
    });
  });

  describe('operators', () => {
    it('should constrain unary operands', () => {
      expect(constraintsOf('~5')).toBe('(int, int)');
      expect(constraintsOf('not true')).toBe('(bool, bool)');
    });

    it('should constrain arithmetic and logical operands', () => {
      expect(constraintsOf('1 * 2')).toBe(['(int, int)', '(int, int)'].join('\n'));
      expect(constraintsOf('true or 1')).toBe(['(bool, bool)', '(int, bool)'].join('\n'));
    });

    it('should share a fresh variable between equality operands', () => {
      const set = generateConstraints(parseExpression('1 = true'));
      expect(formatConstraints(set.constraints)).toBe(['(int, TV_1)', '(bool, TV_1)'].join('\n'));
      expect(set.root).toBe(Types.bool);
    });

    it('should constrain comparison operands to int by default', () => {
      expect(constraintsOf('true < false')).toBe(['(bool, int)', '(bool, int)'].join('\n'));
    });

    it('should treat comparisons like equality under comparisonOperands same', () => {
      expect(constraintsOf('true < false', 'same')).toBe(['(bool, TV_1)', '(bool, TV_1)'].join('\n'));
    });

    it('should emit children before the parent', () => {
      expect(constraintsOf('(1 + 2) < 3')).toBe(
        ['(int, int)', '(int, int)', '(int, int)', '(int, int)'].join('\n')
      );
      expect(constraintsOf('(1 = 2) = (3 = 4)')).toBe(
        ['(int, TV_1)', '(int, TV_1)', '(int, TV_2)', '(int, TV_2)', '(bool, TV_3)', '(bool, TV_3)'].join('\n')
      );
    });
  });

  describe('bookkeeping', () => {
    it('should record a term for every node', () => {
      const program = parseExpression('let x <- 1 in x + 2 end');
      const set = generateConstraints(program);
      expect(set.nodeTypes.size).toBe(5);
      expect(set.nodeTypes.get(program)).toBe(set.root);
      if (program.type !== 'Let' || program.body.type !== 'BinaryOp') {
        throw new Error('unexpected tree shape');
      }
      expect(set.nodeTypes.get(program.body.left)).toEqual(Types.named('x'));
    });

    it('should produce the same constraints on every run', () => {
      const program = parseExpression('let a <- 1 = 1 in if a then 2 else 3 end');
      const first = formatConstraints(generateConstraints(program).constraints);
      const second = formatConstraints(generateConstraints(program).constraints);
      expect(second).toBe(first);
    });

    it('should refuse an unbound variable', () => {
      expect(() => generateConstraints(AST.variable('y'))).toThrow("Unbound variable 'y'");
    });
  });
});
