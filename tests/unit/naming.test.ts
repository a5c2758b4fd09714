/**
 * Tests for naming equivalence classes and the solver
 */

import { describe, it, expect } from 'vitest';
import {
  Types,
  resolveClasses,
  solveConstraints,
  termKey,
  unify,
} from '../../src/constraint/index.js';
import { a, b, c, eq } from './helpers.js';

describe('resolveClasses', () => {
  it('should succeed on no classes', () => {
    const result = resolveClasses(new Map());
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.types.size).toBe(0);
    }
  });

  it('should give every member the class type', () => {
    const result = resolveClasses(unify([eq(a, Types.int), eq(b, Types.int), eq(a, b)]));
    if (!result.success) {
      throw new Error(result.error.message);
    }
    expect(result.types.get(termKey(a))).toBe(Types.int);
    expect(result.types.get(termKey(b))).toBe(Types.int);
    expect(result.types.get(termKey(Types.int))).toBe(Types.int);
  });

  it('should name separate classes separately', () => {
    const result = resolveClasses(unify([eq(a, Types.int), eq(b, Types.bool)]));
    if (!result.success) {
      throw new Error(result.error.message);
    }
    expect(result.types.get(termKey(a))?.name).toBe('int');
    expect(result.types.get(termKey(b))?.name).toBe('bool');
  });

  it('should reject a class with two concrete types', () => {
    const result = resolveClasses(unify([eq(a, Types.int), eq(a, Types.bool)]));
    expect(result).toEqual({
      success: false,
      error: {
        kind: 'conflicting',
        message: 'Conflicting types int and bool for a in class {a, int, bool}',
        term: a,
        members: [a, Types.int, Types.bool],
      },
    });
  });

  it('should reject a class with no concrete type', () => {
    const result = resolveClasses(unify([eq(a, b)]));
    expect(result).toEqual({
      success: false,
      error: {
        kind: 'unresolved',
        message: 'Type of a is unresolved: class {a, b} contains no concrete type',
        term: a,
        members: [a, b],
      },
    });
  });

  it('should report the first bad class in first-seen order', () => {
    const unresolvedFirst = resolveClasses(unify([eq(a, b), eq(c, Types.int), eq(c, Types.bool)]));
    const conflictingFirst = resolveClasses(unify([eq(c, Types.int), eq(c, Types.bool), eq(a, b)]));
    expect(unresolvedFirst.success ? null : unresolvedFirst.error.kind).toBe('unresolved');
    expect(conflictingFirst.success ? null : conflictingFirst.error.kind).toBe('conflicting');
  });

  it('should point at the first concrete member when there is no other', () => {
    const result = resolveClasses(unify([eq(Types.int, Types.bool)]));
    expect(result.success ? null : result.error.message).toBe(
      'Conflicting types int and bool for int in class {int, bool}'
    );
  });
});

describe('solveConstraints', () => {
  it('should return the classes alongside the types', () => {
    const result = solveConstraints([eq(a, Types.bool)]);
    expect(result.success).toBe(true);
    expect(result.classes.get(termKey(a))?.members).toEqual([a, Types.bool]);
  });

  it('should keep the classes on failure', () => {
    const result = solveConstraints([eq(a, Types.int), eq(a, Types.bool)]);
    expect(result.success).toBe(false);
    expect(result.classes.size).toBe(3);
  });

  it('should start from empty classes on every call', () => {
    const first = solveConstraints([eq(a, Types.int), eq(a, Types.bool)]);
    const second = solveConstraints([eq(a, Types.int)]);
    expect(first.success).toBe(false);
    expect(second.success).toBe(true);
  });
});
