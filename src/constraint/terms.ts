/**
 * Type term factory and utilities
 */

import type { ConcreteType, ConcreteTypeName, NamedVar, TypeTerm, TypeVar } from './types.js';

const INT: ConcreteType = Object.freeze({ kind: 'concrete', name: 'int' });
const BOOL: ConcreteType = Object.freeze({ kind: 'concrete', name: 'bool' });

/**
 * Term factory
 */
export const Types = {
  get int(): ConcreteType {
    return INT;
  },

  get bool(): ConcreteType {
    return BOOL;
  },

  concrete(name: ConcreteTypeName): ConcreteType {
    return name === 'int' ? INT : BOOL;
  },

  named(name: string, binding = 0): NamedVar {
    return { kind: 'named', name, binding };
  },
};

export function isConcrete(term: TypeTerm): term is ConcreteType {
  return term.kind === 'concrete';
}

export function isTypeVar(term: TypeTerm): term is TypeVar {
  return term.kind === 'typevar';
}

export function isNamedVar(term: TypeTerm): term is NamedVar {
  return term.kind === 'named';
}

/**
 * Identity of a term. Two terms are the same term iff their keys are equal;
 * the prefixes keep a program variable called `TV_1` apart from type
 * variable 1.
 */
export function termKey(term: TypeTerm): string {
  switch (term.kind) {
    case 'concrete':
      return `c:${term.name}`;
    case 'typevar':
      return `v:${term.id}`;
    case 'named':
      return `n:${term.name}#${term.binding}`;
  }
}

export function sameTerm(a: TypeTerm, b: TypeTerm): boolean {
  return termKey(a) === termKey(b);
}

/**
 * Display form: `int`, `TV_3`, `x`, and `x#1` for the second binder of `x`
 */
export function formatTypeTerm(term: TypeTerm): string {
  switch (term.kind) {
    case 'concrete':
      return term.name;
    case 'typevar':
      return term.name;
    case 'named':
      return term.binding === 0 ? term.name : `${term.name}#${term.binding}`;
  }
}
