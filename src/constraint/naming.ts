/**
 * Naming - Gives every equivalence class its canonical concrete type
 *
 * A class is well-typed iff it contains exactly one distinct concrete type.
 * Classes are checked in first-seen order and the first bad class aborts
 * the whole run.
 */

import type {
  ClassMap,
  ConcreteType,
  ConcreteTypeName,
  EquivalenceClass,
  ResolveResult,
  SolveError,
  TypeTerm,
} from './types.js';
import { formatTypeTerm, isConcrete, termKey, Types } from './terms.js';

/**
 * Distinct classes of a class map, in first-seen order
 */
export function distinctClasses(classes: ClassMap): EquivalenceClass[] {
  return [...new Set(classes.values())];
}

function concreteTypesOf(cls: EquivalenceClass): ConcreteTypeName[] {
  const names = new Set<ConcreteTypeName>();
  for (const member of cls.members) {
    if (isConcrete(member)) {
      names.add(member.name);
    }
  }
  return [...names];
}

function formatClass(members: readonly TypeTerm[]): string {
  return `{${members.map(formatTypeTerm).join(', ')}}`;
}

/**
 * The term an error should point at: the first non-concrete member, which
 * is what a user would recognize
 */
function offendingTerm(cls: EquivalenceClass): TypeTerm {
  const members = cls.members;
  return members.find(m => !isConcrete(m)) ?? members[0] ?? Types.int;
}

function classError(cls: EquivalenceClass, concrete: readonly ConcreteTypeName[]): SolveError {
  const term = offendingTerm(cls);
  if (concrete.length === 0) {
    return {
      kind: 'unresolved',
      message: `Type of ${formatTypeTerm(term)} is unresolved: class ${formatClass(cls.members)} contains no concrete type`,
      term,
      members: cls.members,
    };
  }
  return {
    kind: 'conflicting',
    message: `Conflicting types ${concrete.join(' and ')} for ${formatTypeTerm(term)} in class ${formatClass(cls.members)}`,
    term,
    members: cls.members,
  };
}

/**
 * Map every term to the concrete type of its class, or fail on the first
 * class that has none or more than one
 */
export function resolveClasses(classes: ClassMap): ResolveResult {
  const types = new Map<string, ConcreteType>();

  for (const cls of distinctClasses(classes)) {
    const concrete = concreteTypesOf(cls);
    const [name] = concrete;
    if (concrete.length !== 1 || name === undefined) {
      return { success: false, error: classError(cls, concrete) };
    }

    const type = Types.concrete(name);
    for (const member of cls.members) {
      types.set(termKey(member), type);
    }
  }

  return { success: true, types };
}
