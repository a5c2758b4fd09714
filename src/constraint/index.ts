/**
 * Constraint-Based Type Inference System
 *
 * The system works in three phases:
 * 1. Constraint Generation: Walk the AST and emit equality constraints
 * 2. Unification: Merge constrained terms into equivalence classes
 * 3. Naming: Give every class exactly one concrete type, or fail
 *
 * @module constraint
 */

// Type definitions
export type {
  ConcreteType,
  ConcreteTypeName,
  TypeVar,
  NamedVar,
  TypeTerm,
  ConstraintSource,
  EqualityConstraint,
  Binding,
  ConstraintSet,
  EquivalenceClass,
  ClassMap,
  SolveErrorKind,
  SolveError,
  ResolveResult,
  SolveResult,
  SolveSuccess,
  SolveFailure,
  InferenceConfig,
} from './types.js';

// Terms
export {
  Types,
  isConcrete,
  isTypeVar,
  isNamedVar,
  termKey,
  sameTerm,
  formatTypeTerm,
} from './terms.js';

// Fresh variables
export { TypeVarManager } from './type-variable.js';

// Constraint collection
export { ConstraintCollector, ConstraintEnv } from './collector.js';

// Constraint generation
export {
  ConstraintGenerator,
  generateConstraints,
  DEFAULT_CONFIG,
} from './generator.js';

// Unification
export { DisjointSet } from './disjoint-set.js';
export { Unifier, unify } from './unification.js';

// Naming
export { resolveClasses, distinctClasses } from './naming.js';

// Main solver
export { ConstraintSolver, solveConstraints } from './solver.js';
