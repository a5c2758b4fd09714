/**
 * Constraint Types - Core type definitions for constraint-based type inference
 *
 * The system works by:
 * 1. Generating equality constraints from AST traversal
 * 2. Unifying constrained terms into equivalence classes
 * 3. Naming every class with exactly one concrete type
 */

import type { Expression, LetExpression } from '../parser/index.js';

// ============================================================================
// Type Terms
// ============================================================================

export type ConcreteTypeName = 'int' | 'bool';

/**
 * One of the two ground types. There is no coercion between them.
 */
export interface ConcreteType {
  readonly kind: 'concrete';
  readonly name: ConcreteTypeName;
}

/**
 * A type variable stands for the (unknown) type of a subexpression.
 * Identifiers are unique within one inference run.
 */
export interface TypeVar {
  readonly kind: 'typevar';
  /** Unique identifier for this type variable */
  readonly id: number;
  /** Display name, e.g. TV_3 */
  readonly name: string;
}

/**
 * The type of a `let`-bound program variable, used as a term directly.
 * Each binder gets its own term, so a shadowed name does not share a class
 * with the binder it shadows.
 */
export interface NamedVar {
  readonly kind: 'named';
  /** Program variable name */
  readonly name: string;
  /** 0 for the first binder of this name in the program, 1 for the next... */
  readonly binding: number;
}

export type TypeTerm =
  | ConcreteType
  | TypeVar
  | NamedVar
  ;

// ============================================================================
// Constraints
// ============================================================================

/**
 * Where a constraint came from
 */
export interface ConstraintSource {
  /** AST node that generated this constraint */
  readonly node: Expression;
  /** Human-readable description of why this constraint exists */
  readonly description: string;
}

/**
 * Equality constraint: τ₁ = τ₂ (unordered)
 */
export interface EqualityConstraint {
  readonly kind: 'equality';
  readonly left: TypeTerm;
  readonly right: TypeTerm;
  readonly source: ConstraintSource;
}

/**
 * A `let` binder and the term standing for its type
 */
export interface Binding {
  readonly name: string;
  readonly term: NamedVar;
  readonly node: LetExpression;
}

/**
 * Output of constraint generation
 */
export interface ConstraintSet {
  /** All constraints, in generation order */
  readonly constraints: readonly EqualityConstraint[];
  /** Type variables created during generation */
  readonly typeVars: readonly TypeVar[];
  /** Term assigned to each AST node */
  readonly nodeTypes: ReadonlyMap<Expression, TypeTerm>;
  /** Let binders in the order they were visited */
  readonly bindings: readonly Binding[];
  /** Term of the root expression */
  readonly root: TypeTerm;
}

// ============================================================================
// Equivalence Classes
// ============================================================================

/**
 * A set of terms known to denote the same type
 */
export interface EquivalenceClass {
  /** Position of this class in first-seen order */
  readonly id: number;
  /** Members in first-seen order */
  readonly members: readonly TypeTerm[];
}

/**
 * Mapping from term key (see `termKey`) to the class holding that term.
 * Every member of a class maps to the same class object.
 */
export type ClassMap = ReadonlyMap<string, EquivalenceClass>;

// ============================================================================
// Solution
// ============================================================================

export type SolveErrorKind =
  | 'unresolved'     // class contains no concrete type
  | 'conflicting'    // class contains both int and bool
  ;

/**
 * Inference failure. Internally detailed; externally always `Type error`.
 */
export interface SolveError {
  readonly kind: SolveErrorKind;
  readonly message: string;
  /** A term of the offending class */
  readonly term: TypeTerm;
  /** All members of the offending class */
  readonly members: readonly TypeTerm[];
}

/**
 * Result of naming the equivalence classes
 */
export type ResolveResult =
  | { readonly success: true; readonly types: ReadonlyMap<string, ConcreteType> }
  | { readonly success: false; readonly error: SolveError }
  ;

/**
 * Result of unification followed by naming
 */
export type SolveResult =
  | SolveSuccess
  | SolveFailure
  ;

export interface SolveSuccess {
  readonly success: true;
  readonly classes: ClassMap;
  /** Concrete type of every term, keyed by term key */
  readonly types: ReadonlyMap<string, ConcreteType>;
}

export interface SolveFailure {
  readonly success: false;
  readonly classes: ClassMap;
  readonly error: SolveError;
}

// ============================================================================
// Configuration
// ============================================================================

export interface InferenceConfig {
  /**
   * Operand typing for `<`, `<=`, `>` and `>=`.
   * 'int': both operands must be int.
   * 'same': both operands must share a type, either int or bool, like `=`.
   */
  comparisonOperands: 'int' | 'same';
}
