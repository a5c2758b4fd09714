/**
 * Type Inferrer - Monomorphic type inference for one program
 *
 * Runs the three constraint phases over an expression tree and reports
 * either the concrete type of every node and binder, or a type error.
 * All mutable state (fresh-variable counter, class arena) is created per
 * call; concurrent or repeated runs never share it.
 */

import type { Expression, LetExpression } from '../parser/index.js';
import type {
  ClassMap,
  ConcreteType,
  ConcreteTypeName,
  EqualityConstraint,
  InferenceConfig,
  NamedVar,
  SolveError,
  TypeTerm,
} from '../constraint/index.js';
import {
  ConstraintGenerator,
  ConstraintSolver,
  TypeVarManager,
  formatTypeTerm,
  termKey,
} from '../constraint/index.js';

/**
 * The one observable failure outcome. Unresolved and conflicting classes
 * are indistinguishable from the outside.
 */
export const TYPE_ERROR = 'Type error';

/**
 * A let binder with its inferred type
 */
export interface ResolvedBinding {
  /** Program variable name */
  readonly name: string;
  /** Name with a `#n` suffix for shadowing binders */
  readonly displayName: string;
  readonly term: NamedVar;
  readonly type: ConcreteTypeName;
  readonly node: LetExpression;
}

export type InferenceResult =
  | InferenceSuccess
  | InferenceFailure
  ;

export interface InferenceSuccess {
  readonly success: true;
  /** Type of the whole program */
  readonly type: ConcreteTypeName;
  /** Concrete type of every constrained term, keyed by term key */
  readonly terms: ReadonlyMap<string, ConcreteType>;
  /** Concrete type of every AST node */
  readonly nodeTypes: ReadonlyMap<Expression, ConcreteTypeName>;
  /** Let binders in binding order */
  readonly bindings: readonly ResolvedBinding[];
  readonly classes: ClassMap;
  readonly constraints: readonly EqualityConstraint[];
}

export interface InferenceFailure {
  readonly success: false;
  /** First class that could not be named */
  readonly error: SolveError;
  readonly classes: ClassMap;
  readonly constraints: readonly EqualityConstraint[];
}

/**
 * Infer the type of every subexpression of a well-scoped program
 */
export function inferTypes(program: Expression, config: Partial<InferenceConfig> = {}): InferenceResult {
  const generated = new ConstraintGenerator(new TypeVarManager(), config).generate(program);
  const solved = new ConstraintSolver().solve(generated.constraints);

  if (!solved.success) {
    return {
      success: false,
      error: solved.error,
      classes: solved.classes,
      constraints: generated.constraints,
    };
  }

  const typeOf = (term: TypeTerm): ConcreteTypeName => {
    if (term.kind === 'concrete') {
      return term.name;
    }
    const type = solved.types.get(termKey(term));
    if (type === undefined) {
      throw new Error(`Term ${formatTypeTerm(term)} was never constrained`);
    }
    return type.name;
  };

  const nodeTypes = new Map<Expression, ConcreteTypeName>();
  for (const [node, term] of generated.nodeTypes) {
    nodeTypes.set(node, typeOf(term));
  }

  const bindings = generated.bindings.map((binding): ResolvedBinding => ({
    name: binding.name,
    displayName: formatTypeTerm(binding.term),
    term: binding.term,
    type: typeOf(binding.term),
    node: binding.node,
  }));

  return {
    success: true,
    type: typeOf(generated.root),
    terms: solved.types,
    nodeTypes,
    bindings,
    classes: solved.classes,
    constraints: generated.constraints,
  };
}

/**
 * Type of the whole program, or exactly `Type error`
 */
export function typeCheck(
  program: Expression,
  config: Partial<InferenceConfig> = {}
): ConcreteTypeName | typeof TYPE_ERROR {
  const result = inferTypes(program, config);
  return result.success ? result.type : TYPE_ERROR;
}
