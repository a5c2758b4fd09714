/**
 * Constraint Collector - Collects constraints during AST traversal
 *
 * The collector provides a convenient API for generating constraints
 * while traversing the AST. It manages:
 * - Type variable creation
 * - Constraint storage
 * - Node → term bookkeeping
 * - Let binders and their named terms
 */

import type { Expression, LetExpression } from '../parser/index.js';
import type {
  Binding,
  ConstraintSet,
  EqualityConstraint,
  NamedVar,
  TypeTerm,
  TypeVar,
} from './types.js';
import { Types } from './terms.js';
import { TypeVarManager } from './type-variable.js';

/**
 * Lexical environment for constraint generation.
 * Maps program variable names to the named term of their nearest binder.
 */
export class ConstraintEnv {
  private readonly bindings = new Map<string, NamedVar>();

  constructor(private readonly parent: ConstraintEnv | null = null) {}

  /**
   * Create a new child environment
   */
  extend(): ConstraintEnv {
    return new ConstraintEnv(this);
  }

  bind(name: string, term: NamedVar): void {
    this.bindings.set(name, term);
  }

  /**
   * Look up a variable in the environment chain
   */
  lookup(name: string): NamedVar | undefined {
    return this.bindings.get(name) ?? this.parent?.lookup(name);
  }
}

export class ConstraintCollector {
  private readonly constraints: EqualityConstraint[] = [];
  private readonly nodeTypes = new Map<Expression, TypeTerm>();
  private readonly bindings: Binding[] = [];
  /** How many binders of each name have been seen */
  private readonly bindingCounts = new Map<string, number>();

  constructor(readonly typeVarManager: TypeVarManager = new TypeVarManager()) {}

  fresh(): TypeVar {
    return this.typeVarManager.next();
  }

  /**
   * Add an equality constraint
   */
  equal(left: TypeTerm, right: TypeTerm, node: Expression, description: string): void {
    this.constraints.push({
      kind: 'equality',
      left,
      right,
      source: { node, description },
    });
  }

  /**
   * Create the named term for a let binder
   */
  bind(node: LetExpression): NamedVar {
    const count = this.bindingCounts.get(node.name) ?? 0;
    this.bindingCounts.set(node.name, count + 1);

    const term = Types.named(node.name, count);
    this.bindings.push({ name: node.name, term, node });
    return term;
  }

  recordNodeType(node: Expression, term: TypeTerm): void {
    this.nodeTypes.set(node, term);
  }

  getConstraintSet(root: TypeTerm): ConstraintSet {
    return {
      constraints: [...this.constraints],
      typeVars: [...this.typeVarManager.issuedVars()],
      nodeTypes: new Map(this.nodeTypes),
      bindings: [...this.bindings],
      root,
    };
  }
}
