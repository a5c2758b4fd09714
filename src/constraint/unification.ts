/**
 * Unification - Merges constrained terms into equivalence classes
 *
 * Every term is its own singleton class on first sight. Each constraint
 * (a, b) merges the class of a with the class of b. Once all constraints
 * are consumed, `classes()` materializes one shared class object per set,
 * so a lookup through any member yields the very same object.
 *
 * Unification here never fails: a class holding both int and bool is
 * still a valid class. Rejecting it is the resolver's job.
 */

import type { ClassMap, EqualityConstraint, EquivalenceClass, TypeTerm } from './types.js';
import { DisjointSet } from './disjoint-set.js';
import { termKey } from './terms.js';

export class Unifier {
  private readonly sets = new DisjointSet<TypeTerm>(termKey);
  private unions = 0;

  /**
   * Assert that two terms denote the same type.
   * Returns false when they were already known to.
   */
  unify(left: TypeTerm, right: TypeTerm): boolean {
    const merged = this.sets.union(left, right);
    if (merged) {
      this.unions++;
    }
    return merged;
  }

  /**
   * Consume constraints in order
   */
  unifyAll(constraints: readonly EqualityConstraint[]): this {
    for (const constraint of constraints) {
      this.unify(constraint.left, constraint.right);
    }
    return this;
  }

  /**
   * Whether two terms are currently in the same class
   */
  equivalent(left: TypeTerm, right: TypeTerm): boolean {
    return this.sets.connected(left, right);
  }

  /**
   * Snapshot of the term → class mapping. Keys are term keys in first-seen
   * order; class ids follow the first-seen order of their earliest member
   * and members keep first-seen order.
   */
  classes(): ClassMap {
    const byRoot = new Map<number, { id: number; members: TypeTerm[] }>();
    const keys: Array<[string, number]> = [];

    this.sets.forEach((term, root) => {
      let cls = byRoot.get(root);
      if (cls === undefined) {
        cls = { id: byRoot.size, members: [] };
        byRoot.set(root, cls);
      }
      cls.members.push(term);
      keys.push([termKey(term), root]);
    });

    const mapping = new Map<string, EquivalenceClass>();
    for (const [key, root] of keys) {
      const cls = byRoot.get(root);
      if (cls !== undefined) {
        mapping.set(key, cls);
      }
    }
    return mapping;
  }

  /**
   * Number of merges that actually joined two distinct classes
   */
  getUnionCount(): number {
    return this.unions;
  }

  /**
   * Number of distinct terms seen
   */
  getTermCount(): number {
    return this.sets.size;
  }
}

/**
 * Unify a list of constraints with a fresh unifier
 */
export function unify(constraints: readonly EqualityConstraint[]): ClassMap {
  return new Unifier().unifyAll(constraints).classes();
}
