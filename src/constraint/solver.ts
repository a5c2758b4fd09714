/**
 * Constraint Solver - Main entry point for solving type constraints
 *
 * Solving runs in two phases:
 * 1. Unification builds equivalence classes from the equality constraints
 * 2. Naming assigns each class its concrete type, or reports the first
 *    class that cannot have one
 */

import type { EqualityConstraint, SolveResult } from './types.js';
import { Unifier } from './unification.js';
import { resolveClasses } from './naming.js';

export class ConstraintSolver {
  /**
   * Solve a set of constraints. Each call starts from empty classes.
   */
  solve(constraints: readonly EqualityConstraint[]): SolveResult {
    // Phase 1: equivalence classes
    const classes = new Unifier().unifyAll(constraints).classes();

    // Phase 2: name every class
    const resolved = resolveClasses(classes);
    if (!resolved.success) {
      return { success: false, classes, error: resolved.error };
    }

    return { success: true, classes, types: resolved.types };
  }
}

/**
 * Solve constraints with a fresh solver
 */
export function solveConstraints(constraints: readonly EqualityConstraint[]): SolveResult {
  return new ConstraintSolver().solve(constraints);
}
