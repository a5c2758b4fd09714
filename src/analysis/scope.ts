/**
 * Scope checking - Finds variables used without an enclosing binder
 *
 * A let binder is in scope in its body only, not in its own bound
 * expression: `let v <- v + 1 in v end` uses an undefined `v`.
 */

import type { Expression } from '../parser/index.js';

/**
 * Names used outside any binder, in order of first use
 */
export function findUndefinedVariables(
  expr: Expression,
  defined: ReadonlySet<string> = new Set()
): Set<string> {
  const undefinedNames = new Set<string>();
  collect(expr, defined, undefinedNames);
  return undefinedNames;
}

function collect(expr: Expression, defined: ReadonlySet<string>, out: Set<string>): void {
  switch (expr.type) {
    case 'IntLiteral':
    case 'BoolLiteral':
      return;
    case 'Variable':
      if (!defined.has(expr.name)) {
        out.add(expr.name);
      }
      return;
    case 'Let':
      collect(expr.bound, defined, out);
      collect(expr.body, new Set([...defined, expr.name]), out);
      return;
    case 'IfThenElse':
      collect(expr.condition, defined, out);
      collect(expr.consequent, defined, out);
      collect(expr.alternate, defined, out);
      return;
    case 'UnaryOp':
      collect(expr.operand, defined, out);
      return;
    case 'BinaryOp':
      collect(expr.left, defined, out);
      collect(expr.right, defined, out);
      return;
  }
}

export function isWellScoped(expr: Expression): boolean {
  return findUndefinedVariables(expr).size === 0;
}
