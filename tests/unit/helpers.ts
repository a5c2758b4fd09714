/**
 * Shared test fixtures
 */

import { AST } from '../../src/parser/index.js';
import { Types, type EqualityConstraint, type TypeTerm } from '../../src/constraint/index.js';

const SOURCE_NODE = AST.int(0n);

/**
 * Build an equality constraint with a placeholder source
 */
export function eq(left: TypeTerm, right: TypeTerm): EqualityConstraint {
  return { kind: 'equality', left, right, source: { node: SOURCE_NODE, description: 'test' } };
}

export const a = Types.named('a');
export const b = Types.named('b');
export const c = Types.named('c');
