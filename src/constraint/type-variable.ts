/**
 * Type Variable Management - Fresh-variable source for one inference run
 *
 * A manager is created per run and handed to the constraint generator, so
 * identifiers never leak from one run into the next.
 */

import type { TypeVar } from './types.js';

export class TypeVarManager {
  /** Counter for generating unique IDs */
  private counter = 0;

  private readonly issued: TypeVar[] = [];

  /**
   * Create a fresh type variable, distinct from every variable this
   * manager has issued before. Names run TV_1, TV_2, ...
   */
  next(): TypeVar {
    const id = ++this.counter;
    const tv: TypeVar = { kind: 'typevar', id, name: `TV_${id}` };
    this.issued.push(tv);
    return tv;
  }

  /**
   * Every variable issued so far, in issue order
   */
  issuedVars(): readonly TypeVar[] {
    return this.issued;
  }

  /**
   * Get current counter value (for debugging)
   */
  getCount(): number {
    return this.counter;
  }
}
