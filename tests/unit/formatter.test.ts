/**
 * Tests for output formatters
 */

import { describe, it, expect } from 'vitest';
import { parseExpression } from '../../src/parser/index.js';
import { inferTypes } from '../../src/analysis/index.js';
import {
  formatClasses,
  formatConstraints,
  formatInline,
  formatJSON,
  formatReport,
} from '../../src/output/index.js';

const ARITHMETIC = 'let x <- 1 in x + 2 end';
const CONFLICT = 'let x <- true in x + 1 end';

describe('formatReport', () => {
  it('should print the program type and each binder', () => {
    expect(formatReport(inferTypes(parseExpression('let x <- 1 in true end')))).toBe(
      'Type: bool\nType(x): int'
    );
  });

  it('should print a program without binders on one line', () => {
    expect(formatReport(inferTypes(parseExpression('1 < 2')))).toBe('Type: bool');
  });

  it('should print only the verdict on failure', () => {
    expect(formatReport(inferTypes(parseExpression(CONFLICT)))).toBe('Type error');
  });
});

describe('formatJSON', () => {
  it('should list the program type and binders', () => {
    const json: unknown = JSON.parse(formatJSON(inferTypes(parseExpression(ARITHMETIC))));
    expect(json).toEqual({ success: true, type: 'int', bindings: { x: 'int' } });
  });

  it('should key shadowing binders by display name', () => {
    const result = inferTypes(parseExpression('let x <- 1 in let x <- true in x end end'));
    const json: unknown = JSON.parse(formatJSON(result));
    expect(json).toEqual({ success: true, type: 'bool', bindings: { x: 'int', 'x#1': 'bool' } });
  });

  it('should print failure as the bare verdict', () => {
    const result = inferTypes(parseExpression(CONFLICT));
    expect(formatJSON(result)).toBe('{\n  "success": false,\n  "error": "Type error"\n}');
    expect(formatJSON(result, 0)).toBe('{"success":false,"error":"Type error"}');
  });
});

describe('formatInline', () => {
  it('should annotate the line of each binder', () => {
    const source = 'let x <- 1 in\nlet y <- true in\ny end end';
    expect(formatInline(source, inferTypes(parseExpression(source)))).toBe(
      'let x <- 1 in (* x: int *)\nlet y <- true in (* y: bool *)\ny end end'
    );
  });

  it('should put several binders of one line side by side', () => {
    const source = 'let a <- 1 in let b <- a in b end end';
    expect(formatInline(source, inferTypes(parseExpression(source)))).toBe(
      'let a <- 1 in let b <- a in b end end (* a: int *) (* b: int *)'
    );
  });

  it('should print only the verdict on failure', () => {
    expect(formatInline(CONFLICT, inferTypes(parseExpression(CONFLICT)))).toBe('Type error');
  });
});

describe('formatConstraints and formatClasses', () => {
  it('should print constraints in generation order', () => {
    const result = inferTypes(parseExpression(ARITHMETIC));
    expect(formatConstraints(result.constraints)).toBe('(x, int)\n(x, int)\n(int, int)\n(TV_1, int)');
  });

  it('should print one line per class', () => {
    expect(formatClasses(inferTypes(parseExpression(ARITHMETIC)).classes)).toBe('{x, int, TV_1}');
    expect(formatClasses(inferTypes(parseExpression(CONFLICT)).classes)).toBe('{x, bool, int, TV_1}');
  });

  it('should print nothing for a literal', () => {
    const result = inferTypes(parseExpression('7'));
    expect(formatConstraints(result.constraints)).toBe('');
    expect(formatClasses(result.classes)).toBe('');
  });
});
