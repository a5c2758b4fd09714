/**
 * Tests for the lexer
 */

import { describe, it, expect } from 'vitest';
import { tokenize, integerValue } from '../../src/parser/index.js';

function kinds(source: string): string[] {
  return tokenize(source).tokens.map(t => t.kind);
}

describe('Lexer', () => {
  describe('tokens', () => {
    it('should tokenize arithmetic', () => {
      expect(kinds('1 + 3')).toEqual(['number', 'plus', 'number', 'eof']);
    });

    it('should tokenize a let expression', () => {
      expect(kinds('let v <- 2 in v end')).toEqual([
        'let', 'identifier', 'assign', 'number', 'in', 'identifier', 'end', 'eof',
      ]);
    });

    it('should tokenize comparison and equality operators', () => {
      expect(kinds('a <= b < c >= d > e = f == g')).toEqual([
        'identifier', 'lessEqual', 'identifier', 'less', 'identifier', 'greaterEqual',
        'identifier', 'greater', 'identifier', 'equal', 'identifier', 'equal', 'identifier', 'eof',
      ]);
    });

    it('should tokenize unary operators and keywords', () => {
      expect(kinds('~x')).toEqual(['tilde', 'identifier', 'eof']);
      expect(kinds('not true and false or x')).toEqual([
        'not', 'true', 'and', 'false', 'or', 'identifier', 'eof',
      ]);
      expect(kinds('if x then 1 else 2')).toEqual([
        'if', 'identifier', 'then', 'number', 'else', 'number', 'eof',
      ]);
    });

    it('should keep words that start with a keyword as identifiers', () => {
      const { tokens } = tokenize('letter x_1 endless');
      expect(tokens.map(t => [t.kind, t.text])).toEqual([
        ['identifier', 'letter'],
        ['identifier', 'x_1'],
        ['identifier', 'endless'],
        ['eof', ''],
      ]);
    });

    it('should skip line comments', () => {
      expect(kinds('1 * 2 -- 3\n')).toEqual(['number', 'star', 'number', 'eof']);
    });

    it('should skip block comments', () => {
      expect(kinds('(* note *) true')).toEqual(['true', 'eof']);
      expect(kinds('1 (* a\nmultiline\ncomment *) - 2')).toEqual(['number', 'minus', 'number', 'eof']);
    });

    it('should track line and column', () => {
      const { tokens } = tokenize('let x <- 1\nin x end');
      const inToken = tokens[4];
      const xToken = tokens[5];
      expect(inToken).toEqual({ kind: 'in', text: 'in', line: 2, column: 0 });
      expect(xToken).toEqual({ kind: 'identifier', text: 'x', line: 2, column: 3 });
    });
  });

  describe('integer literals', () => {
    it('should read decimal, hexadecimal, binary and octal', () => {
      expect(integerValue('42')).toBe(42n);
      expect(integerValue('0x2A')).toBe(42n);
      expect(integerValue('0b101010')).toBe(42n);
      expect(integerValue('052')).toBe(42n);
      expect(integerValue('0')).toBe(0n);
    });

    it('should keep large literals exact', () => {
      expect(integerValue('9007199254740993')).toBe(9007199254740993n);
      expect(integerValue('0xFFFFFFFFFFFFFFFFFF')).toBe(4722366482869645213695n);
    });

    it('should reject malformed literals', () => {
      expect(integerValue('08')).toBeNull();
      expect(integerValue('12ab')).toBeNull();
      expect(integerValue('0x')).toBeNull();
    });
  });

  describe('errors', () => {
    it('should report unexpected characters and keep going', () => {
      const { tokens, errors } = tokenize('1 $ 2');
      expect(errors).toEqual([{ message: "Unexpected character '$'", line: 1, column: 2 }]);
      expect(tokens.map(t => t.kind)).toEqual(['number', 'number', 'eof']);
    });

    it('should report invalid number literals', () => {
      const { errors } = tokenize('09');
      expect(errors).toEqual([{ message: "Invalid number literal '09'", line: 1, column: 0 }]);
    });

    it('should report unterminated block comments', () => {
      const { errors } = tokenize('(* open');
      expect(errors).toEqual([{ message: 'Unterminated block comment', line: 1, column: 0 }]);
    });
  });
});
