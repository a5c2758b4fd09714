/**
 * Token definitions
 */

export type TokenKind =
  // Literals and names
  | 'number'
  | 'true'
  | 'false'
  | 'identifier'
  // Keywords
  | 'let'
  | 'in'
  | 'end'
  | 'if'
  | 'then'
  | 'else'
  | 'not'
  | 'and'
  | 'or'
  // Punctuation and operators
  | 'assign'        // <-
  | 'plus'          // +
  | 'minus'         // -
  | 'star'          // *
  | 'slash'         // /
  | 'equal'         // = or ==
  | 'less'          // <
  | 'lessEqual'     // <=
  | 'greater'       // >
  | 'greaterEqual'  // >=
  | 'tilde'         // ~
  | 'lparen'
  | 'rparen'
  | 'eof'
  ;

export interface Token {
  readonly kind: TokenKind;
  readonly text: string;
  /** Line number (1-indexed) */
  readonly line: number;
  /** Column number (0-indexed) */
  readonly column: number;
}

export const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
  ['let', 'let'],
  ['in', 'in'],
  ['end', 'end'],
  ['if', 'if'],
  ['then', 'then'],
  ['else', 'else'],
  ['true', 'true'],
  ['false', 'false'],
  ['not', 'not'],
  ['and', 'and'],
  ['or', 'or'],
]);

/**
 * Human-readable description of a token kind for error messages
 */
export function describeTokenKind(kind: TokenKind): string {
  switch (kind) {
    case 'number':
      return 'a number';
    case 'identifier':
      return 'an identifier';
    case 'eof':
      return 'end of input';
    case 'assign':
      return "'<-'";
    case 'plus':
      return "'+'";
    case 'minus':
      return "'-'";
    case 'star':
      return "'*'";
    case 'slash':
      return "'/'";
    case 'equal':
      return "'='";
    case 'less':
      return "'<'";
    case 'lessEqual':
      return "'<='";
    case 'greater':
      return "'>'";
    case 'greaterEqual':
      return "'>='";
    case 'tilde':
      return "'~'";
    case 'lparen':
      return "'('";
    case 'rparen':
      return "')'";
    default:
      return `'${kind}'`;
  }
}
