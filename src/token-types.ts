// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  STRING: 'STRING',
  RAW_STRING: 'RAW_STRING', // ---...---
  COLOR: 'COLOR', // #rrggbb
  NUMBER: 'NUMBER',

  // Identifiers
  IDENTIFIER: 'IDENTIFIER',

  // Keywords
  KW_AT: 'KW_AT',
  KW_FUNCTION: 'KW_FUNCTION',
  KW_IMPORT: 'KW_IMPORT',
  KW_PUT: 'KW_PUT',
  KW_RETURN: 'KW_RETURN',

  // Unit suffixes, emitted directly after a NUMBER
  UNIT_EM: 'UNIT_EM',
  UNIT_H: 'UNIT_H',
  UNIT_W: 'UNIT_W',
  UNIT_PT: 'UNIT_PT',

  // Punctuation
  COMMA: 'COMMA', // ,
  DOT: 'DOT', // .
  EQUALS: 'EQUALS', // =
  HAT: 'HAT', // ^
  MINUS: 'MINUS', // -
  PLUS: 'PLUS', // +
  SLASH: 'SLASH', // /
  STAR: 'STAR', // *
  TILDE: 'TILDE', // ~

  // Delimiters
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

/**
 * A token is its kind plus the half-open byte range [start, end) it covers.
 * Tokens never copy source text; see tokenText().
 */
export interface Token {
  readonly start: number;
  readonly type: TokenType;
  readonly end: number;
}

/** Display names used in parse error messages */
export const TOKEN_DESCRIPTIONS: Record<TokenType, string> = {
  STRING: 'string',
  RAW_STRING: 'raw string',
  COLOR: 'color',
  NUMBER: 'number',
  IDENTIFIER: 'identifier',
  KW_AT: "'at'",
  KW_FUNCTION: "'function'",
  KW_IMPORT: "'import'",
  KW_PUT: "'put'",
  KW_RETURN: "'return'",
  UNIT_EM: "unit 'em'",
  UNIT_H: "unit 'h'",
  UNIT_W: "unit 'w'",
  UNIT_PT: "unit 'pt'",
  COMMA: "','",
  DOT: "'.'",
  EQUALS: "'='",
  HAT: "'^'",
  MINUS: "'-'",
  PLUS: "'+'",
  SLASH: "'/'",
  STAR: "'*'",
  TILDE: "'~'",
  LPAREN: "'('",
  RPAREN: "')'",
  LBRACE: "'{'",
  RBRACE: "'}'",
};
