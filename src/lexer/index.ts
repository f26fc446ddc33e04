/**
 * Lexer Module
 * Byte-level state machine turning UTF-8 source into tokens
 */

export { LexerError } from './errors.js';
export { encodeSource, lex, tokenize, tokenText } from './tokenizer.js';
export { LEXER_STATES, type LexerStateName } from './state.js';
