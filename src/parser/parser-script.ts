/**
 * Parser Extension: Script Parsing
 * Document, statements and blocks
 */

import { Parser } from './parser.js';
import type {
  AssignNode,
  BlockNode,
  BlockStatementNode,
  DocumentNode,
  DocumentStatementNode,
  ImportNode,
  PutNode,
  ReturnNode,
} from '../ast-nodes.js';
import { ParseError } from '../error-classes.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  advance,
  check,
  current,
  expect,
  isAtEnd,
  textOf,
  unexpected,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseDocument(): DocumentNode;
    parseDocumentStatement(): DocumentStatementNode;
    parseBlockStatement(): BlockStatementNode;
    parseBlock(): BlockNode;
    parseImport(): ImportNode;
    parseAssign(): AssignNode;
    parsePut(): PutNode;
    parseReturn(): ReturnNode;
  }
}

function misplaced(
  statement: string,
  place: string,
  range: { start: number; end: number }
): ParseError {
  return new ParseError(
    'TSL-P004',
    `'${statement}' is not allowed ${place}.`,
    { start: range.start, end: range.end },
    { statement, place }
  );
}

// ============================================================
// DOCUMENT
// ============================================================

Parser.prototype.parseDocument = function (this: Parser): DocumentNode {
  const statements: DocumentStatementNode[] = [];
  while (!isAtEnd(this.state)) {
    statements.push(this.parseDocumentStatement());
  }
  return {
    type: 'Document',
    statements,
    span: { start: 0, end: this.state.input.length },
  };
};

Parser.prototype.parseDocumentStatement = function (
  this: Parser
): DocumentStatementNode {
  const token = current(this.state);
  if (token === undefined) throw unexpected(this.state, 'statement');

  switch (token.type) {
    case TOKEN_TYPES.KW_IMPORT:
      return this.parseImport();
    case TOKEN_TYPES.IDENTIFIER:
      return this.parseAssign();
    case TOKEN_TYPES.LBRACE:
      return this.parseBlock();
    case TOKEN_TYPES.KW_PUT:
      throw misplaced('put', 'at the top level', token);
    case TOKEN_TYPES.KW_RETURN:
      throw misplaced('return', 'at the top level', token);
    default:
      throw unexpected(this.state, 'statement');
  }
};

// ============================================================
// BLOCKS
// ============================================================

Parser.prototype.parseBlock = function (this: Parser): BlockNode {
  const open = expect(this.state, TOKEN_TYPES.LBRACE);
  const statements: BlockStatementNode[] = [];

  while (!check(this.state, TOKEN_TYPES.RBRACE)) {
    if (isAtEnd(this.state)) throw unexpected(this.state, "statement or '}'");
    statements.push(this.parseBlockStatement());
  }

  const close = advance(this.state, "'}'");
  return {
    type: 'Block',
    statements,
    span: { start: open.start, end: close.end },
  };
};

Parser.prototype.parseBlockStatement = function (
  this: Parser
): BlockStatementNode {
  const token = current(this.state);
  if (token === undefined) throw unexpected(this.state, "statement or '}'");

  switch (token.type) {
    case TOKEN_TYPES.KW_IMPORT:
      return this.parseImport();
    case TOKEN_TYPES.IDENTIFIER:
      return this.parseAssign();
    case TOKEN_TYPES.KW_PUT:
      return this.parsePut();
    case TOKEN_TYPES.KW_RETURN:
      return this.parseReturn();
    case TOKEN_TYPES.LBRACE:
      throw misplaced('{', 'as a statement inside a block', token);
    default:
      throw unexpected(this.state, "statement or '}'");
  }
};

// ============================================================
// STATEMENTS
// ============================================================

Parser.prototype.parseImport = function (this: Parser): ImportNode {
  const keyword = expect(this.state, TOKEN_TYPES.KW_IMPORT);
  const path = this.parseIdents();
  return {
    type: 'Import',
    path,
    span: { start: keyword.start, end: path.span.end },
  };
};

Parser.prototype.parseAssign = function (this: Parser): AssignNode {
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'statement');
  expect(this.state, TOKEN_TYPES.EQUALS);
  const value = this.parseTerm();
  return {
    type: 'Assign',
    name: textOf(this.state, name),
    value,
    span: { start: name.start, end: value.span.end },
  };
};

Parser.prototype.parsePut = function (this: Parser): PutNode {
  const keyword = expect(this.state, TOKEN_TYPES.KW_PUT);
  const frame = this.parseTerm();

  if (!check(this.state, TOKEN_TYPES.KW_AT)) {
    return {
      type: 'Put',
      frame,
      at: null,
      span: { start: keyword.start, end: frame.span.end },
    };
  }

  advance(this.state, "'at'");
  const at = this.parseTerm();
  return {
    type: 'Put',
    frame,
    at,
    span: { start: keyword.start, end: at.span.end },
  };
};

Parser.prototype.parseReturn = function (this: Parser): ReturnNode {
  const keyword = expect(this.state, TOKEN_TYPES.KW_RETURN);
  const value = this.parseTerm();
  return {
    type: 'Return',
    value,
    span: { start: keyword.start, end: value.span.end },
  };
};
