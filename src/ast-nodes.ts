/**
 * Tessel AST Types
 * Terms and statements produced by the parser
 */

import type { SourceRange } from './source-location.js';

// ============================================================
// BASE
// ============================================================

interface BaseNode {
  /** Byte range of the node in the source */
  readonly span: SourceRange;
}

// ============================================================
// TERMS
// ============================================================

/** Unit suffix of a number literal */
export type Unit = 'w' | 'h' | 'em' | 'pt';

/** Arithmetic operators, in the order they bind from weakest */
export type ArithmeticOp = '+' | '-' | '*' | '/' | '^';

/** `~` adjoins two frames */
export type BinaryOp = ArithmeticOp | '~';

export interface StringLiteralNode extends BaseNode {
  readonly type: 'StringLiteral';
  /** Unescaped contents */
  readonly value: string;
}

export interface NumberLiteralNode extends BaseNode {
  readonly type: 'NumberLiteral';
  readonly value: number;
  readonly unit: Unit | null;
}

export interface ColorLiteralNode extends BaseNode {
  readonly type: 'ColorLiteral';
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

/** Dotted identifier path: `a.b.c` */
export interface IdentsNode extends BaseNode {
  readonly type: 'Idents';
  readonly parts: readonly [string, ...string[]];
}

export interface CoordNode extends BaseNode {
  readonly type: 'Coord';
  readonly x: TermNode;
  readonly y: TermNode;
}

export interface BinaryExprNode extends BaseNode {
  readonly type: 'BinaryExpr';
  readonly op: BinaryOp;
  readonly left: TermNode;
  readonly right: TermNode;
}

export interface CallNode extends BaseNode {
  readonly type: 'Call';
  readonly callee: IdentsNode;
  readonly args: readonly TermNode[];
}

export interface FunctionNode extends BaseNode {
  readonly type: 'Function';
  readonly params: readonly string[];
  readonly body: BlockNode;
}

/** `{ ... }`: evaluates to a frame, or to the value it returns */
export interface BlockNode extends BaseNode {
  readonly type: 'Block';
  readonly statements: readonly BlockStatementNode[];
}

export type TermNode =
  | StringLiteralNode
  | NumberLiteralNode
  | ColorLiteralNode
  | IdentsNode
  | CoordNode
  | BinaryExprNode
  | CallNode
  | FunctionNode
  | BlockNode;

// ============================================================
// STATEMENTS
// ============================================================

export interface ImportNode extends BaseNode {
  readonly type: 'Import';
  readonly path: IdentsNode;
}

export interface AssignNode extends BaseNode {
  readonly type: 'Assign';
  readonly name: string;
  readonly value: TermNode;
}

export interface PutNode extends BaseNode {
  readonly type: 'Put';
  readonly frame: TermNode;
  /** Offset to place at; the origin when absent */
  readonly at: TermNode | null;
}

export interface ReturnNode extends BaseNode {
  readonly type: 'Return';
  readonly value: TermNode;
}

/** Statements allowed inside a block */
export type BlockStatementNode = ImportNode | AssignNode | PutNode | ReturnNode;

/** Statements allowed at the top level; a bare block is a slide */
export type DocumentStatementNode = ImportNode | AssignNode | BlockNode;

export interface DocumentNode extends BaseNode {
  readonly type: 'Document';
  readonly statements: readonly DocumentStatementNode[];
}

export type ASTNode = TermNode | BlockStatementNode | DocumentNode;
