/**
 * Parser Extension: Terms
 * Precedence chain, from weakest to strongest binding:
 * `~`, `+ -`, `* /`, unary `-`, `^` (right associative), calls, primaries
 */

import { Parser } from './parser.js';
import type {
  BinaryOp,
  CallNode,
  CoordNode,
  TermNode,
} from '../ast-nodes.js';
import { TOKEN_TYPES, type TokenType } from '../token-types.js';
import {
  ADDITIVE_OPERATORS,
  ADJOIN_OPERATORS,
  MULTIPLICATIVE_OPERATORS,
} from './helpers.js';
import { advance, check, current, expect, makeSpan, unexpected } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseTerm(): TermNode;
    parseAdditive(): TermNode;
    parseMultiplicative(): TermNode;
    parseUnary(): TermNode;
    parseExponent(): TermNode;
    parsePrimary(): TermNode;
    parseParenthesized(): TermNode;
    parseCallArgs(): { args: TermNode[]; end: number };
  }
}

function parseLeftAssociative(
  parser: Parser,
  operators: ReadonlyMap<TokenType, BinaryOp>,
  operand: () => TermNode
): TermNode {
  let left = operand();

  for (;;) {
    const token = current(parser.state);
    const op = token === undefined ? undefined : operators.get(token.type);
    if (op === undefined) return left;
    parser.state.pos++;
    const right = operand();
    left = {
      type: 'BinaryExpr',
      op,
      left,
      right,
      span: makeSpan(left.span, right.span),
    };
  }
}

// ============================================================
// PRECEDENCE CHAIN
// ============================================================

Parser.prototype.parseTerm = function (this: Parser): TermNode {
  return parseLeftAssociative(this, ADJOIN_OPERATORS, () =>
    this.parseAdditive()
  );
};

Parser.prototype.parseAdditive = function (this: Parser): TermNode {
  return parseLeftAssociative(this, ADDITIVE_OPERATORS, () =>
    this.parseMultiplicative()
  );
};

Parser.prototype.parseMultiplicative = function (this: Parser): TermNode {
  return parseLeftAssociative(this, MULTIPLICATIVE_OPERATORS, () =>
    this.parseUnary()
  );
};

/**
 * Negation of a literal folds into the literal; anything else becomes
 * `(-1 * term)`. Binds looser than `^`, so `-2^2` is `-(2^2)`.
 */
Parser.prototype.parseUnary = function (this: Parser): TermNode {
  if (!check(this.state, TOKEN_TYPES.MINUS)) {
    return this.parseExponent();
  }

  const minus = advance(this.state, 'term');
  const operand = this.parseUnary();
  const span = makeSpan(minus, operand.span);

  if (operand.type === 'NumberLiteral') {
    return { ...operand, value: -operand.value, span };
  }
  return {
    type: 'BinaryExpr',
    op: '*',
    left: { type: 'NumberLiteral', value: -1, unit: null, span: minus },
    right: operand,
    span,
  };
};

Parser.prototype.parseExponent = function (this: Parser): TermNode {
  const base = this.parsePrimary();
  if (!check(this.state, TOKEN_TYPES.HAT)) return base;

  advance(this.state, "'^'");
  const exponent = this.parseUnary();
  return {
    type: 'BinaryExpr',
    op: '^',
    left: base,
    right: exponent,
    span: makeSpan(base.span, exponent.span),
  };
};

// ============================================================
// PRIMARIES
// ============================================================

Parser.prototype.parsePrimary = function (this: Parser): TermNode {
  const token = current(this.state);

  switch (token?.type) {
    case TOKEN_TYPES.STRING:
      return this.parseStringLiteral();
    case TOKEN_TYPES.RAW_STRING:
      return this.parseRawStringLiteral();
    case TOKEN_TYPES.COLOR:
      return this.parseColorLiteral();
    case TOKEN_TYPES.NUMBER:
      return this.parseNumberLiteral();
    case TOKEN_TYPES.KW_FUNCTION:
      return this.parseFunction();
    case TOKEN_TYPES.LBRACE:
      return this.parseBlock();
    case TOKEN_TYPES.LPAREN:
      return this.parseParenthesized();
    case TOKEN_TYPES.IDENTIFIER: {
      const callee = this.parseIdents();
      if (!check(this.state, TOKEN_TYPES.LPAREN)) return callee;
      const { args, end } = this.parseCallArgs();
      const call: CallNode = {
        type: 'Call',
        callee,
        args,
        span: { start: callee.span.start, end },
      };
      return call;
    }
    default:
      throw unexpected(this.state, 'term');
  }
};

/** `(term)` groups; `(x, y)` is a coordinate */
Parser.prototype.parseParenthesized = function (this: Parser): TermNode {
  const open = expect(this.state, TOKEN_TYPES.LPAREN);
  const first = this.parseTerm();

  if (!check(this.state, TOKEN_TYPES.COMMA)) {
    expect(this.state, TOKEN_TYPES.RPAREN, "',' or ')'");
    return first;
  }

  advance(this.state, "','");
  const second = this.parseTerm();
  const close = expect(this.state, TOKEN_TYPES.RPAREN);
  const coord: CoordNode = {
    type: 'Coord',
    x: first,
    y: second,
    span: makeSpan(open, close),
  };
  return coord;
};

Parser.prototype.parseCallArgs = function (this: Parser): {
  args: TermNode[];
  end: number;
} {
  expect(this.state, TOKEN_TYPES.LPAREN);
  const args: TermNode[] = [];

  if (check(this.state, TOKEN_TYPES.RPAREN)) {
    return { args, end: advance(this.state, "')'").end };
  }

  for (;;) {
    args.push(this.parseTerm());
    if (check(this.state, TOKEN_TYPES.COMMA)) {
      advance(this.state, "','");
      continue;
    }
    const close = expect(this.state, TOKEN_TYPES.RPAREN, "',' or ')'");
    return { args, end: close.end };
  }
};
