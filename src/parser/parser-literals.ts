/**
 * Parser Extension: Literals
 * Strings, numbers, colors, identifier paths and function literals
 */

import { Parser } from './parser.js';
import type {
  ColorLiteralNode,
  FunctionNode,
  IdentsNode,
  NumberLiteralNode,
  StringLiteralNode,
  Unit,
} from '../ast-nodes.js';
import { ParseError } from '../error-classes.js';
import { TOKEN_TYPES, type TokenType } from '../token-types.js';
import { advance, check, current, expect, textOf } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseStringLiteral(): StringLiteralNode;
    parseRawStringLiteral(): StringLiteralNode;
    parseColorLiteral(): ColorLiteralNode;
    parseNumberLiteral(): NumberLiteralNode;
    parseIdents(): IdentsNode;
    parseFunction(): FunctionNode;
  }
}

const UNITS: ReadonlyMap<TokenType, Unit> = new Map([
  [TOKEN_TYPES.UNIT_W, 'w'],
  [TOKEN_TYPES.UNIT_H, 'h'],
  [TOKEN_TYPES.UNIT_EM, 'em'],
  [TOKEN_TYPES.UNIT_PT, 'pt'],
]);

const ESCAPES: ReadonlyMap<number, number> = new Map([
  [0x22, 0x22], // \"
  [0x5c, 0x5c], // \\
  [0x6e, 0x0a], // \n
]);

const BACKSLASH = 0x5c;

const decoder = new TextDecoder('utf-8');

// ============================================================
// STRINGS
// ============================================================

Parser.prototype.parseStringLiteral = function (
  this: Parser
): StringLiteralNode {
  const token = expect(this.state, TOKEN_TYPES.STRING);
  const input = this.state.input;
  const bytes: number[] = [];

  // Skip the quotes; the lexer guarantees an escaped byte before the close.
  for (let i = token.start + 1; i < token.end - 1; i++) {
    const byte = input[i] ?? 0;
    if (byte !== BACKSLASH) {
      bytes.push(byte);
      continue;
    }

    const escaped = input[i + 1] ?? 0;
    const replacement = ESCAPES.get(escaped);
    if (replacement === undefined) {
      const sequence =
        escaped > 0x20 && escaped < 0x7f
          ? `'\\${String.fromCharCode(escaped)}'`
          : `'\\' followed by byte 0x${escaped.toString(16)}`;
      throw new ParseError(
        'TSL-P003',
        `Invalid escape sequence ${sequence} in string.`,
        { start: i, end: i + 2 },
        { sequence }
      );
    }
    bytes.push(replacement);
    i++;
  }

  return {
    type: 'StringLiteral',
    value: decoder.decode(Uint8Array.from(bytes)),
    span: { start: token.start, end: token.end },
  };
};

Parser.prototype.parseRawStringLiteral = function (
  this: Parser
): StringLiteralNode {
  const token = expect(this.state, TOKEN_TYPES.RAW_STRING);
  return {
    type: 'StringLiteral',
    value: textOf(this.state, { start: token.start + 3, end: token.end - 3 }),
    span: { start: token.start, end: token.end },
  };
};

// ============================================================
// NUMBERS AND COLORS
// ============================================================

Parser.prototype.parseNumberLiteral = function (
  this: Parser
): NumberLiteralNode {
  const token = expect(this.state, TOKEN_TYPES.NUMBER);
  const value = Number.parseFloat(textOf(this.state, token));

  const next = current(this.state);
  const unit = next === undefined ? undefined : UNITS.get(next.type);
  if (next === undefined || unit === undefined) {
    return {
      type: 'NumberLiteral',
      value,
      unit: null,
      span: { start: token.start, end: token.end },
    };
  }

  this.state.pos++;
  return {
    type: 'NumberLiteral',
    value,
    unit,
    span: { start: token.start, end: next.end },
  };
};

Parser.prototype.parseColorLiteral = function (
  this: Parser
): ColorLiteralNode {
  const token = expect(this.state, TOKEN_TYPES.COLOR);
  const hex = textOf(this.state, { start: token.start + 1, end: token.end });
  const channel = (at: number): number =>
    Number.parseInt(hex.slice(at, at + 2), 16);

  return {
    type: 'ColorLiteral',
    r: channel(0),
    g: channel(2),
    b: channel(4),
    span: { start: token.start, end: token.end },
  };
};

// ============================================================
// IDENTIFIERS AND FUNCTIONS
// ============================================================

Parser.prototype.parseIdents = function (this: Parser): IdentsNode {
  const first = expect(this.state, TOKEN_TYPES.IDENTIFIER);
  const parts: [string, ...string[]] = [textOf(this.state, first)];
  let end = first.end;

  while (check(this.state, TOKEN_TYPES.DOT)) {
    advance(this.state, "'.'");
    const segment = expect(this.state, TOKEN_TYPES.IDENTIFIER);
    parts.push(textOf(this.state, segment));
    end = segment.end;
  }

  return { type: 'Idents', parts, span: { start: first.start, end } };
};

/** `function(a, b) { ... }` */
Parser.prototype.parseFunction = function (this: Parser): FunctionNode {
  const keyword = expect(this.state, TOKEN_TYPES.KW_FUNCTION);
  expect(this.state, TOKEN_TYPES.LPAREN);
  const params: string[] = [];

  if (check(this.state, TOKEN_TYPES.RPAREN)) {
    advance(this.state, "')'");
  } else {
    for (;;) {
      const param = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'parameter name');
      params.push(textOf(this.state, param));
      if (check(this.state, TOKEN_TYPES.COMMA)) {
        advance(this.state, "','");
        continue;
      }
      expect(this.state, TOKEN_TYPES.RPAREN, "',' or ')'");
      break;
    }
  }

  const body = this.parseBlock();
  return {
    type: 'Function',
    params,
    body,
    span: { start: keyword.start, end: body.span.end },
  };
};
