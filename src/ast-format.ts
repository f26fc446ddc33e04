/**
 * AST Formatting
 * Canonical source text for terms and statements. Output parses back to
 * an equal tree (spans aside).
 */

import type {
  BlockNode,
  BlockStatementNode,
  DocumentNode,
  DocumentStatementNode,
  TermNode,
} from './ast-nodes.js';

const INDENT = '  ';

/** Decimal form without exponent notation, which the lexer does not read */
export function formatNumber(value: number): string {
  const text = String(value);
  if (!text.includes('e')) return text;
  return value.toLocaleString('en-US', {
    useGrouping: false,
    maximumFractionDigits: 20,
  });
}

function hex(channel: number): string {
  return channel.toString(16).padStart(2, '0');
}

function escapeString(value: string): string {
  return value
    .replaceAll('\\', '\\\\')
    .replaceAll('"', '\\"')
    .replaceAll('\n', '\\n');
}

export function formatTerm(node: TermNode, indent = ''): string {
  switch (node.type) {
    case 'StringLiteral':
      return `"${escapeString(node.value)}"`;
    case 'NumberLiteral':
      return `${formatNumber(node.value)}${node.unit ?? ''}`;
    case 'ColorLiteral':
      return `#${hex(node.r)}${hex(node.g)}${hex(node.b)}`;
    case 'Idents':
      return node.parts.join('.');
    case 'Coord':
      return `(${formatTerm(node.x, indent)}, ${formatTerm(node.y, indent)})`;
    case 'BinaryExpr': {
      let left = formatTerm(node.left, indent);
      // A negative base needs its own parentheses: `-2 ^ 2` is `-(2 ^ 2)`.
      if (node.op === '^' && left.startsWith('-')) left = `(${left})`;
      return `(${left} ${node.op} ${formatTerm(node.right, indent)})`;
    }
    case 'Call': {
      const args = node.args.map((arg) => formatTerm(arg, indent));
      return `${formatTerm(node.callee)}(${args.join(', ')})`;
    }
    case 'Function':
      return `function(${node.params.join(', ')}) ${formatBlock(node.body, indent)}`;
    case 'Block':
      return formatBlock(node, indent);
  }
}

export function formatBlock(node: BlockNode, indent = ''): string {
  if (node.statements.length === 0) return '{}';
  const inner = indent + INDENT;
  const lines = node.statements.map(
    (stmt) => `${inner}${formatStatement(stmt, inner)}`
  );
  return `{\n${lines.join('\n')}\n${indent}}`;
}

export function formatStatement(
  node: BlockStatementNode | DocumentStatementNode,
  indent = ''
): string {
  switch (node.type) {
    case 'Import':
      return `import ${formatTerm(node.path)}`;
    case 'Assign':
      return `${node.name} = ${formatTerm(node.value, indent)}`;
    case 'Put': {
      const frame = formatTerm(node.frame, indent);
      if (node.at === null) return `put ${frame}`;
      return `put ${frame} at ${formatTerm(node.at, indent)}`;
    }
    case 'Return':
      return `return ${formatTerm(node.value, indent)}`;
    case 'Block':
      return formatBlock(node, indent);
  }
}

export function formatDocument(node: DocumentNode): string {
  return node.statements.map((stmt) => `${formatStatement(stmt)}\n`).join('');
}
