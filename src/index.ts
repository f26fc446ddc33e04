/**
 * Tessel Module
 * Exports lexer, parser, runtime, and AST types
 */

export { encodeSource, lex, tokenize, tokenText } from './lexer/index.js';
export { parse, parseTerm } from './parser/index.js';
export {
  formatBlock,
  formatDocument,
  formatNumber,
  formatStatement,
  formatTerm,
} from './ast-format.js';

export {
  LexerError,
  ParseError,
  RuntimeError,
  TesselError,
  createError,
  runtimeError,
  type TesselErrorData,
} from './error-classes.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
} from './error-registry.js';

export {
  locate,
  toSpan,
  type SourceLocation,
  type SourceRange,
  type SourceSpan,
} from './source-location.js';

export {
  TOKEN_DESCRIPTIONS,
  TOKEN_TYPES,
  type Token,
  type TokenType,
} from './token-types.js';

export {
  CONFIG_FILE_NAME,
  configToRuntimeOptions,
  createDefaultConfig,
  loadConfig,
  parseConfig,
  type TesselConfig,
} from './config.js';

export * from './runtime/index.js';
export * from './ast-nodes.js';
