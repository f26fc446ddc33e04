/**
 * Tessel Runtime
 *
 * Public API for evaluating Tessel documents.
 *
 * Module Structure:
 * - core/: Evaluation engine
 *   - types.ts: Public types (RuntimeContext, RuntimeOptions, etc.)
 *   - values.ts: Values, value types and formatting
 *   - environment.ts: Scoped name resolution
 *   - callable.ts: Builtin signature and argument validation
 *   - arithmetic.ts: Dimension algebra
 *   - geometry.ts, elements.ts, frame.ts: Frame algebra
 *   - layout.ts: Text layout and fit scaling
 *   - context.ts: Runtime context factory
 *   - execute.ts: Document execution
 *   - evaluate.ts: AST evaluation (internal)
 * - ext/: Builtins and resource collaborators
 *   - builtins.ts: Built-in functions
 *   - resources.ts: Font and image interfaces
 *   - opentype-fonts.ts, svg-images.ts: Default resources
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  BuiltinCallEvent,
  BuiltinReturnEvent,
  CanvasSize,
  ErrorEvent,
  ExecutionResult,
  ModuleImporter,
  ObservabilityCallbacks,
  RuntimeContext,
  RuntimeOptions,
  StatementEvent,
} from './core/types.js';

// ============================================================
// VALUES
// ============================================================

export type {
  BuiltinValue,
  ClosureValue,
  ColorValue,
  CoordValue,
  FrameValue,
  NumberValue,
  StringValue,
  Value,
  ValueType,
} from './core/values.js';

export {
  TYPES,
  color,
  coord,
  formatType,
  formatValue,
  frameValue,
  len,
  num,
  str,
  typeEquals,
  typeOf,
} from './core/values.js';

export { Environment } from './core/environment.js';

// ============================================================
// CALLABLES
// ============================================================

export type { BuiltinFn, CallContext } from './core/callable.js';

export {
  coordArg,
  frameArg,
  numberArg,
  stringArg,
  validateArgs,
} from './core/callable.js';

export { applyArithmetic } from './core/arithmetic.js';

// ============================================================
// FRAMES AND GEOMETRY
// ============================================================

export type {
  Color,
  Element,
  EmbeddedImage,
  FillPolygon,
  PlacedElement,
  PositionedGlyph,
  ScaledGroup,
  StrokePolygon,
  TextRun,
} from './core/elements.js';

export { Frame } from './core/frame.js';
export { BoundingBox, Vec2 } from './core/geometry.js';

export type { TextAlign, TypesetLine } from './core/layout.js';

export {
  alignOffset,
  fitScale,
  parseTextAlign,
  splitLines,
  typesetLine,
} from './core/layout.js';

// ============================================================
// RESOURCES
// ============================================================

export type {
  FontHandle,
  FontResolver,
  ImageHandle,
  ImageLoader,
  LoadedImage,
  Resources,
  ShapedGlyph,
} from './ext/resources.js';

export { OpentypeFontMap, type FontSource } from './ext/opentype-fonts.js';
export { SvgImageLoader, readSvgSize } from './ext/svg-images.js';
export { BUILTIN_FUNCTIONS } from './ext/builtins.js';

// ============================================================
// CONTEXT FACTORY AND EXECUTION
// ============================================================

export {
  DEFAULT_CANVAS,
  DEFAULT_STYLE,
  createRuntimeContext,
} from './core/context.js';

export { evaluateDocument } from './core/execute.js';
