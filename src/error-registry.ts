/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'runtime';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: TSL-{category}{3-digit} (e.g., TSL-R001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
  /** Short source excerpt that triggers the error */
  readonly example?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

/** All error definitions indexed by error ID */
const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (TSL-L0xx)
  {
    errorId: 'TSL-L001',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'String was not closed with \'"\' before end of input.',
    cause: 'A string literal was opened with a quote but the file ended first.',
    resolution:
      'Add the closing quote. An escaped quote (\\") does not close the string.',
    example: 't("hello)',
  },
  {
    errorId: 'TSL-L002',
    category: 'lexer',
    description: 'Unterminated raw string',
    messageTemplate:
      "Raw string was not closed with '---' before end of input.",
    cause: 'A raw string was opened with --- but no closing --- follows.',
    resolution: 'Close the raw string with another ---.',
    example: 't(---hello)',
  },
  {
    errorId: 'TSL-L003',
    category: 'lexer',
    description: 'Unexpected byte or character',
    messageTemplate: 'Found unexpected {what}.',
    cause:
      'Tabs, carriage returns, control characters and non-ASCII characters are only allowed inside strings and comments.',
    resolution:
      'Indent with spaces, use Unix line endings and keep identifiers ASCII.',
    example: 'x\t= 1',
  },
  {
    errorId: 'TSL-L004',
    category: 'lexer',
    description: 'Byte order mark',
    messageTemplate: 'Found {encoding} byte order mark.',
    cause: 'The file starts with a byte order mark or is not UTF-8 encoded.',
    resolution: 'Save the file as UTF-8 without a byte order mark.',
  },
  {
    errorId: 'TSL-L005',
    category: 'lexer',
    description: 'Malformed color literal',
    messageTemplate: 'Expected six hexadecimal digits in color.',
    cause: 'A color literal must be # followed by exactly six hex digits.',
    resolution: 'Write colors as #rrggbb.',
    example: 'color = #fff',
  },

  // Parse Errors (TSL-P0xx)
  {
    errorId: 'TSL-P001',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: 'Unexpected {found}, expected {expected}.',
    cause: 'The token does not fit the grammar at this position.',
    resolution: 'Check for missing operators, commas or parentheses.',
    example: 'x = (1w 2h)',
  },
  {
    errorId: 'TSL-P002',
    category: 'parse',
    description: 'Unexpected end of input',
    messageTemplate: 'Unexpected end of input, expected {expected}.',
    cause: 'The file ended in the middle of a statement or expression.',
    resolution: 'Complete the statement or close the open brace.',
    example: '{ put t("x")',
  },
  {
    errorId: 'TSL-P003',
    category: 'parse',
    description: 'Invalid escape sequence',
    messageTemplate: 'Invalid escape sequence {sequence} in string.',
    cause: 'Only \\", \\\\ and \\n are recognized inside strings.',
    resolution: 'Use a raw string (---...---) for text with backslashes.',
    example: '"C:\\temp"',
  },
  {
    errorId: 'TSL-P004',
    category: 'parse',
    description: 'Misplaced statement',
    messageTemplate: "'{statement}' is not allowed {place}.",
    cause:
      'put and return only make sense inside a block; bare blocks only at the top level.',
    resolution: 'Move the statement into a block, or the block to the top level.',
    example: 'put t("x")',
  },

  // Runtime Errors (TSL-R0xx)
  {
    errorId: 'TSL-R001',
    category: 'runtime',
    description: 'Wrong number of arguments',
    messageTemplate:
      "'{functionName}' takes {expected} argument(s), but {actual} were supplied.",
    cause: 'A function was called with too many or too few arguments.',
    resolution: 'Match the number of arguments to the function signature.',
    example: 'fit(slide)',
  },
  {
    errorId: 'TSL-R002',
    category: 'runtime',
    description: 'Argument type mismatch',
    messageTemplate:
      "Argument at index {position} of '{functionName}' must be {expected}, found {actual}.",
    cause: 'An argument has the wrong type or unit dimension.',
    resolution:
      'Pass a value of the expected type; lengths need a unit such as pt, em, w or h.',
    example: 'line((1, 1))',
  },
  {
    errorId: 'TSL-R003',
    category: 'runtime',
    description: 'Unresolved name',
    messageTemplate: "'{name}' is not defined.",
    cause: 'The name is not bound in the current scope or any enclosing one.',
    resolution: 'Define the variable before using it, or check the spelling.',
    example: 'x = undefined_name',
  },
  {
    errorId: 'TSL-R004',
    category: 'runtime',
    description: 'Type mismatch',
    messageTemplate: 'Expected {what} to be {expected}, found {actual}.',
    cause: 'A value of one type was used where another type is required.',
    resolution: 'Check the value bound to the variable or produced by the expression.',
    example: 'font_size = "large"',
  },
  {
    errorId: 'TSL-R005',
    category: 'runtime',
    description: 'Invalid value',
    messageTemplate: '{detail}',
    cause: 'A value has the right type but is outside the accepted set.',
    resolution: 'Use one of the values listed in the message.',
    example: 'text_align = "justify"',
  },
  {
    errorId: 'TSL-R006',
    category: 'runtime',
    description: 'Missing font',
    messageTemplate: "Font '{family}' with style '{style}' could not be found.",
    cause: 'The font family and style are not listed in the configuration.',
    resolution: 'Add the font under fonts: in tessel.yaml.',
  },
  {
    errorId: 'TSL-R007',
    category: 'runtime',
    description: 'Missing file',
    messageTemplate: "File '{path}' could not be loaded.",
    cause: 'The file does not exist, is unreadable or is malformed.',
    resolution: 'Check the path; relative paths resolve against the source file.',
    example: 'image("missing.svg")',
  },
  {
    errorId: 'TSL-R008',
    category: 'runtime',
    description: 'Evaluation error',
    messageTemplate: '{detail}',
  },
  {
    errorId: 'TSL-R009',
    category: 'runtime',
    description: 'Name already bound',
    messageTemplate: "'{name}' is already bound in this scope.",
    cause: 'Bindings are immutable once made.',
    resolution: 'Choose a different name, or rebind it inside a nested block.',
    example: 'x = 1\nx = 2',
  },
  {
    errorId: 'TSL-R010',
    category: 'runtime',
    description: 'Invalid operands',
    messageTemplate: "Operator '{op}' cannot be applied to {left} and {right}.",
    cause:
      'The operand types or unit dimensions do not combine under this operator.',
    resolution:
      'Lengths can only be added to lengths; multiply by a plain number to scale.',
    example: 'x = 1em + 2',
  },
  {
    errorId: 'TSL-R011',
    category: 'runtime',
    description: 'Not callable',
    messageTemplate: "'{name}' is {actual}, which cannot be called.",
    cause: 'Only functions can be called.',
    resolution: 'Check that the name refers to a function.',
    example: 'x = 1\ny = x(2)',
  },
  {
    errorId: 'TSL-R012',
    category: 'runtime',
    description: 'Import failed',
    messageTemplate: "Cannot import '{path}': {reason}",
    cause: 'The module could not be located or evaluated.',
    resolution: 'Check the module path relative to the importing file.',
    example: 'import styles.dark',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Expected {expected}, got {actual}", {expected: "str", actual: "num"})
 * // Returns: "Expected str, got num"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{' && template.charAt(i + 1) !== '{') {
      const close = template.indexOf('}', i + 1);

      // Unclosed brace - return template unchanged
      if (close === -1) {
        return template;
      }

      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        result += String(value);
      }

      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
