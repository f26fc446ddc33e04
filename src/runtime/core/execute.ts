/**
 * Document Execution
 * Public entry points for evaluating parsed documents
 */

import type { DocumentNode } from '../../ast-nodes.js';
import { Evaluator } from './evaluate.js';
import type { ExecutionResult, RuntimeContext } from './types.js';

/**
 * Evaluate a document: one slide per top-level block.
 * Errors are reported to `onError` and rethrown.
 *
 * @example
 * ```typescript
 * const ctx = createRuntimeContext({ canvas: { width: 800, height: 600 } });
 * const { slides } = evaluateDocument(parse(source), ctx);
 * ```
 */
export function evaluateDocument(
  ast: DocumentNode,
  ctx: RuntimeContext
): ExecutionResult {
  try {
    return new Evaluator(ctx).evaluateDocument(ast);
  } catch (error) {
    if (error instanceof Error) {
      ctx.observability.onError?.({ error });
    }
    throw error;
  }
}
