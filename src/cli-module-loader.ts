/**
 * CLI Module Loader
 *
 * Resolves `import a.b` to the file `a/b.tsl` next to the importing
 * document, with caching and circular import detection.
 */

import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import { RuntimeError, TesselError, runtimeError } from './error-classes.js';
import { parse } from './parser/index.js';
import type { Environment } from './runtime/core/environment.js';
import { locate } from './source-location.js';
import { Evaluator } from './runtime/core/evaluate.js';
import type { ModuleImporter } from './runtime/core/types.js';

function formatLocation(source: Uint8Array, offset: number): string {
  const { line, column } = locate(source, offset);
  return `${line}:${column}`;
}

/** File extension of Tessel documents */
const MODULE_EXTENSION = '.tsl';

/**
 * Create an importer rooted at a directory.
 *
 * Each module is evaluated once, in a scope below the importing context's
 * prelude; its top-level bindings are what the import provides. Slides
 * in a module are evaluated and discarded.
 */
export function createModuleImporter(baseDir: string): ModuleImporter {
  const cache = new Map<string, Environment>();
  const chain: string[] = [];

  const importer: ModuleImporter = (parts, ctx) => {
    const specifier = parts.join('.');
    const absolutePath = path.resolve(baseDir, ...parts) + MODULE_EXTENSION;

    if (chain.includes(absolutePath)) {
      const cycle = [...chain, absolutePath]
        .map((p) => path.relative(baseDir, p))
        .join(' -> ');
      throw runtimeError('TSL-R012', {
        path: specifier,
        reason: `circular import (${cycle}).`,
      });
    }

    const cached = cache.get(absolutePath);
    if (cached !== undefined) return cached;

    let source: Uint8Array;
    try {
      source = readFileSync(absolutePath);
    } catch {
      throw runtimeError('TSL-R012', {
        path: specifier,
        reason: `module file '${path.relative(baseDir, absolutePath)}' not found.`,
      });
    }

    chain.push(absolutePath);
    try {
      const { scope } = new Evaluator(ctx).evaluateDocument(parse(source));
      cache.set(absolutePath, scope);
      return scope;
    } catch (error) {
      // Ranges index into the module, not the importing document.
      if (error instanceof TesselError && error.errorId === 'TSL-R012') {
        throw new RuntimeError(error.errorId, error.message, undefined, error.context);
      }
      if (error instanceof TesselError) {
        const where = error.range
          ? `${path.relative(baseDir, absolutePath)}:${formatLocation(source, error.range.start)}`
          : path.relative(baseDir, absolutePath);
        throw runtimeError('TSL-R012', {
          path: specifier,
          reason: `${error.message} (${error.errorId} at ${where})`,
        });
      }
      throw error;
    } finally {
      chain.pop();
    }
  };

  return importer;
}
