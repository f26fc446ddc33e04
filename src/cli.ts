#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Implements main(), parseArgs() and renderFile() for the tessel binary.
 * Evaluates a document and prints its slides as JSON.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createModuleImporter } from './cli-module-loader.js';
import { explainError } from './cli-explain.js';
import {
  createTraceCallbacks,
  formatError,
  formatOutput,
  readVersion,
} from './cli-shared.js';
import { configToRuntimeOptions, loadConfig } from './config.js';
import { parse } from './parser/index.js';
import {
  createRuntimeContext,
  evaluateDocument,
  type ExecutionResult,
} from './runtime/index.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | {
      mode: 'render';
      file: string;
      config?: string | undefined;
      trace: boolean;
      pretty: boolean;
    }
  | { mode: 'explain'; errorId: string }
  | { mode: 'help' | 'version' };

const USAGE = `Usage:
  tessel <document.tsl> [options]  Evaluate a document and print its slides as JSON
  tessel --explain <TSL-xxxx>      Show documentation for an error code
  tessel --help                    Show this help message
  tessel --version                 Show version information

Options:
  --config <file>  Configuration file (default: tessel.yaml in the working directory)
  --pretty         Indent the JSON output
  --trace          Log statements and builtin calls to stderr

Examples:
  tessel talk.tsl --pretty
  tessel talk.tsl --config slides/tessel.yaml`;

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseArgs(argv: string[]): ParsedArgs {
  // Check for --help or --version flags in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  let file: string | undefined;
  let config: string | undefined;
  let trace = false;
  let pretty = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    switch (arg) {
      case '--explain': {
        const errorId = argv[i + 1];
        if (errorId === undefined) {
          throw new Error('Missing error code after --explain');
        }
        return { mode: 'explain', errorId };
      }
      case '--config': {
        const value = argv[i + 1];
        if (value === undefined) {
          throw new Error('Missing file after --config');
        }
        config = value;
        i++;
        break;
      }
      case '--trace':
        trace = true;
        break;
      case '--pretty':
        pretty = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new Error(`Unknown option: ${arg}`);
        }
        if (file !== undefined) {
          throw new Error(`Unexpected argument: ${arg}`);
        }
        file = arg;
    }
  }

  if (file === undefined) {
    throw new Error('Missing file argument');
  }

  return { mode: 'render', file, config, trace, pretty };
}

/** Options for rendering a document file */
export interface RenderOptions {
  /** Explicit configuration file, relative to the working directory */
  config?: string | undefined;
  /** Receives one line per trace event; tracing is off without it */
  trace?: ((line: string) => void) | undefined;
  cwd?: string | undefined;
}

/**
 * Evaluate a document file with its configuration and imports.
 *
 * @returns Execution result and the source bytes, for error reporting
 * @throws Error if the file is missing, the configuration is invalid or
 * the document fails
 */
export async function renderFile(
  file: string,
  options: RenderOptions = {}
): Promise<{ result: ExecutionResult; source: Uint8Array }> {
  const cwd = options.cwd ?? process.cwd();
  const documentPath = path.resolve(cwd, file);

  let source: Uint8Array;
  try {
    source = await fs.readFile(documentPath);
  } catch {
    throw new Error(`File not found: ${file}`);
  }

  const documentDir = path.dirname(documentPath);
  const config = loadConfig(cwd, options.config);
  const ctx = createRuntimeContext({
    ...configToRuntimeOptions(config, documentDir),
    importer: createModuleImporter(documentDir),
    observability: options.trace ? createTraceCallbacks(options.trace) : {},
  });

  try {
    return { result: evaluateDocument(parse(source), ctx), source };
  } catch (err) {
    throw new DocumentError(err, source);
  }
}

/** Failure inside a document, carrying its source for snippets */
export class DocumentError extends Error {
  constructor(
    readonly error: unknown,
    readonly source: Uint8Array
  ) {
    super(error instanceof Error ? error.message : String(error));
    this.name = 'DocumentError';
  }
}

/**
 * Entry point for the tessel binary
 *
 * Writes results to stdout and errors to stderr.
 * Sets the exit code to 1 on any error.
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  let fileName = '<input>';
  try {
    const parsed = parseArgs(argv);

    switch (parsed.mode) {
      case 'help':
        console.log(USAGE);
        return;

      case 'version':
        console.log(readVersion());
        return;

      case 'explain': {
        const documentation = explainError(parsed.errorId);
        if (documentation === null) {
          console.error(`Unknown error code: ${parsed.errorId}`);
          process.exitCode = 1;
          return;
        }
        console.log(documentation);
        return;
      }

      case 'render': {
        fileName = parsed.file;
        const { result } = await renderFile(parsed.file, {
          config: parsed.config,
          trace: parsed.trace ? (line) => console.error(line) : undefined,
        });
        console.log(formatOutput(result, parsed.pretty));
        return;
      }
    }
  } catch (err) {
    if (err instanceof DocumentError) {
      const cause =
        err.error instanceof Error ? err.error : new Error(String(err.error));
      console.error(formatError(cause, err.source, fileName));
    } else if (err instanceof Error) {
      console.error(formatError(err));
    } else {
      console.error(formatError(new Error(String(err))));
    }
    process.exitCode = 1;
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  void main();
}
