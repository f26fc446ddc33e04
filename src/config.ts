/**
 * Configuration Loader
 * Loads and validates tessel.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import * as yaml from 'yaml';
import { DEFAULT_CANVAS } from './runtime/core/context.js';
import type { CanvasSize, RuntimeOptions } from './runtime/core/types.js';
import {
  OpentypeFontMap,
  type FontSource,
} from './runtime/ext/opentype-fonts.js';
import { SvgImageLoader } from './runtime/ext/svg-images.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = 'tessel.yaml';

// ============================================================
// TYPES
// ============================================================

export interface TesselConfig {
  readonly canvas: CanvasSize;
  readonly fonts: readonly FontSource[];
  /** Style defaults as source expressions, by variable name */
  readonly defaults: Readonly<Record<string, string>>;
  /** Directory that relative font paths resolve against */
  readonly baseDir: string;
}

/**
 * Create the configuration used when no file is present.
 */
export function createDefaultConfig(baseDir: string): TesselConfig {
  return { canvas: DEFAULT_CANVAS, fonts: [], defaults: {}, baseDir };
}

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(reason: string): Error {
  return new Error(`Invalid configuration: ${reason}`);
}

function validateCanvas(data: unknown): CanvasSize {
  if (!isRecord(data)) {
    throw invalid('canvas must be an object');
  }
  const size = (key: 'width' | 'height'): number => {
    const value = data[key] ?? DEFAULT_CANVAS[key];
    if (typeof value !== 'number' || !(value > 0) || !Number.isFinite(value)) {
      throw invalid(`canvas.${key} must be a positive number`);
    }
    return value;
  };
  return { width: size('width'), height: size('height') };
}

function validateFonts(data: unknown): FontSource[] {
  if (!Array.isArray(data)) {
    throw invalid('fonts must be a list');
  }
  return data.map((entry: unknown, i) => {
    if (!isRecord(entry)) {
      throw invalid(`fonts[${i}] must be an object`);
    }
    const field = (key: 'family' | 'style' | 'path'): string => {
      const value = entry[key];
      if (typeof value !== 'string' || value === '') {
        throw invalid(`fonts[${i}].${key} must be a non-empty string`);
      }
      return value;
    };
    return { family: field('family'), style: field('style'), path: field('path') };
  });
}

function validateDefaults(data: unknown): Record<string, string> {
  if (!isRecord(data)) {
    throw invalid('defaults must be an object');
  }
  const defaults: Record<string, string> = {};
  for (const [name, source] of Object.entries(data)) {
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
      throw invalid(`defaults key "${name}" is not an identifier`);
    }
    // Plain YAML numbers are accepted as dimensionless expressions.
    if (typeof source === 'number') {
      defaults[name] = String(source);
    } else if (typeof source === 'string') {
      defaults[name] = source;
    } else {
      throw invalid(`defaults.${name} must be an expression string`);
    }
  }
  return defaults;
}

/**
 * Parse and validate configuration text.
 * An empty document yields the defaults.
 *
 * @throws Error with "Invalid configuration: {reason}"
 */
export function parseConfig(text: string, baseDir: string): TesselConfig {
  let data: unknown;
  try {
    data = yaml.parse(text);
  } catch (err) {
    throw invalid(
      `invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  const config = createDefaultConfig(baseDir);
  if (data === null || data === undefined) return config;
  if (!isRecord(data)) {
    throw invalid('must be an object');
  }

  const known = new Set(['canvas', 'fonts', 'defaults']);
  for (const key of Object.keys(data)) {
    if (!known.has(key)) throw invalid(`unknown key "${key}"`);
  }

  return {
    canvas: 'canvas' in data ? validateCanvas(data['canvas']) : config.canvas,
    fonts: 'fonts' in data ? validateFonts(data['fonts']) : config.fonts,
    defaults:
      'defaults' in data ? validateDefaults(data['defaults']) : config.defaults,
    baseDir,
  };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration.
 *
 * With an explicit path the file must exist. Otherwise tessel.yaml is
 * looked up in `cwd`, and its absence yields the defaults.
 *
 * @throws Error with "Invalid configuration: {reason}"
 */
export function loadConfig(cwd: string, explicitPath?: string): TesselConfig {
  const configPath =
    explicitPath === undefined
      ? join(cwd, CONFIG_FILE_NAME)
      : resolve(cwd, explicitPath);

  if (!existsSync(configPath)) {
    if (explicitPath !== undefined) {
      throw invalid(`file not found: ${explicitPath}`);
    }
    return createDefaultConfig(cwd);
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw invalid(
      `failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return parseConfig(fileContent, dirname(configPath));
}

/**
 * Runtime options for a configuration. Images resolve against
 * `documentDir`, fonts against the configuration's directory.
 */
export function configToRuntimeOptions(
  config: TesselConfig,
  documentDir: string
): RuntimeOptions {
  return {
    canvas: config.canvas,
    defaults: { ...config.defaults },
    resources: {
      fonts: new OpentypeFontMap(config.fonts, config.baseDir),
      images: new SvgImageLoader(documentDir),
    },
  };
}
