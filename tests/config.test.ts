/**
 * Configuration Tests
 * Parsing, validation and loading of tessel.yaml
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  DEFAULT_CANVAS,
  OpentypeFontMap,
  SvgImageLoader,
  configToRuntimeOptions,
  loadConfig,
  parseConfig,
} from '../src/index.js';

describe('parseConfig', () => {
  it('returns the defaults for an empty file', () => {
    expect(parseConfig('', '/base')).toEqual({
      canvas: DEFAULT_CANVAS,
      fonts: [],
      defaults: {},
      baseDir: '/base',
    });
  });

  it('reads canvas, fonts and defaults', () => {
    const config = parseConfig(
      [
        'canvas:',
        '  width: 800',
        '  height: 600',
        'fonts:',
        '  - family: Sans',
        '    style: Regular',
        '    path: fonts/sans.otf',
        'defaults:',
        '  font_size: 20pt',
        '  ratio: 2',
      ].join('\n'),
      '/base'
    );
    expect(config).toEqual({
      canvas: { width: 800, height: 600 },
      fonts: [{ family: 'Sans', style: 'Regular', path: 'fonts/sans.otf' }],
      defaults: { font_size: '20pt', ratio: '2' },
      baseDir: '/base',
    });
  });

  it('fills in a missing canvas dimension', () => {
    expect(parseConfig('canvas:\n  width: 800', '/base').canvas).toEqual({
      width: 800,
      height: 1080,
    });
  });

  it('rejects a non-positive canvas size', () => {
    expect(() => parseConfig('canvas:\n  width: -1', '/base')).toThrow(
      'Invalid configuration: canvas.width must be a positive number'
    );
  });

  it('rejects unknown keys', () => {
    expect(() => parseConfig('colour: red', '/base')).toThrow(
      'Invalid configuration: unknown key "colour"'
    );
  });

  it('rejects incomplete fonts', () => {
    expect(() => parseConfig('fonts:\n  - family: Sans', '/base')).toThrow(
      'Invalid configuration: fonts[0].style must be a non-empty string'
    );
  });

  it('rejects defaults that are not identifiers', () => {
    expect(() => parseConfig('defaults:\n  1x: 2', '/base')).toThrow(
      'Invalid configuration: defaults key "1x" is not an identifier'
    );
  });

  it('rejects a document that is not a mapping', () => {
    expect(() => parseConfig('- a', '/base')).toThrow(
      'Invalid configuration: must be an object'
    );
  });

  it('rejects malformed YAML', () => {
    expect(() => parseConfig('a: [', '/base')).toThrow(
      'Invalid configuration: invalid YAML'
    );
  });
});

describe('loadConfig', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tessel-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('uses the defaults without a configuration file', () => {
    expect(loadConfig(tmpDir)).toEqual({
      canvas: DEFAULT_CANVAS,
      fonts: [],
      defaults: {},
      baseDir: tmpDir,
    });
  });

  it('reads tessel.yaml from the working directory', async () => {
    await fs.writeFile(
      path.join(tmpDir, 'tessel.yaml'),
      'canvas:\n  width: 640\n  height: 480\n'
    );
    expect(loadConfig(tmpDir).canvas).toEqual({ width: 640, height: 480 });
  });

  it('resolves an explicit path and takes its directory as base', async () => {
    await fs.mkdir(path.join(tmpDir, 'conf'));
    await fs.writeFile(path.join(tmpDir, 'conf', 'slides.yaml'), 'defaults:\n  x: 1pt\n');
    const config = loadConfig(tmpDir, 'conf/slides.yaml');
    expect(config.defaults).toEqual({ x: '1pt' });
    expect(config.baseDir).toBe(path.join(tmpDir, 'conf'));
  });

  it('requires an explicit file to exist', () => {
    expect(() => loadConfig(tmpDir, 'other.yaml')).toThrow(
      'Invalid configuration: file not found: other.yaml'
    );
  });
});

describe('configToRuntimeOptions', () => {
  it('carries canvas and defaults and creates file-backed resources', () => {
    const options = configToRuntimeOptions(
      parseConfig('canvas:\n  width: 800\n  height: 600\ndefaults:\n  a: 1', '/base'),
      '/docs'
    );
    expect(options.canvas).toEqual({ width: 800, height: 600 });
    expect(options.defaults).toEqual({ a: '1' });
    expect(options.resources?.fonts).toBeInstanceOf(OpentypeFontMap);
    expect(options.resources?.images).toBeInstanceOf(SvgImageLoader);
  });
});
