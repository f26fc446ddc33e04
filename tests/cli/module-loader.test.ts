/**
 * Module Loader Tests
 *
 * Tests for cli-module-loader.ts: path resolution, caching and circular
 * import detection.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createModuleImporter } from '../../src/cli-module-loader.js';
import { num, type BuiltinFn } from '../../src/index.js';
import { run, runError, valueOf } from '../helpers/runtime.js';

describe('createModuleImporter', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tessel-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function writeModule(name: string, content: string): Promise<void> {
    const file = path.join(tmpDir, name);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, content);
  }

  it('resolves dotted paths to nested files', async () => {
    await writeModule('theme/dark.tsl', 'accent = #ff0000\nsize = 2em');
    const importer = createModuleImporter(tmpDir);
    expect(
      valueOf('import theme.dark\nx = accent', 'x', { importer })
    ).toEqual({ kind: 'color', color: { r: 1, g: 0, b: 0 } });
    expect(valueOf('import theme.dark\nx = size', 'x', { importer })).toEqual({
      kind: 'number',
      value: 80,
      dim: 1,
    });
  });

  it('evaluates each module once', async () => {
    await writeModule('lib.tsl', 'n = tick()');
    let calls = 0;
    const tick: BuiltinFn = () => num(++calls);
    const { scope, slides } = run(
      'import lib\nx = n\n{ import lib  put line((1pt, 1pt)) }',
      { importer: createModuleImporter(tmpDir), functions: { tick } }
    );
    expect(calls).toBe(1);
    expect(scope.lookup('x')).toEqual(num(1));
    expect(slides).toHaveLength(1);
  });

  it('discards the slides of a module', async () => {
    await writeModule('deck.tsl', 'title = "A"\n{ put line((1pt, 1pt)) }');
    const { slides } = run('import deck', {
      importer: createModuleImporter(tmpDir),
    });
    expect(slides).toEqual([]);
  });

  it('reports missing modules', () => {
    const err = runError('import nope', {
      importer: createModuleImporter(tmpDir),
    });
    expect(err.errorId).toBe('TSL-R012');
    expect(err.message).toBe(
      "Cannot import 'nope': module file 'nope.tsl' not found."
    );
    expect(err.range).toEqual({ start: 0, end: 11 });
  });

  it('detects circular imports', async () => {
    await writeModule('a.tsl', 'import b\nx = 1');
    await writeModule('b.tsl', 'import a\ny = 2');
    const err = runError('import a', { importer: createModuleImporter(tmpDir) });
    expect(err.errorId).toBe('TSL-R012');
    expect(err.message).toBe(
      "Cannot import 'a': circular import (a.tsl -> b.tsl -> a.tsl)."
    );
    expect(err.range).toEqual({ start: 0, end: 8 });
  });

  it('locates errors inside a module in that module', async () => {
    await writeModule('bad.tsl', '// broken\nx = y');
    const err = runError('import bad', {
      importer: createModuleImporter(tmpDir),
    });
    expect(err.message).toBe(
      "Cannot import 'bad': 'y' is not defined. (TSL-R003 at bad.tsl:2:5)"
    );
    expect(err.range).toEqual({ start: 0, end: 10 });
  });

  it('reports syntax errors inside a module', async () => {
    await writeModule('syntax.tsl', 'x = ');
    const err = runError('import syntax', {
      importer: createModuleImporter(tmpDir),
    });
    expect(err.message).toBe(
      "Cannot import 'syntax': Unexpected end of input, expected term. (TSL-P002 at syntax.tsl:1:5)"
    );
  });
});
