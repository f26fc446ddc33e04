/**
 * OpenType Font Map Tests
 */

import { describe, expect, it } from 'vitest';
import { OpentypeFontMap } from '../../src/index.js';
import { catchRuntimeError } from '../helpers/runtime.js';

describe('OpentypeFontMap', () => {
  it('knows no fonts by default', () => {
    expect(new OpentypeFontMap().get('Sans', 'Regular')).toBeUndefined();
  });

  it('resolves only registered family and style pairs', () => {
    const fonts = new OpentypeFontMap(
      [{ family: 'Sans', style: 'Bold', path: 'sans-bold.otf' }],
      '/nonexistent'
    );
    expect(fonts.get('Sans', 'Regular')).toBeUndefined();
  });

  it('reports a font file that cannot be loaded', () => {
    const fonts = new OpentypeFontMap(
      [{ family: 'Sans', style: 'Regular', path: 'missing.otf' }],
      '/nonexistent'
    );
    const err = catchRuntimeError(() => fonts.get('Sans', 'Regular'));
    expect(err.errorId).toBe('TSL-R007');
    expect(err.message).toBe("File 'missing.otf' could not be loaded.");
    expect(err.context).toMatchObject({ path: 'missing.otf' });
  });
});
