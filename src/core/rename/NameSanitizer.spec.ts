import { describe, expect, it } from 'vitest';
import {
  collapseHyphens,
  joinNameAndExtension,
  replaceSeparators,
  sanitizeName,
  splitNameAndExtension,
  stripEdgeHyphens,
  toLowercase
} from './NameSanitizer.js';

describe('sanitizer steps', () => {
  it('lowercases', () => {
    expect(toLowercase('HeLLo')).toBe('hello');
  });

  it('replaces spaces and underscores', () => {
    expect(replaceSeparators('hello world_again')).toBe('hello-world-again');
  });

  it('collapses hyphen runs', () => {
    expect(collapseHyphens('a---b--c-d')).toBe('a-b-c-d');
  });

  it('strips edge hyphens', () => {
    expect(stripEdgeHyphens('--a-b--')).toBe('a-b');
  });
});

describe('sanitizeName', () => {
  it('collapses mixed separators', () => {
    expect(sanitizeName('__My  File__Name__')).toBe('my-file-name');
  });

  it('leaves other characters alone', () => {
    expect(sanitizeName('Report (Final) v2.0!')).toBe('report-(final)-v2.0!');
  });

  it('lowercases unicode letters without other normalization', () => {
    expect(sanitizeName('Café Menü')).toBe('café-menü');
  });

  it('maps empty input to empty output', () => {
    expect(sanitizeName('')).toBe('');
    expect(sanitizeName(' _ - ')).toBe('');
  });

  it.each(['__My  File__Name__', 'Already-Fine', ' -_ x _- ', 'a.b c', ''])(
    'is idempotent for %j',
    (input) => {
      const once = sanitizeName(input);
      expect(sanitizeName(once)).toBe(once);
    }
  );
});

describe('splitNameAndExtension', () => {
  it('splits on the last dot', () => {
    expect(splitNameAndExtension('archive.tar.GZ')).toEqual({ stem: 'archive.tar', ext: '.GZ' });
  });

  it('treats a leading dot as part of the stem', () => {
    expect(splitNameAndExtension('.bashrc')).toEqual({ stem: '.bashrc', ext: '' });
  });

  it('handles names without extension', () => {
    expect(splitNameAndExtension('README')).toEqual({ stem: 'README', ext: '' });
  });
});

describe('joinNameAndExtension', () => {
  it('adds a missing dot', () => {
    expect(joinNameAndExtension('file', 'txt')).toBe('file.txt');
    expect(joinNameAndExtension('file', '.txt')).toBe('file.txt');
  });

  it('returns the bare stem for an empty extension', () => {
    expect(joinNameAndExtension('file', '')).toBe('file');
  });
});
