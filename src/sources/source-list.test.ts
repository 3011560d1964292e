import { describe, expect, it } from 'vitest';
import { getDefaults } from '../config/config-defaults.js';
import { NoSourcesError } from '../errors/custom-errors.js';
import { buildSourceList, createSourceRequest } from './source-list.js';

describe('buildSourceList', () => {
  const configured = ['https://example.com/c1', 'https://example.com/c2'];

  it('should use command arguments and ignore configured urls', () => {
    expect(buildSourceList(['https://example.com/a', 'https://example.com/b'], configured)).toEqual([
      'https://example.com/a',
      'https://example.com/b',
    ]);
  });

  it('should fall back to configured urls in order', () => {
    expect(buildSourceList([], configured)).toEqual(configured);
  });

  it('should ignore blank arguments', () => {
    expect(buildSourceList(['  '], configured)).toEqual(configured);
  });

  it('should throw NoSourcesError when both are empty', () => {
    expect(() => buildSourceList([], [])).toThrow(NoSourcesError);
  });

  it('should not fall back to configured urls when albums are searched for', () => {
    expect(buildSourceList([], configured, true)).toEqual([]);
    expect(buildSourceList(['https://example.com/a'], configured, true)).toEqual(['https://example.com/a']);
  });
});

describe('createSourceRequest', () => {
  it('should freeze the request and its configuration', () => {
    const request = createSourceRequest('https://example.com/a', getDefaults({ BEETSDIR: '/opt/beets' }));

    expect(request.url).toBe('https://example.com/a');
    expect(Object.isFrozen(request)).toBe(true);
    expect(Object.isFrozen(request.config)).toBe(true);
  });
});
