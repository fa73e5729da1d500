import { describe, expect, it } from 'vitest';

import { normalizeCategory } from './category.js';

describe('normalizeCategory', () => {
  it('lowercases, trims and hyphenates', () => {
    expect(normalizeCategory('  Twitter Analytics ')).toBe('twitter-analytics');
  });

  it('maps spaced and hyphenated forms to the same value', () => {
    const variants = ['Content Ideas', 'content-ideas', '  CONTENT IDEAS', 'Content-Ideas  '];
    expect(new Set(variants.map(normalizeCategory))).toEqual(new Set(['content-ideas']));
  });

  it('replaces every interior space individually', () => {
    expect(normalizeCategory('a  b')).toBe('a--b');
  });

  it('returns an empty string for whitespace-only input', () => {
    expect(normalizeCategory('   ')).toBe('');
  });
});
