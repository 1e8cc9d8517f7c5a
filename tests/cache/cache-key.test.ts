import { identityCacheKey, normalizeCacheKey } from '../../src/cache/cache-key';

describe('normalizeCacheKey', () => {
  test('case, whitespace and term order do not matter', () => {
    expect(normalizeCacheKey('search', 'Python  Pandas', { limit: 8 })).toBe('search:pandas python|limit=8');
    expect(normalizeCacheKey('Search', ' pandas python ', { limit: 8 })).toBe('search:pandas python|limit=8');
  });

  test('duplicate terms collapse and arrays are flattened', () => {
    expect(normalizeCacheKey('search', ['b a', 'A'])).toBe('search:a b');
  });

  test('params are sorted by name and undefined ones omitted', () => {
    expect(normalizeCacheKey('search', 'q', { z: 1, a: 'X', m: undefined })).toBe('search:q|a=X&z=1');
    expect(normalizeCacheKey('search', 'q', { m: undefined })).toBe('search:q');
  });

  test('different params produce different keys', () => {
    expect(normalizeCacheKey('search', 'q', { limit: 8 })).not.toBe(normalizeCacheKey('search', 'q', { limit: 9 }));
  });
});

describe('identityCacheKey', () => {
  test('ids are de-duplicated and sorted but keep their case', () => {
    expect(identityCacheKey('Details', ['b', 'a', 'b', ' '])).toBe('details:a,b');
    expect(identityCacheKey('details', ['a', 'B'])).toBe('details:B,a');
  });
});
