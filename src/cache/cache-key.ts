/**
 * Cache key normalization.
 *
 * Semantically identical lookups must share one key: terms are case
 * folded, whitespace is collapsed, duplicates are dropped and terms are
 * sorted, so "Python  Pandas" and "pandas python" hit the same entry.
 */

export type CacheKeyParams = Record<string, string | number | boolean | undefined>;

function terms(query: string | string[]): string[] {
  const raw = Array.isArray(query) ? query : [query];
  const out = new Set<string>();
  for (const part of raw) {
    for (const term of part.toLowerCase().split(/\s+/)) {
      if (term) out.add(term);
    }
  }
  return [...out].sort();
}

/**
 * Build `<resourceType>:<sorted terms>[|k=v&k=v]`. Param names are sorted;
 * undefined params are omitted. Param values keep their case.
 */
export function normalizeCacheKey(
  resourceType: string,
  query: string | string[],
  params?: CacheKeyParams,
): string {
  const base = `${resourceType.trim().toLowerCase()}:${terms(query).join(' ')}`;
  if (!params) return base;
  const pairs = Object.keys(params)
    .sort()
    .flatMap((name) => {
      const value = params[name];
      return value === undefined ? [] : [`${name}=${String(value).trim()}`];
    });
  return pairs.length > 0 ? `${base}|${pairs.join('&')}` : base;
}

/**
 * Key for a lookup by opaque identifiers. Ids are case-sensitive, so they
 * are only de-duplicated and sorted.
 */
export function identityCacheKey(resourceType: string, ids: string[]): string {
  const unique = [...new Set(ids.map((id) => id.trim()).filter((id) => id.length > 0))].sort();
  return `${resourceType.trim().toLowerCase()}:${unique.join(',')}`;
}
