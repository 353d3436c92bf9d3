import { LRUCache } from "lru-cache";

export type PatternCache = LRUCache<string, RegExp>;

export function makePatternCache(max = 1_000): PatternCache {
  return new LRUCache<string, RegExp>({ max });
}

const shared = makePatternCache();

/**
 * Compiles a pattern anchored at both ends, so that `test` only succeeds when
 * the entire input matches. Throws a SyntaxError for an invalid pattern.
 */
export function compileFullMatch(pattern: string, cache: PatternCache = shared): RegExp {
  const hit = cache.get(pattern);
  if (hit) return hit;
  const re = new RegExp(`^(?:${pattern})$`);
  cache.set(pattern, re);
  return re;
}
