import type { SearchResult } from '../../interfaces/search-result.interface.js';

export interface MergedSearchResult extends SearchResult {
  /** Number of result lists the chunk appeared in */
  hitCount: number;
}

/**
 * Merge result lists from several queries by chunkId. A chunk keeps its best
 * score; chunks found by more queries rank first, then higher scores.
 * @param resultSets - One result list per query
 * @param limit - Maximum number of merged results
 */
export function mergeSearchResults(resultSets: SearchResult[][], limit?: number): MergedSearchResult[] {
  const merged = new Map<string, MergedSearchResult>();

  for (const results of resultSets) {
    const seen = new Set<string>();
    for (const result of results) {
      if (seen.has(result.chunkId)) continue;
      seen.add(result.chunkId);

      const existing = merged.get(result.chunkId);
      if (!existing) {
        merged.set(result.chunkId, { ...result, hitCount: 1 });
      } else {
        existing.hitCount++;
        if (result.score > existing.score) {
          merged.set(result.chunkId, { ...result, hitCount: existing.hitCount });
        }
      }
    }
  }

  const ranked = [...merged.values()].sort((a, b) => b.hitCount - a.hitCount || b.score - a.score);
  return limit === undefined ? ranked : ranked.slice(0, limit);
}
