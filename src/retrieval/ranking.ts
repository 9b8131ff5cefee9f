import { ChunkMetadata, Neighbor, SearchResult } from '../types.js';

export function relevanceFromDistance(distance: number): number {
  return 1 / (1 + distance);
}

/**
 * Joins index neighbours with their chunk text and metadata, drops ordinals
 * that fall outside either sequence, then orders by relevance (stable) and
 * keeps the first `k`.
 */
export function rankResults(neighbors: Neighbor[], chunks: readonly string[], metadata: readonly ChunkMetadata[], k: number): SearchResult[] {
  const results: SearchResult[] = [];
  for (const { ordinal, distance } of neighbors) {
    if (ordinal < 0 || ordinal >= chunks.length || ordinal >= metadata.length) continue;
    results.push({
      ordinal,
      text: chunks[ordinal],
      relevanceScore: relevanceFromDistance(distance),
      distance,
      ...metadata[ordinal]
    });
  }
  return results.sort((a, b) => b.relevanceScore - a.relevanceScore).slice(0, Math.max(0, k));
}

/** Context handed to the answer generator: the relevant results, or the first few raw ones when none qualify. */
export function selectContext(results: SearchResult[], threshold = 0.3, fallbackCount = 3): SearchResult[] {
  const relevant = results.filter((r) => r.relevanceScore > threshold);
  return relevant.length > 0 ? relevant : results.slice(0, fallbackCount);
}
