import { IndexNotBuiltError, SearchExecutionError } from '../errors.js';
import { SearchResult } from '../types.js';
import { collapseWhitespace } from '../utils/chunking.js';
import { QueryAnchor } from './anchoring.js';
import { Encoder } from './embeddings.js';
import { rankResults } from './ranking.js';
import { CorpusSnapshot } from './store.js';

export type SearchOutcome =
  | { status: 'ok'; results: SearchResult[] }
  | { status: 'empty'; results: [] }
  | { status: 'failed'; results: []; error: SearchExecutionError };

export interface RetrieverOptions {
  encoder: Encoder;
  anchor: QueryAnchor;
  snapshot?: CorpusSnapshot | null;
}

/**
 * Serves similarity queries against one corpus snapshot. The snapshot is
 * replaced as a unit by `swap`, so a query never sees chunks, metadata and
 * vectors from different builds.
 */
export class Retriever {
  private snapshot: CorpusSnapshot | null;
  private readonly encoder: Encoder;
  private readonly anchor: QueryAnchor;

  constructor(options: RetrieverOptions) {
    this.encoder = options.encoder;
    this.anchor = options.anchor;
    this.snapshot = options.snapshot ?? null;
  }

  get current(): CorpusSnapshot | null {
    return this.snapshot;
  }

  swap(next: CorpusSnapshot): void {
    this.snapshot = next;
  }

  prepareQuery(query: string, anchor: QueryAnchor = this.anchor): string {
    return anchor.anchor(collapseWhitespace(query));
  }

  async searchDetailed(query: string, k = 5, anchor?: QueryAnchor): Promise<SearchOutcome> {
    const snapshot = this.snapshot;
    try {
      if (!snapshot || !snapshot.index.isBuilt) throw new IndexNotBuiltError();
      if (snapshot.chunks.length === 0 || snapshot.metadata.length === 0 || k <= 0) {
        return { status: 'empty', results: [] };
      }

      const text = this.prepareQuery(query, anchor);
      const [vector] = await this.encoder.encode([text]);
      if (!vector) throw new Error('Encoder returned no vector for the query');

      const neighbors = snapshot.index.search(vector, Math.min(k * 2, snapshot.chunks.length));
      const results = rankResults(neighbors, snapshot.chunks, snapshot.metadata, k);
      return results.length > 0 ? { status: 'ok', results } : { status: 'empty', results: [] };
    } catch (error) {
      return { status: 'failed', results: [], error: new SearchExecutionError(error) };
    }
  }

  async search(query: string, k = 5, anchor?: QueryAnchor): Promise<SearchResult[]> {
    const outcome = await this.searchDetailed(query, k, anchor);
    if (outcome.status === 'failed') {
      console.warn(`[retriever] ${outcome.error.message}`);
    }
    return outcome.results;
  }
}
