export interface CorpusRecord {
  content: string;
  url: string;
  section: string;
}

export interface ChunkMetadata {
  url: string;
  section: string;
  contentLength: number;
  originalContent: string;
  sourceIndex: number;
}

export interface Neighbor {
  ordinal: number;
  distance: number;
}

export interface SearchResult extends ChunkMetadata {
  ordinal: number;
  text: string;
  relevanceScore: number;
  distance: number;
}

export interface CorpusStats {
  recordsSeen: number;
  recordsSkipped: number;
  recordsFailed: number;
  chunkCount: number;
  avgChunkLength: number;
}
