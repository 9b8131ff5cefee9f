import { Encoder } from '../src/retrieval/embeddings.js';
import { CorpusSnapshot } from '../src/retrieval/store.js';
import { FlatL2Index } from '../src/retrieval/vector-index.js';
import { ChunkMetadata } from '../src/types.js';

/** Encoder stub that records its inputs and returns a fixed vector per text. */
export class RecordingEncoder implements Encoder {
  readonly modelId = 'test-encoder';
  readonly calls: string[][] = [];

  constructor(
    readonly dimensions = 2,
    private readonly vectorFor: (text: string) => number[] = () => new Array<number>(dimensions).fill(0)
  ) {}

  async encode(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map((t) => this.vectorFor(t));
  }
}

export function metadataFor(text: string, sourceIndex: number): ChunkMetadata {
  return {
    url: `https://example.edu/${sourceIndex}`,
    section: `Section ${sourceIndex}`,
    contentLength: text.length,
    originalContent: text,
    sourceIndex
  };
}

export function makeSnapshot(chunks: string[], vectors: number[][], buildId = 'test-build', dimension = 2): CorpusSnapshot {
  return {
    buildId,
    modelId: 'test-encoder',
    chunks,
    metadata: chunks.map((c, i) => metadataFor(c, i)),
    index: new FlatL2Index().build(vectors, dimension)
  };
}
