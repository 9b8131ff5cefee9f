import { KBConfig } from '../config.js';
import { EncodingError, errorMessage } from '../errors.js';

export interface Encoder {
  readonly modelId: string;
  readonly dimensions: number;
  encode(texts: string[]): Promise<number[][]>;
}

function hashToken(token: string): number {
  let hash = 2166136261;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}

function normalize(v: number[]): number[] {
  const norm = Math.sqrt(v.reduce((acc, x) => acc + x * x, 0));
  if (!norm) return v;
  return v.map((x) => x / norm);
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean);
}

/** Feature-hashed bag of words. Runs offline; no model download. */
export class HashingEncoder implements Encoder {
  readonly modelId: string;

  constructor(readonly dimensions = 384) {
    this.modelId = `local-hash-${dimensions}`;
  }

  embedOne(text: string): number[] {
    const vec = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      vec[hashToken(token) % this.dimensions] += 1;
    }
    return normalize(vec);
  }

  async encode(texts: string[]): Promise<number[][]> {
    return texts.map((t) => this.embedOne(t));
  }
}

interface EmbeddingResponse {
  data: Array<{ index: number; embedding: number[] }>;
}

function isEmbeddingResponse(value: unknown): value is EmbeddingResponse {
  if (!value || typeof value !== 'object' || !('data' in value)) return false;
  return Array.isArray(value.data);
}

export class OpenAIEncoder implements Encoder {
  readonly modelId: string;

  constructor(
    private readonly apiKey: string,
    private readonly model: string,
    readonly dimensions: number,
    private readonly batchSize = 64,
    private readonly baseUrl = 'https://api.openai.com/v1'
  ) {
    this.modelId = `openai:${model}:${dimensions}`;
  }

  private async embedBatch(input: string[]): Promise<number[][]> {
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/embeddings`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify({ model: this.model, input, dimensions: this.dimensions })
      });
    } catch (error) {
      throw new EncodingError(`Embedding request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!res.ok) {
      throw new EncodingError(`Embedding request failed with status ${res.status}`);
    }

    const json: unknown = await res.json();
    if (!isEmbeddingResponse(json) || json.data.length !== input.length) {
      throw new EncodingError('Embedding response did not contain one vector per input');
    }

    const ordered = [...json.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
    for (const vec of ordered) {
      if (vec.length !== this.dimensions) {
        throw new EncodingError(`Embedding dimension ${vec.length} does not match configured ${this.dimensions}`);
      }
    }
    return ordered;
  }

  async encode(texts: string[]): Promise<number[][]> {
    const out: number[][] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      out.push(...(await this.embedBatch(texts.slice(i, i + this.batchSize))));
    }
    return out;
  }
}

export function createEncoder(config: KBConfig): Encoder {
  if (config.openaiApiKey) {
    return new OpenAIEncoder(config.openaiApiKey, config.openaiEmbeddingModel, config.embeddingDims, config.embeddingBatchSize);
  }
  return new HashingEncoder(config.embeddingDims);
}
