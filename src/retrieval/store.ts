import fs from 'node:fs';
import path from 'node:path';
import { createHash } from 'node:crypto';
import { ArtifactMismatchError, ArtifactMissingError } from '../errors.js';
import { ChunkMetadata } from '../types.js';
import { FlatL2Index } from './vector-index.js';

export const CHUNKS_FILE = 'chunks.json';
export const METADATA_FILE = 'metadata.json';
export const INDEX_FILE = 'index.bin';

export interface CorpusSnapshot {
  buildId: string;
  modelId: string;
  chunks: readonly string[];
  metadata: readonly ChunkMetadata[];
  index: FlatL2Index;
}

interface ChunkStoreFile {
  buildId: string;
  modelId: string;
  chunks: string[];
  metadata: ChunkMetadata[];
  totalChunks: number;
}

interface MetadataFile {
  buildId: string;
  metadata: ChunkMetadata[];
}

export function artifactPaths(dir: string): { chunks: string; metadata: string; index: string } {
  return {
    chunks: path.join(dir, CHUNKS_FILE),
    metadata: path.join(dir, METADATA_FILE),
    index: path.join(dir, INDEX_FILE)
  };
}

export function artifactsExist(dir: string): boolean {
  return Object.values(artifactPaths(dir)).every((p) => fs.existsSync(p));
}

export function computeBuildId(modelId: string, chunks: readonly string[], metadata: readonly ChunkMetadata[]): string {
  return createHash('sha256')
    .update(modelId)
    .update('\0')
    .update(JSON.stringify(chunks))
    .update('\0')
    .update(JSON.stringify(metadata))
    .digest('hex')
    .slice(0, 16);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function isChunkMetadata(m: unknown): m is ChunkMetadata {
  return (
    isObject(m) &&
    typeof m.url === 'string' &&
    typeof m.section === 'string' &&
    typeof m.contentLength === 'number' &&
    typeof m.originalContent === 'string' &&
    typeof m.sourceIndex === 'number'
  );
}

function readJson(file: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    throw new ArtifactMismatchError(`${path.basename(file)} is not valid JSON`, { cause: error });
  }
  if (!isObject(parsed)) {
    throw new ArtifactMismatchError(`${path.basename(file)} is not a JSON object`);
  }
  return parsed;
}

function parseChunkStore(file: string): ChunkStoreFile {
  const raw = readJson(file);
  const { buildId, modelId, chunks, metadata, totalChunks } = raw;
  if (
    typeof buildId !== 'string' ||
    typeof modelId !== 'string' ||
    !Array.isArray(chunks) ||
    !chunks.every((c): c is string => typeof c === 'string') ||
    !Array.isArray(metadata) ||
    !metadata.every(isChunkMetadata) ||
    typeof totalChunks !== 'number'
  ) {
    throw new ArtifactMismatchError(`${CHUNKS_FILE} is malformed`);
  }
  return { buildId, modelId, chunks, metadata, totalChunks };
}

function parseMetadataFile(file: string): MetadataFile {
  const { buildId, metadata } = readJson(file);
  if (typeof buildId !== 'string' || !Array.isArray(metadata) || !metadata.every(isChunkMetadata)) {
    throw new ArtifactMismatchError(`${METADATA_FILE} is malformed`);
  }
  return { buildId, metadata };
}

export function saveArtifacts(dir: string, snapshot: CorpusSnapshot): void {
  if (snapshot.chunks.length !== snapshot.metadata.length || snapshot.chunks.length !== snapshot.index.size) {
    throw new ArtifactMismatchError(
      `Refusing to save misaligned artifacts: ${snapshot.chunks.length} chunks, ${snapshot.metadata.length} metadata, ${snapshot.index.size} vectors`
    );
  }
  fs.mkdirSync(dir, { recursive: true });
  const paths = artifactPaths(dir);
  const store: ChunkStoreFile = {
    buildId: snapshot.buildId,
    modelId: snapshot.modelId,
    chunks: [...snapshot.chunks],
    metadata: [...snapshot.metadata],
    totalChunks: snapshot.chunks.length
  };
  const meta: MetadataFile = { buildId: snapshot.buildId, metadata: [...snapshot.metadata] };

  // temp files first, then rename over the previous build
  const writes: Array<[string, string | Buffer]> = [
    [paths.chunks, JSON.stringify(store, null, 2)],
    [paths.metadata, JSON.stringify(meta, null, 2)],
    [paths.index, snapshot.index.serialize(snapshot.buildId)]
  ];
  for (const [target, contents] of writes) fs.writeFileSync(`${target}.tmp`, contents);
  for (const [target] of writes) fs.renameSync(`${target}.tmp`, target);
}

/** Loads the chunk store, metadata table and index, refusing any set that was not produced by one build. */
export function loadArtifacts(dir: string, expectedModelId?: string): CorpusSnapshot {
  const paths = artifactPaths(dir);
  for (const p of Object.values(paths)) {
    if (!fs.existsSync(p)) throw new ArtifactMissingError(p);
  }

  const store = parseChunkStore(paths.chunks);
  const meta = parseMetadataFile(paths.metadata);
  const { index, buildId: indexBuildId } = FlatL2Index.deserialize(fs.readFileSync(paths.index));

  if (store.buildId !== meta.buildId || store.buildId !== indexBuildId) {
    throw new ArtifactMismatchError(
      `Artifacts come from different builds (chunks ${store.buildId}, metadata ${meta.buildId}, index ${indexBuildId})`
    );
  }
  if (store.chunks.length !== meta.metadata.length || store.chunks.length !== index.size || store.totalChunks !== store.chunks.length) {
    throw new ArtifactMismatchError(
      `Artifact sizes disagree: ${store.chunks.length} chunks, ${meta.metadata.length} metadata, ${index.size} vectors`
    );
  }
  if (expectedModelId && store.modelId !== expectedModelId) {
    throw new ArtifactMismatchError(`Index was built with ${store.modelId} but the active encoder is ${expectedModelId}`);
  }

  return { buildId: store.buildId, modelId: store.modelId, chunks: store.chunks, metadata: meta.metadata, index };
}
