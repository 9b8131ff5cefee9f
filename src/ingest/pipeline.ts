import { DBContext } from '../db/client.js';
import { KBConfig } from '../config.js';
import { RecordProcessingError, errorMessage } from '../errors.js';
import { ChunkMetadata, CorpusStats } from '../types.js';
import { assertChunkingParams, chunkText, normalizeText } from '../utils/chunking.js';
import { Encoder } from '../retrieval/embeddings.js';
import { FlatL2Index } from '../retrieval/vector-index.js';
import { CorpusSnapshot, computeBuildId, saveArtifacts } from '../retrieval/store.js';
import { logIngestEvent, recordJobMetric } from '../observability.js';
import { RecordDefaults, coerceRecord, loadRecordEntries } from './loader.js';
import { buildCorpusSummary } from './summary.js';

export interface CorpusOptions extends RecordDefaults {
  chunkSize?: number;
  overlap?: number;
  minContentChars?: number;
  previewChars?: number;
  onRecordError?: (error: RecordProcessingError) => void;
}

export interface Corpus {
  chunks: string[];
  metadata: ChunkMetadata[];
  stats: CorpusStats;
}

function preview(content: string, maxChars: number): string {
  return content.length > maxChars ? `${content.slice(0, maxChars)}...` : content;
}

/**
 * Normalizes and chunks every entry, appending chunk text and metadata in
 * lockstep so position i of both arrays describes the same chunk. A bad entry
 * is reported through `onRecordError` and skipped.
 */
export function buildCorpus(entries: readonly unknown[], options: CorpusOptions): Corpus {
  const chunkSize = options.chunkSize ?? 600;
  const overlap = options.overlap ?? 150;
  const minContentChars = options.minContentChars ?? 30;
  const previewChars = options.previewChars ?? 150;
  const onRecordError = options.onRecordError ?? ((e: RecordProcessingError) => console.warn(`[build] ${e.message}`));
  assertChunkingParams(chunkSize, overlap);

  const chunks: string[] = [];
  const metadata: ChunkMetadata[] = [];
  const stats: CorpusStats = { recordsSeen: entries.length, recordsSkipped: 0, recordsFailed: 0, chunkCount: 0, avgChunkLength: 0 };

  entries.forEach((entry, sourceIndex) => {
    let produced: Array<{ text: string; meta: ChunkMetadata }>;
    try {
      const record = coerceRecord(entry, options);
      const content = normalizeText(record.content);
      if (content.length < minContentChars) {
        stats.recordsSkipped++;
        return;
      }
      const originalContent = preview(content, previewChars);
      produced = chunkText(content, chunkSize, overlap).map((text) => ({
        text,
        meta: { url: record.url, section: record.section, contentLength: text.length, originalContent, sourceIndex }
      }));
    } catch (error) {
      stats.recordsFailed++;
      onRecordError(new RecordProcessingError(sourceIndex, error));
      return;
    }

    for (const { text, meta } of produced) {
      chunks.push(text);
      metadata.push(meta);
    }
  });

  stats.chunkCount = chunks.length;
  stats.avgChunkLength = chunks.length ? chunks.reduce((sum, c) => sum + c.length, 0) / chunks.length : 0;
  return { chunks, metadata, stats };
}

export interface BuildOptions {
  config: KBConfig;
  encoder: Encoder;
  dataDir?: string;
  vectorstoreDir?: string;
}

export interface BuildReport {
  jobId: number;
  buildId: string;
  stats: CorpusStats;
  summary: string;
  snapshot: CorpusSnapshot;
}

/** Offline build: loader → chunker → encoder → index → artifacts, tracked as one job. */
export async function runBuild(ctx: DBContext, options: BuildOptions): Promise<BuildReport> {
  const { db } = ctx;
  const { config, encoder } = options;
  const dataDir = options.dataDir ?? config.dataDir;
  const vectorstoreDir = options.vectorstoreDir ?? config.vectorstoreDir;

  const job = db
    .prepare('INSERT INTO jobs (job_type, status, payload_json) VALUES (?, ?, ?)')
    .run('build', 'running', JSON.stringify({ dataDir, vectorstoreDir, modelId: encoder.modelId }));
  const jobId = Number(job.lastInsertRowid);
  const started = Date.now();

  try {
    logIngestEvent(ctx, { jobId, eventType: 'job_started', event: { dataDir } });

    const loaded = loadRecordEntries(dataDir, config, (message) => {
      console.warn(`[build] ${message}`);
      logIngestEvent(ctx, { jobId, level: 'warn', eventType: 'file_skipped', event: { message } });
    });
    recordJobMetric(ctx, { jobId, metricName: 'records_loaded', metricValue: loaded.entries.length, labels: { files: loaded.filesRead } });
    if (loaded.entries.length === 0) {
      throw new Error(`No records found in ${dataDir}; add JSON or HTML files before building.`);
    }

    const corpus = buildCorpus(loaded.entries, {
      defaultUrl: config.defaultUrl,
      defaultSection: config.defaultSection,
      chunkSize: config.chunkSize,
      overlap: config.chunkOverlap,
      minContentChars: config.minContentChars,
      previewChars: config.previewChars,
      onRecordError: (error) => {
        console.warn(`[build] ${error.message}`);
        logIngestEvent(ctx, { jobId, sourceIndex: error.sourceIndex, level: 'warn', eventType: 'record_failed', event: { message: error.message } });
      }
    });
    if (corpus.chunks.length === 0) {
      throw new Error('No chunks created; refusing to write an empty index. Check the data quality.');
    }

    const vectors = await encoder.encode(corpus.chunks);
    const index = new FlatL2Index().build(vectors, encoder.dimensions);
    const buildId = computeBuildId(encoder.modelId, corpus.chunks, corpus.metadata);
    const snapshot: CorpusSnapshot = { buildId, modelId: encoder.modelId, chunks: corpus.chunks, metadata: corpus.metadata, index };

    saveArtifacts(vectorstoreDir, snapshot);
    logIngestEvent(ctx, { jobId, eventType: 'artifacts_written', event: { buildId, vectorstoreDir, vectors: index.size, dimension: index.dimension } });

    db.prepare(
      `INSERT INTO builds (build_id, job_id, model_id, record_count, chunk_count, avg_chunk_length, vectorstore_dir, records_failed)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    ).run(buildId, jobId, encoder.modelId, corpus.stats.recordsSeen, corpus.stats.chunkCount, corpus.stats.avgChunkLength, vectorstoreDir, corpus.stats.recordsFailed);

    recordJobMetric(ctx, { jobId, metricName: 'chunks_created', metricValue: corpus.stats.chunkCount });
    recordJobMetric(ctx, { jobId, metricName: 'avg_chunk_length', metricValue: corpus.stats.avgChunkLength });
    recordJobMetric(ctx, { jobId, metricName: 'build_ms', metricValue: Date.now() - started });
    db.prepare('UPDATE jobs SET status = ?, updated_at = CURRENT_TIMESTAMP WHERE id = ?').run('done', jobId);
    logIngestEvent(ctx, { jobId, eventType: 'job_completed', event: { buildId } });

    return {
      jobId,
      buildId,
      stats: corpus.stats,
      summary: buildCorpusSummary(buildId, encoder.modelId, index.dimension, corpus.stats),
      snapshot
    };
  } catch (error) {
    db.prepare('UPDATE jobs SET status = ?, error_text = ?, updated_at = CURRENT_TIMESTAMP WHERE id = ?').run('failed', errorMessage(error), jobId);
    logIngestEvent(ctx, { jobId, level: 'error', eventType: 'job_failed', event: { message: errorMessage(error) } });
    throw error;
  }
}
