import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { buildCorpus, runBuild } from '../src/ingest/pipeline.js';
import { initDB } from '../src/db/client.js';
import { loadConfig, KBConfig } from '../src/config.js';
import { HashingEncoder } from '../src/retrieval/embeddings.js';
import { artifactsExist, loadArtifacts } from '../src/retrieval/store.js';
import { RecordProcessingError } from '../src/errors.js';

const defaults = { defaultUrl: 'https://example.edu', defaultSection: 'General' };

describe('buildCorpus', () => {
  it('chunks valid records, skips short ones and reports malformed entries', () => {
    const errors: RecordProcessingError[] = [];
    const corpus = buildCorpus(
      [
        { content: 'a'.repeat(200), url: 'https://example.edu/hostel', section: 'Hostel' },
        { content: 'A'.repeat(50) },
        { content: 'too short' },
        42,
        { content: 123 },
        { content: 'b'.repeat(1000), url: '   ' },
        { content: null }
      ],
      { ...defaults, onRecordError: (e) => errors.push(e) }
    );

    expect(corpus.chunks.map((c) => c.length)).toEqual([200, 600, 550]);
    expect(corpus.metadata).toHaveLength(corpus.chunks.length);
    expect(corpus.metadata.map((m) => m.sourceIndex)).toEqual([0, 5, 5]);
    expect(corpus.metadata.map((m) => m.contentLength)).toEqual([200, 600, 550]);
    expect(corpus.metadata[0]).toEqual({
      url: 'https://example.edu/hostel',
      section: 'Hostel',
      contentLength: 200,
      originalContent: 'a'.repeat(150) + '...',
      sourceIndex: 0
    });
    expect(corpus.metadata[1].url).toBe('https://example.edu');
    expect(corpus.metadata[1].section).toBe('General');
    expect(corpus.metadata[2].originalContent).toBe('b'.repeat(150) + '...');

    expect(corpus.stats).toEqual({ recordsSeen: 7, recordsSkipped: 2, recordsFailed: 2, chunkCount: 3, avgChunkLength: 450 });
    expect(errors.map((e) => e.sourceIndex)).toEqual([3, 4]);
    expect(errors[0].message).toBe('Failed to process record 3: expected an object, got number');
    expect(errors[1].message).toBe('Failed to process record 4: content must be a string, got number');
  });

  it('keeps the preview whole when content fits', () => {
    const text = 'The central library opens at eight and closes at nine on weekdays. '.repeat(2).trim();
    const corpus = buildCorpus([{ content: text }], defaults);
    expect(corpus.metadata[0].originalContent).toBe(text);
  });

  it('normalizes content before chunking', () => {
    const text = 'Admissions   open © for all programmes.\n\n'.repeat(4);
    const corpus = buildCorpus([{ content: text }], defaults);
    expect(corpus.chunks).toEqual(['Admissions open for all programmes. '.repeat(4).trim()]);
  });

  it('produces nothing from an empty list', () => {
    expect(buildCorpus([], defaults)).toEqual({
      chunks: [],
      metadata: [],
      stats: { recordsSeen: 0, recordsSkipped: 0, recordsFailed: 0, chunkCount: 0, avgChunkLength: 0 }
    });
  });
});

describe('runBuild', () => {
  let root: string;
  let config: KBConfig;

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'kb-build-'));
    const dataDir = path.join(root, 'data');
    fs.mkdirSync(dataDir);
    config = { ...loadConfig({}), dataDir, vectorstoreDir: path.join(root, 'vectorstore'), dbPath: ':memory:' };
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('writes aligned artifacts and records the job', async () => {
    fs.writeFileSync(
      path.join(config.dataDir, 'records.json'),
      JSON.stringify([{ content: 'a'.repeat(200), url: 'https://example.edu/hostel', section: 'Hostel' }, 42])
    );
    fs.writeFileSync(path.join(config.dataDir, 'notes.json'), JSON.stringify({ not: 'a list' }));
    fs.writeFileSync(path.join(config.dataDir, 'broken.json'), '{');

    const ctx = initDB(':memory:');
    const report = await runBuild(ctx, { config, encoder: new HashingEncoder(64) });

    expect(report.stats.chunkCount).toBe(1);
    expect(report.stats.recordsFailed).toBe(1);
    expect(report.summary.split('\n')[0]).toBe(`✅ Built corpus ${report.buildId}`);
    expect(artifactsExist(config.vectorstoreDir)).toBe(true);
    expect(loadArtifacts(config.vectorstoreDir, 'local-hash-64').buildId).toBe(report.buildId);

    const job = ctx.db.prepare('SELECT status FROM jobs WHERE id = ?').get(report.jobId) as { status: string };
    expect(job.status).toBe('done');

    const build = ctx.db.prepare('SELECT build_id, model_id, chunk_count, records_failed FROM builds').get() as {
      build_id: string;
      model_id: string;
      chunk_count: number;
      records_failed: number;
    };
    expect(build).toEqual({ build_id: report.buildId, model_id: 'local-hash-64', chunk_count: 1, records_failed: 1 });

    const failed = ctx.db.prepare("SELECT source_index FROM ingest_logs WHERE event_type = 'record_failed'").all() as Array<{ source_index: number }>;
    expect(failed).toEqual([{ source_index: 1 }]);
    const skipped = ctx.db.prepare("SELECT COUNT(*) as c FROM ingest_logs WHERE event_type = 'file_skipped'").get() as { c: number };
    expect(skipped.c).toBe(2);
  });

  it('fails the job when there is nothing to index', async () => {
    const ctx = initDB(':memory:');
    await expect(runBuild(ctx, { config, encoder: new HashingEncoder(64) })).rejects.toThrow(/No records found/);

    const job = ctx.db.prepare('SELECT status, error_text FROM jobs').get() as { status: string; error_text: string };
    expect(job.status).toBe('failed');
    expect(job.error_text).toMatch(/^No records found in /);
    expect(artifactsExist(config.vectorstoreDir)).toBe(false);
  });

  it('refuses to write an empty index', async () => {
    fs.writeFileSync(path.join(config.dataDir, 'records.json'), JSON.stringify([{ content: 'short' }]));
    const ctx = initDB(':memory:');
    await expect(runBuild(ctx, { config, encoder: new HashingEncoder(64) })).rejects.toThrow(/No chunks created/);
    expect(artifactsExist(config.vectorstoreDir)).toBe(false);
  });
});
