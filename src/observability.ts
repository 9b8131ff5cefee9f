import { DBContext } from './db/client.js';

export function logIngestEvent(
  ctx: DBContext,
  params: { jobId?: number; sourceFile?: string; sourceIndex?: number; level?: 'info' | 'warn' | 'error'; eventType: string; event?: Record<string, unknown> }
): void {
  ctx.db
    .prepare(
      `INSERT INTO ingest_logs (job_id, source_file, source_index, level, event_type, event_json)
       VALUES (?, ?, ?, ?, ?, ?)`
    )
    .run(
      params.jobId ?? null,
      params.sourceFile ?? null,
      params.sourceIndex ?? null,
      params.level || 'info',
      params.eventType,
      JSON.stringify(params.event || {})
    );
}

export function recordJobMetric(
  ctx: DBContext,
  params: { jobId?: number; metricName: string; metricValue: number; labels?: Record<string, unknown> }
): void {
  ctx.db
    .prepare('INSERT INTO job_metrics (job_id, metric_name, metric_value, labels_json) VALUES (?, ?, ?, ?)')
    .run(params.jobId ?? null, params.metricName, params.metricValue, JSON.stringify(params.labels || {}));
}

export interface LatestBuild {
  buildId: string;
  modelId: string;
  recordCount: number;
  chunkCount: number;
  avgChunkLength: number;
  createdAt: string;
}

export function latestBuild(ctx: DBContext): LatestBuild | null {
  const row = ctx.db
    .prepare(
      `SELECT build_id, model_id, record_count, chunk_count, avg_chunk_length, created_at
       FROM builds ORDER BY id DESC LIMIT 1`
    )
    .get() as
    | { build_id: string; model_id: string; record_count: number; chunk_count: number; avg_chunk_length: number; created_at: string }
    | undefined;
  if (!row) return null;
  return {
    buildId: row.build_id,
    modelId: row.model_id,
    recordCount: row.record_count,
    chunkCount: row.chunk_count,
    avgChunkLength: row.avg_chunk_length,
    createdAt: row.created_at
  };
}

export function healthStatus(ctx: DBContext): {
  dbOk: boolean;
  latestBuild: LatestBuild | null;
  jobs: { running: number; done: number; failed: number };
  recentFailures24h: number;
} {
  const dbOk = Boolean(ctx.db.prepare('SELECT 1 as ok').get());
  const jobs = ctx.db
    .prepare(
      `SELECT
         SUM(CASE WHEN status = 'running' THEN 1 ELSE 0 END) as running,
         SUM(CASE WHEN status = 'done' THEN 1 ELSE 0 END) as done,
         SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END) as failed
       FROM jobs`
    )
    .get() as { running: number | null; done: number | null; failed: number | null };

  const recentFailures24h = Number(
    (
      ctx.db
        .prepare("SELECT COUNT(*) as c FROM jobs WHERE status = 'failed' AND created_at >= datetime('now', '-1 day')")
        .get() as { c: number }
    ).c
  );

  return {
    dbOk,
    latestBuild: latestBuild(ctx),
    jobs: {
      running: jobs.running || 0,
      done: jobs.done || 0,
      failed: jobs.failed || 0
    },
    recentFailures24h
  };
}
