import Database from 'better-sqlite3';

export function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS jobs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      job_type TEXT NOT NULL,
      status TEXT NOT NULL,
      payload_json TEXT,
      error_text TEXT,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
      updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS builds (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      build_id TEXT NOT NULL,
      job_id INTEGER,
      model_id TEXT NOT NULL,
      record_count INTEGER NOT NULL,
      chunk_count INTEGER NOT NULL,
      avg_chunk_length REAL NOT NULL,
      vectorstore_dir TEXT NOT NULL,
      records_failed INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
      FOREIGN KEY(job_id) REFERENCES jobs(id)
    );

    CREATE TABLE IF NOT EXISTS settings (
      key TEXT PRIMARY KEY,
      value_json TEXT NOT NULL,
      updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS ingest_logs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      job_id INTEGER,
      source_file TEXT,
      source_index INTEGER,
      level TEXT NOT NULL,
      event_type TEXT NOT NULL,
      event_json TEXT,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
      FOREIGN KEY(job_id) REFERENCES jobs(id)
    );

    CREATE TABLE IF NOT EXISTS job_metrics (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      job_id INTEGER,
      metric_name TEXT NOT NULL,
      metric_value REAL NOT NULL,
      labels_json TEXT,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
      FOREIGN KEY(job_id) REFERENCES jobs(id)
    );

    CREATE INDEX IF NOT EXISTS idx_jobs_status ON jobs(status);
    CREATE INDEX IF NOT EXISTS idx_builds_build_id ON builds(build_id);
    CREATE INDEX IF NOT EXISTS idx_ingest_logs_job_id ON ingest_logs(job_id);
    CREATE INDEX IF NOT EXISTS idx_job_metrics_job_id ON job_metrics(job_id);
  `);

  try {
    db.pragma('journal_mode = WAL');
  } catch (error) {
    console.warn(`[db] WAL journal mode unavailable: ${error instanceof Error ? error.message : String(error)}`);
  }
}
