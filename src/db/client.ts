import Database from 'better-sqlite3';
import path from 'node:path';
import fs from 'node:fs';
import { runMigrations } from './migrations.js';

export interface DBContext {
  db: Database.Database;
}

export function initDB(dbPath = path.resolve(process.cwd(), 'data', 'kb.sqlite')): DBContext {
  if (dbPath !== ':memory:') fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  runMigrations(db);
  return { db };
}
