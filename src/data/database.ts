import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import { logger } from '../utils/logger.js';

export type Db = Database.Database;

/** Opens (or creates) the analysis database. Pass ':memory:' for tests. */
export function openDatabase(path: string): Db {
  const inMemory = path === ':memory:';
  const fullPath = inMemory ? path : resolve(process.cwd(), path);
  if (!inMemory) mkdirSync(dirname(fullPath), { recursive: true });

  const db = new Database(fullPath);
  if (!inMemory) db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  initSchema(db);
  logger.info(`[db] Opened database at ${fullPath}`);
  return db;
}

export function closeDatabase(db: Db): void {
  if (db.open) {
    db.close();
    logger.info('[db] Database closed');
  }
}

function initSchema(database: Db): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS analyses (
      id TEXT PRIMARY KEY,
      token_address TEXT NOT NULL,
      analysis_type TEXT NOT NULL CHECK(analysis_type IN ('quick', 'deep')),
      source TEXT NOT NULL CHECK(source IN ('api', 'webhook', 'snapshot')),
      final_score REAL NOT NULL,
      traditional_score REAL NOT NULL,
      risk_level TEXT NOT NULL,
      recommendation TEXT NOT NULL,
      verdict_decision TEXT NOT NULL,
      ai_enhanced INTEGER NOT NULL DEFAULT 0,
      security_passed INTEGER NOT NULL,
      data_sources_used TEXT NOT NULL DEFAULT '[]',
      warnings TEXT NOT NULL DEFAULT '[]',
      processing_time_ms INTEGER NOT NULL DEFAULT 0,
      payload TEXT NOT NULL,
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_analyses_token ON analyses(token_address, created_at DESC);
    CREATE INDEX IF NOT EXISTS idx_analyses_created ON analyses(created_at DESC);
  `);
}
