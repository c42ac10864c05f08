import { mkdirSync } from 'node:fs';
import path from 'node:path';

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';

import { migrateSqlite } from './migrate.js';

export type AppDb = BetterSQLite3Database;

// Either the database or an open transaction: both run the synchronous query API.
export type SqlExecutor = BaseSQLiteDatabase<'sync', Database.RunResult>;

export type OpenedDb = {
  sqlite: Database.Database;
  db: AppDb;
};

export function openSqlite(dbPath: string): OpenedDb {
  if (dbPath !== ':memory:') mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  const sqlite = new Database(dbPath);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  // Another process holding the write lock makes us wait instead of failing.
  sqlite.pragma('busy_timeout = 30000');
  const db = drizzle(sqlite);
  migrateSqlite(sqlite);
  return { sqlite, db };
}

export function openMemorySqlite(): OpenedDb {
  return openSqlite(':memory:');
}

export function resolveDbPath(): string {
  return process.env.CREDIT_DB_PATH ?? path.join('data', 'credit.db');
}
