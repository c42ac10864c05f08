import type Database from 'better-sqlite3';

import { DEFAULT_STAGES } from '@rocredit/shared';

import { logInfo } from '../utils/logger.js';

type Migration = {
  from: number;
  to: number;
  name: string;
  up: (sqlite: Database.Database) => void;
};

export const CURRENT_SCHEMA_VERSION = 3;

const MIGRATIONS: Migration[] = [
  {
    from: 0,
    to: 1,
    name: 'repair orders and directory',
    up: (sqlite) => {
      sqlite.exec(`
        CREATE TABLE IF NOT EXISTS repair_orders (
          ro_number TEXT PRIMARY KEY NOT NULL,
          date TEXT NOT NULL,
          total_hours REAL NOT NULL,
          body_hours REAL NOT NULL DEFAULT 0,
          refinish_hours REAL NOT NULL DEFAULT 0,
          mechanical_hours REAL NOT NULL DEFAULT 0,
          estimator TEXT NOT NULL DEFAULT '',
          body_tech TEXT NOT NULL DEFAULT '',
          painter TEXT NOT NULL DEFAULT '',
          mechanic TEXT NOT NULL DEFAULT '',
          current_stage TEXT NOT NULL,
          status TEXT NOT NULL DEFAULT 'open',
          hours_taken REAL NOT NULL DEFAULT 0,
          hours_remaining REAL NOT NULL DEFAULT 0,
          created_at INTEGER NOT NULL,
          updated_at INTEGER NOT NULL
        );
        CREATE TABLE IF NOT EXISTS ro_allocations (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          ro_number TEXT NOT NULL REFERENCES repair_orders(ro_number) ON DELETE CASCADE,
          employee TEXT NOT NULL,
          role TEXT NOT NULL,
          percent REAL NOT NULL
        );
        CREATE INDEX IF NOT EXISTS ro_allocations_ro_idx ON ro_allocations(ro_number);
        CREATE TABLE IF NOT EXISTS employees (
          name TEXT PRIMARY KEY NOT NULL,
          nickname TEXT,
          created_at INTEGER NOT NULL
        );
        CREATE TABLE IF NOT EXISTS employee_roles (
          employee_name TEXT NOT NULL REFERENCES employees(name) ON DELETE CASCADE,
          role TEXT NOT NULL,
          PRIMARY KEY (employee_name, role)
        );
        CREATE TABLE IF NOT EXISTS settings_stages (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          name TEXT NOT NULL,
          order_index INTEGER NOT NULL
        );
        CREATE UNIQUE INDEX IF NOT EXISTS settings_stages_name_uq ON settings_stages(name);
        CREATE TABLE IF NOT EXISTS time_clock_records (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          date TEXT NOT NULL,
          employee TEXT NOT NULL,
          clock_in TEXT NOT NULL DEFAULT '',
          clock_out TEXT NOT NULL DEFAULT '',
          hours REAL NOT NULL
        );
        CREATE INDEX IF NOT EXISTS time_clock_records_date_idx ON time_clock_records(date, employee);
      `);
      const insert = sqlite.prepare('INSERT OR IGNORE INTO settings_stages (name, order_index) VALUES (?, ?)');
      DEFAULT_STAGES.forEach((name, idx) => insert.run(name, idx + 1));
    },
  },
  {
    from: 1,
    to: 2,
    name: 'credit ledger',
    up: (sqlite) => {
      sqlite.exec(`
        CREATE TABLE IF NOT EXISTS stage_transitions (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          ro_number TEXT NOT NULL REFERENCES repair_orders(ro_number) ON DELETE CASCADE,
          from_stage TEXT NOT NULL,
          to_stage TEXT NOT NULL,
          occurred_at INTEGER NOT NULL
        );
        CREATE INDEX IF NOT EXISTS stage_transitions_ro_idx ON stage_transitions(ro_number, occurred_at, id);
        CREATE TABLE IF NOT EXISTS credit_baseline (
          ro_number TEXT NOT NULL REFERENCES repair_orders(ro_number) ON DELETE CASCADE,
          milestone_id TEXT NOT NULL,
          base_hours REAL NOT NULL,
          created_at INTEGER NOT NULL,
          PRIMARY KEY (ro_number, milestone_id)
        );
        CREATE TABLE IF NOT EXISTS credit_adjustments (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          ro_number TEXT NOT NULL REFERENCES repair_orders(ro_number) ON DELETE CASCADE,
          milestone_id TEXT NOT NULL,
          delta_hours REAL NOT NULL,
          from_stage TEXT NOT NULL,
          to_stage TEXT NOT NULL,
          date TEXT NOT NULL,
          tech TEXT,
          share REAL NOT NULL,
          created_at INTEGER NOT NULL
        );
        CREATE INDEX IF NOT EXISTS credit_adjustments_ro_milestone_idx ON credit_adjustments(ro_number, milestone_id);
        CREATE TABLE IF NOT EXISTS credit_overrides (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          ro_number TEXT NOT NULL REFERENCES repair_orders(ro_number) ON DELETE CASCADE,
          from_stage TEXT NOT NULL,
          to_stage TEXT NOT NULL,
          note TEXT NOT NULL,
          date TEXT,
          tech TEXT,
          hours REAL,
          updated_at INTEGER NOT NULL
        );
        CREATE UNIQUE INDEX IF NOT EXISTS credit_overrides_key_uq ON credit_overrides(ro_number, from_stage, to_stage, note);
        CREATE TABLE IF NOT EXISTS credit_audit (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          ro_number TEXT NOT NULL REFERENCES repair_orders(ro_number) ON DELETE CASCADE,
          date TEXT NOT NULL,
          employee TEXT NOT NULL,
          hours REAL NOT NULL,
          note TEXT NOT NULL,
          from_stage TEXT,
          to_stage TEXT,
          created_at INTEGER NOT NULL
        );
        CREATE INDEX IF NOT EXISTS credit_audit_ro_employee_note_idx ON credit_audit(ro_number, employee, note);
      `);
    },
  },
  {
    from: 2,
    to: 3,
    name: 'audit source keys',
    up: (sqlite) => {
      // Generated postings without a source key cannot be matched to their ledger entry;
      // the startup recompute posts them again.
      sqlite.exec(`
        ALTER TABLE credit_audit ADD COLUMN source_key TEXT;
        CREATE INDEX IF NOT EXISTS credit_audit_ro_source_idx ON credit_audit(ro_number, source_key);
        DELETE FROM credit_audit WHERE from_stage IS NOT NULL;
      `);
    },
  },
];

function readVersion(sqlite: Database.Database): number {
  sqlite.exec('CREATE TABLE IF NOT EXISTS schema_version (version INTEGER NOT NULL)');
  const row: unknown = sqlite.prepare('SELECT version FROM schema_version LIMIT 1').get();
  if (row && typeof row === 'object' && 'version' in row && typeof row.version === 'number') return row.version;
  sqlite.prepare('INSERT INTO schema_version (version) VALUES (0)').run();
  return 0;
}

export function migrateSqlite(sqlite: Database.Database) {
  let version = readVersion(sqlite);
  for (const m of MIGRATIONS) {
    if (version !== m.from) continue;
    sqlite.transaction(() => {
      m.up(sqlite);
      sqlite.prepare('UPDATE schema_version SET version = ?').run(m.to);
    })();
    version = m.to;
    logInfo('schema migrated', { name: m.name, version });
  }
  if (version !== CURRENT_SCHEMA_VERSION) {
    throw new Error(`unsupported schema version ${version} (expected ${CURRENT_SCHEMA_VERSION})`);
  }
  sqlite.pragma('optimize');
}
