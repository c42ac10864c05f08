import { asc } from 'drizzle-orm';

import {
  DEFAULT_MILESTONES,
  DEFAULT_ROLE_BUCKETS,
  DEFAULT_STAGES,
  parseCreditSourceKind,
  stageConfigVersion,
  type LedgerConfig,
} from '@rocredit/shared';

import type { SqlExecutor } from '../database/db.js';
import { settingsStages } from '../database/schema.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('settings');

export function listStages(db: SqlExecutor): string[] {
  const rows = db
    .select({ name: settingsStages.name })
    .from(settingsStages)
    .orderBy(asc(settingsStages.orderIndex), asc(settingsStages.id))
    .all();
  return rows.map((r) => r.name);
}

/**
 * Read on every call: stages can be renamed or reordered while the server runs, and the
 * ledger must see the new order immediately.
 */
export function resolveLedgerConfig(db: SqlExecutor): LedgerConfig {
  const stored = listStages(db);
  const stages = stored.length > 0 ? stored : [...DEFAULT_STAGES];
  return {
    version: stageConfigVersion(stages),
    stages,
    milestones: DEFAULT_MILESTONES,
    creditSource: parseCreditSourceKind(process.env.CREDIT_SOURCE),
    roleBuckets: DEFAULT_ROLE_BUCKETS,
  };
}

export type SaveStagesResult =
  | { ok: true; stages: string[]; version: string }
  | { ok: false; error: string; conflict?: boolean };

/**
 * Replaces the stage list. With `expectedVersion` the save only goes through while the stored
 * list still has that version, so two editors cannot silently overwrite each other.
 */
export function saveStages(db: SqlExecutor, names: readonly string[], opts: { expectedVersion?: string } = {}): SaveStagesResult {
  const stages = names.map((n) => n.trim());
  if (stages.length === 0) return { ok: false, error: 'at least one stage is required' };
  if (stages.some((s) => !s)) return { ok: false, error: 'stage names must not be blank' };
  if (new Set(stages).size !== stages.length) return { ok: false, error: 'stage names must be unique' };

  return db.transaction(
    (tx): SaveStagesResult => {
      const current = resolveLedgerConfig(tx).version;
      if (opts.expectedVersion !== undefined && opts.expectedVersion !== current) {
        log.warn('stale stage save rejected', { expected: opts.expectedVersion, current });
        return { ok: false, error: 'stage settings changed since they were read', conflict: true };
      }
      tx.delete(settingsStages).run();
      tx.insert(settingsStages)
        .values(stages.map((name, orderIndex) => ({ name, orderIndex })))
        .run();
      const version = stageConfigVersion(stages);
      log.info('stages saved', { count: stages.length, version });
      return { ok: true, stages, version };
    },
    { behavior: 'immediate' },
  );
}
