import { and, asc, eq, inArray } from 'drizzle-orm';

import {
  SUPPLEMENT_MATCH_TOLERANCE,
  findMilestoneByLabel,
  isBaselineNote,
  ledgerSourceKey,
  parseCreditNote,
  stripAllocationTag,
  supplementNote,
  type CreditOverride,
  type CreditOverrideFields,
  type CreditRow,
  type CreditRowKey,
  type DeleteCreditRowsResult,
  type LedgerConfig,
} from '@rocredit/shared';

import type { SqlExecutor } from '../../database/db.js';
import { creditAdjustments, creditOverrides } from '../../database/schema.js';
import { createLogger } from '../../utils/logger.js';
import { isIsoDay, nowMs } from '../../utils/dates.js';
import { deletePostingsBySource } from './creditAuditService.js';
import { repairOrderExists } from './ledgerReads.js';

const log = createLogger('credit-overrides');

type OverrideRow = typeof creditOverrides.$inferSelect;

/** A row as the client sees it, used to locate the ledger entry behind it. */
export type DisplayedCreditRow = CreditRowKey & {
  date: string;
  employee?: string | null;
  hours: number;
  // Pins the exact adjustment when several share a note.
  adjustmentId?: number | null;
};

function keyOf(k: CreditRowKey): string {
  return [k.roNumber, k.fromStage, k.toStage, k.note].join('\u0000');
}

function blankToNull(v: string | null | undefined): string | null {
  const t = String(v ?? '').trim();
  return t ? t : null;
}

function toOverride(row: OverrideRow): CreditOverride {
  return {
    roNumber: row.roNumber,
    fromStage: row.fromStage,
    toStage: row.toStage,
    note: row.note,
    date: row.date,
    tech: row.tech,
    hours: row.hours,
  };
}

function keyWhere(key: CreditRowKey) {
  return and(
    eq(creditOverrides.roNumber, key.roNumber),
    eq(creditOverrides.fromStage, key.fromStage),
    eq(creditOverrides.toStage, key.toStage),
    eq(creditOverrides.note, key.note),
  );
}

export function listOverrides(db: SqlExecutor, filter: { roNumber?: string } = {}): CreditOverride[] {
  const q = db.select().from(creditOverrides);
  const rows = filter.roNumber
    ? q.where(eq(creditOverrides.roNumber, filter.roNumber)).orderBy(asc(creditOverrides.id)).all()
    : q.orderBy(asc(creditOverrides.id)).all();
  return rows.map(toOverride);
}

export function setOverride(db: SqlExecutor, key: CreditRowKey, fields: CreditOverrideFields) {
  const date = blankToNull(fields.date);
  const tech = blankToNull(fields.tech);
  const hours = fields.hours ?? null;
  if (date !== null && !isIsoDay(date)) return { ok: false as const, error: 'date must be YYYY-MM-DD' };
  if (hours !== null && !Number.isFinite(hours)) return { ok: false as const, error: 'hours must be a finite number' };
  if (!repairOrderExists(db, key.roNumber)) return { ok: false as const, error: 'repair order not found' };

  const row = db
    .insert(creditOverrides)
    .values({ ...key, date, tech, hours, updatedAt: nowMs() })
    .onConflictDoUpdate({
      target: [creditOverrides.roNumber, creditOverrides.fromStage, creditOverrides.toStage, creditOverrides.note],
      set: { date, tech, hours, updatedAt: nowMs() },
    })
    .returning()
    .get();
  log.info('override saved', { roNumber: key.roNumber, note: key.note });
  return { ok: true as const, override: toOverride(row) };
}

export function deleteOverride(db: SqlExecutor, key: CreditRowKey): boolean {
  return db.delete(creditOverrides).where(keyWhere(key)).run().changes > 0;
}

/** Substitutes override fields into generated rows: non-blank date/tech and non-null hours win. */
export function applyOverrides(db: SqlExecutor, rows: readonly CreditRow[]): CreditRow[] {
  if (rows.length === 0) return [];
  const roNumbers = Array.from(new Set(rows.map((r) => r.roNumber)));
  const byKey = new Map<string, OverrideRow>();
  for (const o of db.select().from(creditOverrides).where(inArray(creditOverrides.roNumber, roNumbers)).all()) {
    byKey.set(keyOf(o), o);
  }
  return rows.map((row) => {
    const o = byKey.get(keyOf(row));
    if (!o) return row;
    return {
      ...row,
      date: blankToNull(o.date) ?? row.date,
      employee: blankToNull(o.tech) ?? row.employee,
      hours: o.hours ?? row.hours,
      overridden: true,
    };
  });
}

export type DeleteSupplementResult =
  | { ok: true; deleted: boolean; auditRemoved: number }
  | { ok: false; error: string };

/**
 * Removes the adjustment behind a displayed supplement row. The bucket delta is recovered
 * from the row hours, share and allocation fraction; the sign comes from the note.
 * Every posting generated from that adjustment is rolled back with it.
 */
export function deleteSupplement(db: SqlExecutor, row: DisplayedCreditRow, config: LedgerConfig): DeleteSupplementResult {
  const parsed = parseCreditNote(row.note);
  if (parsed.kind !== 'supplement') return { ok: false, error: 'not a supplement row' };
  const milestone = findMilestoneByLabel(config.milestones, parsed.label);
  if (!milestone) return { ok: false, error: `unknown milestone: ${parsed.label}` };

  const body = stripAllocationTag(row.note);
  const fraction = parsed.allocation ? parsed.allocation.percent / 100 : 1;
  const tech = blankToNull(row.employee);

  return db.transaction(
    (tx): DeleteSupplementResult => {
      const adjustments = tx
        .select()
        .from(creditAdjustments)
        .where(and(eq(creditAdjustments.roNumber, row.roNumber), eq(creditAdjustments.milestoneId, milestone.id)))
        .orderBy(asc(creditAdjustments.id))
        .all();

      const pinned = row.adjustmentId ?? null;
      const candidates = adjustments.filter(
        (a) =>
          (pinned === null || a.id === pinned) &&
          a.fromStage === row.fromStage &&
          a.toStage === row.toStage &&
          a.date === row.date &&
          supplementNote(milestone.label, a.deltaHours) === body &&
          (a.tech === null || tech === null || a.tech === tech),
      );
      const match = candidates.find((a) => {
        const recovered = (parsed.sign * Math.abs(row.hours)) / (a.share * fraction);
        return Math.abs(recovered - a.deltaHours) <= SUPPLEMENT_MATCH_TOLERANCE;
      });
      if (!match) return { ok: true, deleted: false, auditRemoved: 0 };

      tx.delete(creditAdjustments).where(eq(creditAdjustments.id, match.id)).run();
      const auditRemoved = deletePostingsBySource(
        tx,
        row.roNumber,
        ledgerSourceKey({ milestoneId: milestone.id, adjustmentId: match.id }),
      );
      log.info('supplement deleted', { roNumber: row.roNumber, milestone: milestone.id, deltaHours: match.deltaHours, auditRemoved });
      return { ok: true, deleted: true, auditRemoved };
    },
    { behavior: 'immediate' },
  );
}

/**
 * Batch delete from the credits grid. Baseline rows are never deleted; supplement rows
 * remove their adjustment; anything else (or a supplement without a ledger match) drops its override.
 */
export function deleteCreditRows(
  db: SqlExecutor,
  rows: readonly DisplayedCreditRow[],
  config: LedgerConfig,
): DeleteCreditRowsResult {
  const labels = config.milestones.map((m) => m.label);
  const out: DeleteCreditRowsResult = { deleted: 0, skippedBaseline: 0, notFound: 0 };
  for (const row of rows) {
    if (isBaselineNote(row.note, labels)) {
      out.skippedBaseline += 1;
      continue;
    }
    if (parseCreditNote(row.note).kind === 'supplement') {
      const r = deleteSupplement(db, row, config);
      if (r.ok && r.deleted) {
        deleteOverride(db, row);
        out.deleted += 1;
        continue;
      }
    }
    if (deleteOverride(db, row)) out.deleted += 1;
    else out.notFound += 1;
  }
  return out;
}
