import { and, desc, eq, inArray, isNotNull, isNull, sql } from 'drizzle-orm';

import { isAssigned, type CreditAuditEntry, type PostCreditMode } from '@rocredit/shared';

import type { SqlExecutor } from '../../database/db.js';
import { creditAudit } from '../../database/schema.js';
import { createLogger } from '../../utils/logger.js';
import { nowMs, todayIso } from '../../utils/dates.js';
import { repairOrderExists } from './ledgerReads.js';

const log = createLogger('credit-audit');

export type PostCreditInput = {
  roNumber: string;
  employee: string;
  hours: number;
  note: string;
  date?: string;
  fromStage?: string | null;
  toStage?: string | null;
  sourceKey?: string | null;
};

export type RenderedPosting = {
  sourceKey: string;
  employee: string;
  note: string;
};

function postingKey(p: RenderedPosting): string {
  return [p.sourceKey, p.employee.trim(), p.note].join('\u0000');
}

/**
 * Appends one posted credit line.
 *
 * `always` is for one-shot postings whose caller guarantees single execution (close adjustments);
 * `idempotent` skips when an entry with the same (ro, employee, note, source key) exists, for recompute passes.
 * Returns whether a row was written.
 */
export function postCredit(db: SqlExecutor, input: PostCreditInput, mode: PostCreditMode): boolean {
  const employee = String(input.employee ?? '').trim();
  if (!isAssigned(employee) || !Number.isFinite(input.hours) || input.hours === 0) return false;
  const sourceKey = input.sourceKey ?? null;

  return db.transaction(
    (tx) => {
      // The RO may have been deleted while a recompute was running.
      if (!repairOrderExists(tx, input.roNumber)) {
        log.debug('skip posting for missing RO', { roNumber: input.roNumber, note: input.note });
        return false;
      }
      if (mode === 'idempotent') {
        const existing = tx
          .select({ id: creditAudit.id })
          .from(creditAudit)
          .where(
            and(
              eq(creditAudit.roNumber, input.roNumber),
              eq(creditAudit.employee, employee),
              eq(creditAudit.note, input.note),
              sourceKey === null ? isNull(creditAudit.sourceKey) : eq(creditAudit.sourceKey, sourceKey),
            ),
          )
          .limit(1)
          .get();
        if (existing) return false;
      }
      tx.insert(creditAudit)
        .values({
          roNumber: input.roNumber,
          date: input.date ?? todayIso(),
          employee,
          hours: input.hours,
          note: input.note,
          fromStage: input.fromStage ?? null,
          toStage: input.toStage ?? null,
          sourceKey,
          createdAt: nowMs(),
        })
        .run();
      return true;
    },
    { behavior: 'immediate' },
  );
}

function toEntry(row: typeof creditAudit.$inferSelect): CreditAuditEntry {
  return {
    id: row.id,
    date: row.date,
    roNumber: row.roNumber,
    employee: row.employee,
    hours: row.hours,
    note: row.note,
    fromStage: row.fromStage,
    toStage: row.toStage,
    sourceKey: row.sourceKey,
  };
}

/**
 * Deletes generated postings of one RO that the ledger no longer renders (a reassigned role,
 * changed allocation percentages, a milestone that is no longer reached).
 * Close adjustments and manual postings carry no source key and stay.
 */
export function retractStalePostings(db: SqlExecutor, roNumber: string, rendered: readonly RenderedPosting[]): number {
  const live = new Set(rendered.map(postingKey));
  const stale = db
    .select({ id: creditAudit.id, sourceKey: creditAudit.sourceKey, employee: creditAudit.employee, note: creditAudit.note })
    .from(creditAudit)
    .where(and(eq(creditAudit.roNumber, roNumber), isNotNull(creditAudit.sourceKey)))
    .all()
    .filter((e) => !live.has(postingKey({ sourceKey: e.sourceKey ?? '', employee: e.employee, note: e.note })))
    .map((e) => e.id);
  if (stale.length === 0) return 0;
  db.delete(creditAudit).where(inArray(creditAudit.id, stale)).run();
  log.info('stale postings retracted', { roNumber, count: stale.length });
  return stale.length;
}

export function deletePostingsBySource(db: SqlExecutor, roNumber: string, sourceKey: string): number {
  return db
    .delete(creditAudit)
    .where(and(eq(creditAudit.roNumber, roNumber), eq(creditAudit.sourceKey, sourceKey)))
    .run().changes;
}

export function listAudit(db: SqlExecutor, filter: { roNumber?: string } = {}): CreditAuditEntry[] {
  const q = db.select().from(creditAudit);
  const rows = filter.roNumber
    ? q.where(eq(creditAudit.roNumber, filter.roNumber)).orderBy(desc(creditAudit.id)).all()
    : q.orderBy(desc(creditAudit.id)).all();
  return rows.map(toEntry);
}

export function postedTotalsByEmployee(db: SqlExecutor, roNumber: string): Map<string, number> {
  const rows = db
    .select({ employee: creditAudit.employee, total: sql<number>`coalesce(sum(${creditAudit.hours}), 0)` })
    .from(creditAudit)
    .where(eq(creditAudit.roNumber, roNumber))
    .groupBy(creditAudit.employee)
    .all();
  return new Map(rows.map((r) => [r.employee, Number(r.total)]));
}
