import { and, asc, eq } from 'drizzle-orm';

import {
  LEDGER_EPSILON,
  baselineNote,
  creditSourceFor,
  findMilestoneTransition,
  ledgerSourceKey,
  roundHours,
  supplementNote,
  withAllocationTag,
  type CreditRecipient,
  type CreditRow,
  type CreditSource,
  type LedgerConfig,
  type MilestoneDefinition,
  type RepairOrder,
  type StageTransition,
} from '@rocredit/shared';

import type { SqlExecutor } from '../../database/db.js';
import { creditAdjustments, creditBaseline, repairOrders } from '../../database/schema.js';
import { createLogger, errorMessage } from '../../utils/logger.js';
import { isoDay, nowMs, todayIso } from '../../utils/dates.js';
import { postCredit, retractStalePostings } from './creditAuditService.js';
import { applyOverrides } from './creditOverrideService.js';
import { loadAllocations, loadRepairOrder } from './ledgerReads.js';
import { transitionsFor } from './stageTransitionLog.js';

const log = createLogger('credit-ledger');

type AdjustmentRow = typeof creditAdjustments.$inferSelect;

export type MilestoneLedger = {
  milestoneId: string;
  baseHours: number;
  adjustments: Array<{ id: number; deltaHours: number; fromStage: string; toStage: string; date: string; tech: string | null; share: number }>;
  appliedHours: number;
};

export type RecomputeResult =
  | {
      ok: true;
      roNumber: string;
      rows: CreditRow[];
      baselinesCreated: number;
      adjustmentsInserted: number;
      postedEntries: number;
      retractedEntries: number;
      hoursTaken: number;
      hoursRemaining: number;
    }
  | { ok: false; error: string };

type PassMode = 'recompute' | 'render';

type PassResult = {
  rows: CreditRow[];
  baselinesCreated: number;
  adjustmentsInserted: number;
};

function loadBaseline(db: SqlExecutor, roNumber: string, milestoneId: string): number | null {
  const row = db
    .select({ baseHours: creditBaseline.baseHours })
    .from(creditBaseline)
    .where(and(eq(creditBaseline.roNumber, roNumber), eq(creditBaseline.milestoneId, milestoneId)))
    .get();
  return row ? row.baseHours : null;
}

function loadAdjustments(db: SqlExecutor, roNumber: string, milestoneId: string): AdjustmentRow[] {
  return db
    .select()
    .from(creditAdjustments)
    .where(and(eq(creditAdjustments.roNumber, roNumber), eq(creditAdjustments.milestoneId, milestoneId)))
    .orderBy(asc(creditAdjustments.id))
    .all();
}

function tagged(note: string, recipient: CreditRecipient): string {
  return recipient.tag ? withAllocationTag(note, recipient.tag) : note;
}

function renderMilestoneRows(
  ro: RepairOrder,
  milestone: MilestoneDefinition,
  transition: StageTransition,
  baseHours: number,
  adjustments: readonly AdjustmentRow[],
  recipients: readonly CreditRecipient[],
): CreditRow[] {
  const rows: CreditRow[] = [];
  const note = baselineNote(milestone.label, baseHours, transition.fromStage, transition.toStage);
  for (const r of recipients) {
    rows.push({
      roNumber: ro.roNumber,
      fromStage: transition.fromStage,
      toStage: transition.toStage,
      note: tagged(note, r),
      date: isoDay(transition.occurredAt),
      employee: r.employee,
      hours: baseHours * milestone.share * r.fraction,
      milestoneId: milestone.id,
      adjustmentId: null,
      kind: 'baseline',
      overridden: false,
    });
  }
  for (const adj of adjustments) {
    // A stored tech wins; otherwise whoever is responsible for the role right now.
    const targets: readonly CreditRecipient[] = adj.tech ? [{ employee: adj.tech, fraction: 1, tag: null }] : recipients;
    const supNote = supplementNote(milestone.label, adj.deltaHours);
    for (const r of targets) {
      rows.push({
        roNumber: ro.roNumber,
        fromStage: adj.fromStage,
        toStage: adj.toStage,
        note: tagged(supNote, r),
        date: adj.date,
        employee: r.employee,
        hours: adj.deltaHours * adj.share * r.fraction,
        milestoneId: milestone.id,
        adjustmentId: adj.id,
        kind: 'supplement',
        overridden: false,
      });
    }
  }
  return rows;
}

function runPass(db: SqlExecutor, ro: RepairOrder, config: LedgerConfig, mode: PassMode): PassResult {
  const source: CreditSource = creditSourceFor(config.creditSource);
  const allocations = loadAllocations(db, ro.roNumber);
  const transitions = transitionsFor(db, ro.roNumber);
  const out: PassResult = { rows: [], baselinesCreated: 0, adjustmentsInserted: 0 };

  for (const milestone of config.milestones) {
    const transition = findMilestoneTransition(transitions, milestone.pattern, config.stages);
    if (!transition) continue;

    const bucketHours = ro.buckets[milestone.bucket];
    const recipients = source.recipients({ ro, allocations }, milestone.role);
    let baseHours = loadBaseline(db, ro.roNumber, milestone.id);

    if (baseHours === null) {
      if (mode === 'render') continue;
      // Nothing to freeze until the bucket has hours and someone is responsible for it.
      if (!(bucketHours > 0) || recipients.length === 0) continue;
      db.insert(creditBaseline)
        .values({ roNumber: ro.roNumber, milestoneId: milestone.id, baseHours: bucketHours, createdAt: nowMs() })
        .onConflictDoNothing()
        .run();
      baseHours = loadBaseline(db, ro.roNumber, milestone.id) ?? bucketHours;
      out.baselinesCreated += 1;
      log.info('baseline captured', { roNumber: ro.roNumber, milestone: milestone.id, baseHours });
    }

    const adjustments = loadAdjustments(db, ro.roNumber, milestone.id);
    if (mode === 'recompute') {
      const applied = baseHours + adjustments.reduce((acc, a) => acc + a.deltaHours, 0);
      const unapplied = bucketHours - applied;
      if (Math.abs(unapplied) >= LEDGER_EPSILON) {
        const single = source.kind === 'role_field' && recipients.length === 1 ? recipients[0] : undefined;
        const inserted = db
          .insert(creditAdjustments)
          .values({
            roNumber: ro.roNumber,
            milestoneId: milestone.id,
            deltaHours: unapplied,
            fromStage: transition.fromStage,
            toStage: transition.toStage,
            date: todayIso(),
            tech: single ? single.employee : null,
            share: milestone.share,
            createdAt: nowMs(),
          })
          .returning()
          .get();
        adjustments.push(inserted);
        out.adjustmentsInserted += 1;
        log.info('adjustment inserted', { roNumber: ro.roNumber, milestone: milestone.id, deltaHours: unapplied });
      }
    }

    out.rows.push(...renderMilestoneRows(ro, milestone, transition, baseHours, adjustments, recipients));
  }
  return out;
}

/**
 * Brings every reached milestone of one RO up to date with its current bucket values,
 * brings the audit log in line with the generated rows and writes hours taken/remaining back to the RO.
 * Runs as one immediate transaction, so concurrent recomputes cannot both insert a residual.
 */
export function recompute(db: SqlExecutor, roNumber: string, config: LedgerConfig): RecomputeResult {
  return db.transaction(
    (tx): RecomputeResult => {
      const ro = loadRepairOrder(tx, roNumber);
      if (!ro) return { ok: false, error: 'repair order not found' };

      const pass = runPass(tx, ro, config, 'recompute');
      // Postings are pre-override; overrides are applied when the audit is read.
      const postings = pass.rows.map((row) => ({ row, sourceKey: ledgerSourceKey(row) }));
      const retractedEntries = retractStalePostings(
        tx,
        roNumber,
        postings.map(({ row, sourceKey }) => ({ sourceKey, employee: row.employee, note: row.note })),
      );
      let postedEntries = 0;
      for (const { row, sourceKey } of postings) {
        const posted = postCredit(
          tx,
          {
            roNumber: row.roNumber,
            employee: row.employee,
            hours: row.hours,
            note: row.note,
            date: row.date,
            fromStage: row.fromStage,
            toStage: row.toStage,
            sourceKey,
          },
          'idempotent',
        );
        if (posted) postedEntries += 1;
      }

      const rows = applyOverrides(tx, pass.rows);
      const hoursTaken = roundHours(rows.reduce((acc, r) => acc + r.hours, 0));
      const hoursRemaining = roundHours(Math.max(ro.totalHours - hoursTaken, 0));
      tx.update(repairOrders)
        .set({ hoursTaken, hoursRemaining })
        .where(eq(repairOrders.roNumber, roNumber))
        .run();

      return {
        ok: true,
        roNumber,
        rows,
        baselinesCreated: pass.baselinesCreated,
        adjustmentsInserted: pass.adjustmentsInserted,
        postedEntries,
        retractedEntries,
        hoursTaken,
        hoursRemaining,
      };
    },
    { behavior: 'immediate' },
  );
}

export type RecomputeAllResult = {
  ok: true;
  processed: number;
  failed: Array<{ roNumber: string; error: string }>;
};

export function recomputeAll(db: SqlExecutor, config: LedgerConfig): RecomputeAllResult {
  const numbers = db
    .select({ roNumber: repairOrders.roNumber })
    .from(repairOrders)
    .orderBy(asc(repairOrders.roNumber))
    .all();
  const failed: Array<{ roNumber: string; error: string }> = [];
  let processed = 0;
  for (const { roNumber } of numbers) {
    try {
      const r = recompute(db, roNumber, config);
      if (r.ok) processed += 1;
      else failed.push({ roNumber, error: r.error });
    } catch (e) {
      // One broken RO must not hold back the rest.
      log.error('recompute failed', { roNumber, error: errorMessage(e) });
      failed.push({ roNumber, error: errorMessage(e) });
    }
  }
  return { ok: true, processed, failed };
}

/**
 * Rows as they stand in the ledger, with overrides applied. Read-only: residuals that a
 * recompute would add are not shown until that recompute runs.
 */
export function generatedCreditRows(db: SqlExecutor, config: LedgerConfig, filter: { roNumber?: string } = {}): CreditRow[] {
  const numbers = filter.roNumber
    ? [filter.roNumber]
    : db
        .select({ roNumber: repairOrders.roNumber })
        .from(repairOrders)
        .orderBy(asc(repairOrders.roNumber))
        .all()
        .map((r) => r.roNumber);

  const rows: CreditRow[] = [];
  for (const roNumber of numbers) {
    const ro = loadRepairOrder(db, roNumber);
    if (!ro) continue;
    rows.push(...runPass(db, ro, config, 'render').rows);
  }
  const out = applyOverrides(db, rows);
  // Stable: keeps milestone order within a day and RO.
  return out
    .map((row, idx) => ({ row, idx }))
    .sort((a, b) => a.row.date.localeCompare(b.row.date) || a.row.roNumber.localeCompare(b.row.roNumber) || a.idx - b.idx)
    .map((x) => x.row);
}

export function milestoneLedger(db: SqlExecutor, roNumber: string, config: LedgerConfig): MilestoneLedger[] {
  const out: MilestoneLedger[] = [];
  for (const milestone of config.milestones) {
    const baseHours = loadBaseline(db, roNumber, milestone.id);
    if (baseHours === null) continue;
    const adjustments = loadAdjustments(db, roNumber, milestone.id).map((a) => ({
      id: a.id,
      deltaHours: a.deltaHours,
      fromStage: a.fromStage,
      toStage: a.toStage,
      date: a.date,
      tech: a.tech,
      share: a.share,
    }));
    out.push({
      milestoneId: milestone.id,
      baseHours,
      adjustments,
      appliedHours: baseHours + adjustments.reduce((acc, a) => acc + a.deltaHours, 0),
    });
  }
  return out;
}
