import { asc, eq } from 'drizzle-orm';

import {
  EmployeeRole,
  RepairOrderStatus,
  isKnownStage,
  resolveEmployeeName,
  type LedgerConfig,
  type RepairOrder,
  type RoAllocation,
} from '@rocredit/shared';

import type { SqlExecutor } from '../database/db.js';
import { repairOrders, roAllocations } from '../database/schema.js';
import { createLogger } from '../utils/logger.js';
import { isIsoDay, nowMs, todayIso } from '../utils/dates.js';
import { closeReconcile, type CloseReconcileResult } from './credit/closeReconciliationService.js';
import { recompute, type RecomputeResult } from './credit/creditLedgerService.js';
import { loadAllocations, loadRepairOrder, toRepairOrder } from './credit/ledgerReads.js';
import { recordTransition, transitionsFor } from './credit/stageTransitionLog.js';
import { listEmployees } from './employeeService.js';

const log = createLogger('repair-orders');

export type RepairOrderInput = {
  roNumber: string;
  date?: string;
  totalHours: number;
  bodyHours?: number;
  refinishHours?: number;
  mechanicalHours?: number;
  estimator?: string;
  bodyTech?: string;
  painter?: string;
  mechanic?: string;
  currentStage?: string;
};

export type RepairOrderPatch = Partial<Omit<RepairOrderInput, 'roNumber' | 'currentStage'>>;

function validateHours(values: Record<string, number | undefined>): string | null {
  for (const [field, v] of Object.entries(values)) {
    if (v === undefined) continue;
    if (!Number.isFinite(v) || v < 0) return `${field} must be a non-negative number`;
  }
  return null;
}

// Forms may submit a nickname; credit is booked to the canonical name.
function canonicalAssignees(db: SqlExecutor, input: RepairOrderPatch) {
  const directory = listEmployees(db);
  const pick = (role: EmployeeRole, v: string | undefined) =>
    v === undefined ? undefined : resolveEmployeeName(directory, role, v);
  return {
    estimator: pick(EmployeeRole.Estimator, input.estimator),
    bodyTech: pick(EmployeeRole.BodyTech, input.bodyTech),
    painter: pick(EmployeeRole.Painter, input.painter),
    mechanic: pick(EmployeeRole.Mechanic, input.mechanic),
  };
}

export function listRepairOrders(db: SqlExecutor, filter: { status?: RepairOrderStatus } = {}): RepairOrder[] {
  const q = db.select().from(repairOrders);
  const rows = filter.status
    ? q.where(eq(repairOrders.status, filter.status)).orderBy(asc(repairOrders.roNumber)).all()
    : q.orderBy(asc(repairOrders.roNumber)).all();
  return rows.map(toRepairOrder);
}

export function getRepairOrder(db: SqlExecutor, roNumber: string) {
  const ro = loadRepairOrder(db, roNumber);
  if (!ro) return { ok: false as const, error: 'repair order not found' };
  return { ok: true as const, repairOrder: ro };
}

export function createRepairOrder(db: SqlExecutor, input: RepairOrderInput, config: LedgerConfig) {
  const roNumber = input.roNumber.trim();
  if (!roNumber) return { ok: false as const, error: 'ro number is required' };
  if (!(input.totalHours > 0)) return { ok: false as const, error: 'totalHours must be positive' };
  const hoursError = validateHours({
    bodyHours: input.bodyHours,
    refinishHours: input.refinishHours,
    mechanicalHours: input.mechanicalHours,
  });
  if (hoursError) return { ok: false as const, error: hoursError };
  const date = input.date ?? todayIso();
  if (!isIsoDay(date)) return { ok: false as const, error: 'date must be YYYY-MM-DD' };
  const currentStage = input.currentStage ?? config.stages[0];
  if (currentStage === undefined || !isKnownStage(config.stages, currentStage)) {
    return { ok: false as const, error: `unknown stage: ${String(currentStage)}` };
  }
  if (loadRepairOrder(db, roNumber)) return { ok: false as const, error: 'repair order already exists' };

  const assignees = canonicalAssignees(db, input);
  const ts = nowMs();
  const row = db
    .insert(repairOrders)
    .values({
      roNumber,
      date,
      totalHours: input.totalHours,
      bodyHours: input.bodyHours ?? 0,
      refinishHours: input.refinishHours ?? 0,
      mechanicalHours: input.mechanicalHours ?? 0,
      estimator: assignees.estimator ?? '',
      bodyTech: assignees.bodyTech ?? '',
      painter: assignees.painter ?? '',
      mechanic: assignees.mechanic ?? '',
      currentStage,
      status: RepairOrderStatus.Open,
      hoursTaken: 0,
      hoursRemaining: input.totalHours,
      createdAt: ts,
      updatedAt: ts,
    })
    .returning()
    .get();
  log.info('repair order created', { roNumber });
  return { ok: true as const, repairOrder: toRepairOrder(row) };
}

/** Edits buckets, assignees or totals, then lets the ledger absorb the change. */
export function updateRepairOrder(db: SqlExecutor, roNumber: string, patch: RepairOrderPatch, config: LedgerConfig) {
  if (patch.totalHours !== undefined && !(patch.totalHours > 0)) {
    return { ok: false as const, error: 'totalHours must be positive' };
  }
  const hoursError = validateHours({
    bodyHours: patch.bodyHours,
    refinishHours: patch.refinishHours,
    mechanicalHours: patch.mechanicalHours,
  });
  if (hoursError) return { ok: false as const, error: hoursError };
  if (patch.date !== undefined && !isIsoDay(patch.date)) return { ok: false as const, error: 'date must be YYYY-MM-DD' };

  return db.transaction(
    (tx) => {
      if (!loadRepairOrder(tx, roNumber)) return { ok: false as const, error: 'repair order not found' };
      const assignees = canonicalAssignees(tx, patch);
      tx.update(repairOrders)
        .set({
          ...(patch.date !== undefined && { date: patch.date }),
          ...(patch.totalHours !== undefined && { totalHours: patch.totalHours }),
          ...(patch.bodyHours !== undefined && { bodyHours: patch.bodyHours }),
          ...(patch.refinishHours !== undefined && { refinishHours: patch.refinishHours }),
          ...(patch.mechanicalHours !== undefined && { mechanicalHours: patch.mechanicalHours }),
          ...(assignees.estimator !== undefined && { estimator: assignees.estimator }),
          ...(assignees.bodyTech !== undefined && { bodyTech: assignees.bodyTech }),
          ...(assignees.painter !== undefined && { painter: assignees.painter }),
          ...(assignees.mechanic !== undefined && { mechanic: assignees.mechanic }),
          updatedAt: nowMs(),
        })
        .where(eq(repairOrders.roNumber, roNumber))
        .run();
      const ledger = recompute(tx, roNumber, config);
      const ro = loadRepairOrder(tx, roNumber);
      if (!ro) return { ok: false as const, error: 'repair order not found' };
      return { ok: true as const, repairOrder: ro, ledger };
    },
    { behavior: 'immediate' },
  );
}

export function deleteRepairOrder(db: SqlExecutor, roNumber: string): boolean {
  const r = db.delete(repairOrders).where(eq(repairOrders.roNumber, roNumber)).run();
  if (r.changes > 0) log.info('repair order deleted', { roNumber });
  return r.changes > 0;
}

export type ChangeStageResult =
  | { ok: true; repairOrder: RepairOrder; transitionRecorded: boolean; ledger: RecomputeResult | null }
  | { ok: false; error: string };

/**
 * Records the transition, moves the RO and recomputes credit as one unit. Setting the stage
 * the RO is already in records nothing.
 */
export function changeStage(db: SqlExecutor, roNumber: string, toStage: string, config: LedgerConfig): ChangeStageResult {
  if (!isKnownStage(config.stages, toStage)) return { ok: false, error: `unknown stage: ${toStage}` };
  return db.transaction(
    (tx): ChangeStageResult => {
      const ro = loadRepairOrder(tx, roNumber);
      if (!ro) return { ok: false, error: 'repair order not found' };
      if (ro.currentStage === toStage) return { ok: true, repairOrder: ro, transitionRecorded: false, ledger: null };

      const ts = nowMs();
      recordTransition(tx, roNumber, ro.currentStage, toStage, ts);
      tx.update(repairOrders).set({ currentStage: toStage, updatedAt: ts }).where(eq(repairOrders.roNumber, roNumber)).run();
      const ledger = recompute(tx, roNumber, config);
      const updated = loadRepairOrder(tx, roNumber);
      if (!updated) return { ok: false, error: 'repair order not found' };
      return { ok: true, repairOrder: updated, transitionRecorded: true, ledger };
    },
    { behavior: 'immediate' },
  );
}

export type ChangeStatusResult =
  | { ok: true; repairOrder: RepairOrder; reconciliation: CloseReconcileResult | null }
  | { ok: false; error: string };

/** Reconciliation fires only on the move into `closed`, never on saves while already closed. */
export function changeStatus(db: SqlExecutor, roNumber: string, status: RepairOrderStatus, config: LedgerConfig): ChangeStatusResult {
  return db.transaction(
    (tx): ChangeStatusResult => {
      const ro = loadRepairOrder(tx, roNumber);
      if (!ro) return { ok: false, error: 'repair order not found' };
      tx.update(repairOrders).set({ status, updatedAt: nowMs() }).where(eq(repairOrders.roNumber, roNumber)).run();

      let reconciliation: CloseReconcileResult | null = null;
      if (status === RepairOrderStatus.Closed && ro.status !== RepairOrderStatus.Closed) {
        recompute(tx, roNumber, config);
        reconciliation = closeReconcile(tx, roNumber, config);
      }
      const updated = loadRepairOrder(tx, roNumber);
      if (!updated) return { ok: false, error: 'repair order not found' };
      return { ok: true, repairOrder: updated, reconciliation };
    },
    { behavior: 'immediate' },
  );
}

export function getAllocations(db: SqlExecutor, roNumber: string): RoAllocation[] {
  return loadAllocations(db, roNumber);
}

export type AllocationInput = { employee: string; role: EmployeeRole; percent: number };

export function setAllocations(db: SqlExecutor, roNumber: string, input: readonly AllocationInput[], config: LedgerConfig) {
  const perRole = new Map<EmployeeRole, number>();
  for (const a of input) {
    if (!a.employee.trim()) return { ok: false as const, error: 'allocation employee is required' };
    if (!(a.percent > 0 && a.percent <= 100)) return { ok: false as const, error: 'allocation percent must be in (0, 100]' };
    perRole.set(a.role, (perRole.get(a.role) ?? 0) + a.percent);
  }
  for (const [role, total] of perRole) {
    if (total > 100 + 1e-9) return { ok: false as const, error: `allocations for ${role} exceed 100%` };
  }

  return db.transaction(
    (tx) => {
      if (!loadRepairOrder(tx, roNumber)) return { ok: false as const, error: 'repair order not found' };
      tx.delete(roAllocations).where(eq(roAllocations.roNumber, roNumber)).run();
      if (input.length > 0) {
        tx.insert(roAllocations)
          .values(input.map((a) => ({ roNumber, employee: a.employee.trim(), role: a.role, percent: a.percent })))
          .run();
      }
      const ledger = recompute(tx, roNumber, config);
      return { ok: true as const, allocations: loadAllocations(tx, roNumber), ledger };
    },
    { behavior: 'immediate' },
  );
}

export function listTransitions(db: SqlExecutor, roNumber: string) {
  if (!loadRepairOrder(db, roNumber)) return { ok: false as const, error: 'repair order not found' };
  return { ok: true as const, transitions: transitionsFor(db, roNumber) };
}
