import { asc, eq } from 'drizzle-orm';

import { EmployeeRole, RepairOrderStatus, type RepairOrder, type RoAllocation } from '@rocredit/shared';

import type { SqlExecutor } from '../../database/db.js';
import { repairOrders, roAllocations } from '../../database/schema.js';

type RepairOrderRow = typeof repairOrders.$inferSelect;
type AllocationRow = typeof roAllocations.$inferSelect;

export function toStatus(raw: string): RepairOrderStatus {
  for (const status of Object.values(RepairOrderStatus)) {
    if (status === raw) return status;
  }
  return RepairOrderStatus.Open;
}

export function toRole(raw: string): EmployeeRole | null {
  for (const role of Object.values(EmployeeRole)) {
    if (role === raw) return role;
  }
  return null;
}

export function toRepairOrder(row: RepairOrderRow): RepairOrder {
  return {
    roNumber: row.roNumber,
    date: row.date,
    totalHours: row.totalHours,
    buckets: {
      body_hours: row.bodyHours,
      refinish_hours: row.refinishHours,
      mechanical_hours: row.mechanicalHours,
    },
    assignees: {
      estimator: row.estimator,
      body_tech: row.bodyTech,
      painter: row.painter,
      mechanic: row.mechanic,
    },
    currentStage: row.currentStage,
    status: toStatus(row.status),
    hoursTaken: row.hoursTaken,
    hoursRemaining: row.hoursRemaining,
  };
}

export function toAllocation(row: AllocationRow): RoAllocation | null {
  const role = toRole(row.role);
  if (!role) return null;
  return { roNumber: row.roNumber, employee: row.employee, role, percent: row.percent };
}

export function loadRepairOrder(db: SqlExecutor, roNumber: string): RepairOrder | null {
  const row = db.select().from(repairOrders).where(eq(repairOrders.roNumber, roNumber)).get();
  return row ? toRepairOrder(row) : null;
}

export function repairOrderExists(db: SqlExecutor, roNumber: string): boolean {
  const row = db
    .select({ roNumber: repairOrders.roNumber })
    .from(repairOrders)
    .where(eq(repairOrders.roNumber, roNumber))
    .get();
  return row !== undefined;
}

export function loadAllocations(db: SqlExecutor, roNumber: string): RoAllocation[] {
  const rows = db
    .select()
    .from(roAllocations)
    .where(eq(roAllocations.roNumber, roNumber))
    .orderBy(asc(roAllocations.id))
    .all();
  const out: RoAllocation[] = [];
  for (const row of rows) {
    const a = toAllocation(row);
    if (a) out.push(a);
  }
  return out;
}
