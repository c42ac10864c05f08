import type { AllocationTag } from './creditNotes.js';
import {
  EmployeeRole,
  HourBucket,
  isAssigned,
  type RepairOrder,
  type RoAllocation,
} from './repairOrder.js';

export const CreditSourceKind = {
  RoleField: 'role_field',
  Allocation: 'allocation',
} as const;

export type CreditSourceKind = (typeof CreditSourceKind)[keyof typeof CreditSourceKind];

export type RoleBuckets = Partial<Record<EmployeeRole, HourBucket>>;

export const DEFAULT_ROLE_BUCKETS: RoleBuckets = {
  [EmployeeRole.BodyTech]: HourBucket.Body,
  [EmployeeRole.Painter]: HourBucket.Refinish,
  [EmployeeRole.Mechanic]: HourBucket.Mechanical,
};

export type CreditRecipient = {
  employee: string;
  fraction: number;
  tag: AllocationTag | null;
};

export type CreditSourceInput = {
  ro: RepairOrder;
  allocations: readonly RoAllocation[];
};

/**
 * Resolves who is credited for a role on one RO.
 *
 * `role_field` reads the single assignee stored on the RO (100% of the bucket);
 * `allocation` reads the RO's percent allocations table.
 */
export interface CreditSource {
  readonly kind: CreditSourceKind;
  recipients(input: CreditSourceInput, role: EmployeeRole): CreditRecipient[];
  expectedTotals(input: CreditSourceInput, roleBuckets: RoleBuckets): Map<string, number>;
}

function addTo(map: Map<string, number>, key: string, value: number) {
  map.set(key, (map.get(key) ?? 0) + value);
}

function roleEntries(roleBuckets: RoleBuckets): Array<[EmployeeRole, HourBucket]> {
  const out: Array<[EmployeeRole, HourBucket]> = [];
  for (const role of Object.values(EmployeeRole)) {
    const bucket = roleBuckets[role];
    if (bucket) out.push([role, bucket]);
  }
  return out;
}

export const roleFieldSource: CreditSource = {
  kind: CreditSourceKind.RoleField,

  recipients({ ro }, role) {
    const employee = ro.assignees[role];
    if (!isAssigned(employee)) return [];
    return [{ employee: employee.trim(), fraction: 1, tag: null }];
  },

  expectedTotals({ ro }, roleBuckets) {
    const out = new Map<string, number>();
    for (const [role, bucket] of roleEntries(roleBuckets)) {
      const employee = ro.assignees[role];
      const hours = ro.buckets[bucket];
      if (!isAssigned(employee) || !(hours > 0)) continue;
      addTo(out, employee.trim(), hours);
    }
    return out;
  },
};

export const allocationSource: CreditSource = {
  kind: CreditSourceKind.Allocation,

  recipients({ allocations }, role) {
    const percentByEmployee = new Map<string, number>();
    for (const a of allocations) {
      if (a.role !== role || !(a.percent > 0) || !isAssigned(a.employee)) continue;
      addTo(percentByEmployee, a.employee.trim(), a.percent);
    }
    return Array.from(percentByEmployee, ([employee, percent]) => ({
      employee,
      fraction: percent / 100,
      tag: { employee, percent },
    }));
  },

  expectedTotals({ ro, allocations }, roleBuckets) {
    const out = new Map<string, number>();
    for (const a of allocations) {
      if (!(a.percent > 0) || !isAssigned(a.employee)) continue;
      const bucket = roleBuckets[a.role];
      // Roles without a bucket (estimator by default) draw on the RO total.
      const hours = bucket ? ro.buckets[bucket] : ro.totalHours;
      if (!(hours > 0)) continue;
      addTo(out, a.employee.trim(), (hours * a.percent) / 100);
    }
    return out;
  },
};

export function creditSourceFor(kind: CreditSourceKind): CreditSource {
  return kind === CreditSourceKind.Allocation ? allocationSource : roleFieldSource;
}

export function parseCreditSourceKind(raw: string | null | undefined): CreditSourceKind {
  const v = String(raw ?? '').trim().toLowerCase();
  return v === CreditSourceKind.Allocation ? CreditSourceKind.Allocation : CreditSourceKind.RoleField;
}
