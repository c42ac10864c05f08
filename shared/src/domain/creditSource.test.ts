import { describe, expect, it } from 'vitest';

import {
  DEFAULT_ROLE_BUCKETS,
  allocationSource,
  creditSourceFor,
  parseCreditSourceKind,
  roleFieldSource,
} from './creditSource.js';
import { EmployeeRole, type RepairOrder, type RoAllocation } from './repairOrder.js';

function makeRo(overrides: Partial<RepairOrder> = {}): RepairOrder {
  return {
    roNumber: 'RO-7',
    date: '2026-03-01',
    totalHours: 60,
    buckets: { body_hours: 40, refinish_hours: 10, mechanical_hours: 0 },
    assignees: { estimator: 'Eve', body_tech: 'Tom', painter: 'Unassigned', mechanic: 'Mia' },
    currentStage: 'Body',
    status: 'open',
    hoursTaken: 0,
    hoursRemaining: 60,
    ...overrides,
  };
}

const allocations: RoAllocation[] = [
  { roNumber: 'RO-7', employee: 'Tom', role: EmployeeRole.BodyTech, percent: 50 },
  { roNumber: 'RO-7', employee: 'Sam', role: EmployeeRole.BodyTech, percent: 30 },
  { roNumber: 'RO-7', employee: 'Tom', role: EmployeeRole.BodyTech, percent: 20 },
  { roNumber: 'RO-7', employee: 'Pat', role: EmployeeRole.Painter, percent: 100 },
  { roNumber: 'RO-7', employee: 'Eve', role: EmployeeRole.Estimator, percent: 10 },
];

describe('role field credit source', () => {
  it('credits the single assignee in full', () => {
    expect(roleFieldSource.recipients({ ro: makeRo(), allocations: [] }, EmployeeRole.BodyTech)).toEqual([
      { employee: 'Tom', fraction: 1, tag: null },
    ]);
  });

  it('skips unassigned roles', () => {
    expect(roleFieldSource.recipients({ ro: makeRo(), allocations: [] }, EmployeeRole.Painter)).toEqual([]);
  });

  it('expects 100% of every non-empty bucket with an assignee', () => {
    const totals = roleFieldSource.expectedTotals({ ro: makeRo(), allocations: [] }, DEFAULT_ROLE_BUCKETS);
    // painter unassigned, mechanical bucket empty
    expect(Object.fromEntries(totals)).toEqual({ Tom: 40 });
  });
});

describe('allocation credit source', () => {
  it('merges duplicate allocations per employee and tags them', () => {
    expect(allocationSource.recipients({ ro: makeRo(), allocations }, EmployeeRole.BodyTech)).toEqual([
      { employee: 'Tom', fraction: 0.7, tag: { employee: 'Tom', percent: 70 } },
      { employee: 'Sam', fraction: 0.3, tag: { employee: 'Sam', percent: 30 } },
    ]);
  });

  it('expects bucket x percent, drawing on the total for roles without a bucket', () => {
    const totals = allocationSource.expectedTotals({ ro: makeRo(), allocations }, DEFAULT_ROLE_BUCKETS);
    expect(totals.get('Tom')).toBeCloseTo(28, 6);
    expect(totals.get('Sam')).toBeCloseTo(12, 6);
    expect(totals.get('Pat')).toBeCloseTo(10, 6);
    expect(totals.get('Eve')).toBeCloseTo(6, 6);
  });
});

describe('credit source selection', () => {
  it('defaults to the role field source', () => {
    expect(parseCreditSourceKind(undefined)).toBe('role_field');
    expect(parseCreditSourceKind(' Allocation ')).toBe('allocation');
    expect(creditSourceFor('allocation')).toBe(allocationSource);
    expect(creditSourceFor('role_field')).toBe(roleFieldSource);
  });
});
