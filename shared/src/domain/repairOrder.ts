export const RepairOrderStatus = {
  Open: 'open',
  OnHold: 'on_hold',
  Closed: 'closed',
} as const;

export type RepairOrderStatus = (typeof RepairOrderStatus)[keyof typeof RepairOrderStatus];

export const REPAIR_ORDER_STATUS_LABELS: Record<RepairOrderStatus, string> = {
  open: 'Open',
  on_hold: 'On Hold',
  closed: 'Closed',
};

export const EmployeeRole = {
  Estimator: 'estimator',
  BodyTech: 'body_tech',
  Painter: 'painter',
  Mechanic: 'mechanic',
} as const;

export type EmployeeRole = (typeof EmployeeRole)[keyof typeof EmployeeRole];

export const HourBucket = {
  Body: 'body_hours',
  Refinish: 'refinish_hours',
  Mechanical: 'mechanical_hours',
} as const;

export type HourBucket = (typeof HourBucket)[keyof typeof HourBucket];

// Placeholder the forms use for "nobody assigned"; never credited.
export const UNASSIGNED = 'Unassigned';

export type RepairOrderAssignees = Record<EmployeeRole, string>;

export type RepairOrderBuckets = Record<HourBucket, number>;

export type RepairOrder = {
  roNumber: string;
  date: string;
  totalHours: number;
  buckets: RepairOrderBuckets;
  assignees: RepairOrderAssignees;
  currentStage: string;
  status: RepairOrderStatus;
  hoursTaken: number;
  hoursRemaining: number;
};

export type RoAllocation = {
  roNumber: string;
  employee: string;
  role: EmployeeRole;
  percent: number;
};

export type StageTransition = {
  id: number;
  roNumber: string;
  fromStage: string;
  toStage: string;
  occurredAt: number;
};

export function isAssigned(employee: string | null | undefined): employee is string {
  const v = String(employee ?? '').trim();
  return v.length > 0 && v !== UNASSIGNED;
}
