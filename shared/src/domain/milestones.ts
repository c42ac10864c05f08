import { EmployeeRole, HourBucket, type StageTransition } from './repairOrder.js';
import { isAfter, isAtOrAfter } from './stages.js';

export type MilestoneTarget =
  | { kind: 'at_or_after'; stage: string }
  | { kind: 'after'; stage: string };

export type MilestonePattern = {
  from: string;
  to: MilestoneTarget;
};

export type MilestoneDefinition = {
  id: string;
  label: string;
  pattern: MilestonePattern;
  bucket: HourBucket;
  role: EmployeeRole;
  share: number;
};

export const DEFAULT_MILESTONES: readonly MilestoneDefinition[] = [
  {
    id: 'body_60',
    label: 'Body 60%',
    pattern: { from: 'Body', to: { kind: 'at_or_after', stage: 'Paint' } },
    bucket: HourBucket.Body,
    role: EmployeeRole.BodyTech,
    share: 0.6,
  },
  {
    id: 'body_40',
    label: 'Body 40%',
    pattern: { from: 'Reassembly', to: { kind: 'after', stage: 'Reassembly' } },
    bucket: HourBucket.Body,
    role: EmployeeRole.BodyTech,
    share: 0.4,
  },
  {
    id: 'paint_100',
    label: 'Refinish 100%',
    pattern: { from: 'Paint', to: { kind: 'after', stage: 'Paint' } },
    bucket: HourBucket.Refinish,
    role: EmployeeRole.Painter,
    share: 1,
  },
  {
    id: 'mechanical_100',
    label: 'Mechanical 100%',
    pattern: { from: 'Mechanical', to: { kind: 'after', stage: 'Mechanical' } },
    bucket: HourBucket.Mechanical,
    role: EmployeeRole.Mechanic,
    share: 1,
  },
];

export function matchesTarget(stages: readonly string[], toStage: string, target: MilestoneTarget): boolean {
  switch (target.kind) {
    case 'at_or_after':
      return isAtOrAfter(stages, toStage, target.stage);
    case 'after':
      return isAfter(stages, toStage, target.stage);
  }
}

/**
 * First transition, in log order, that leaves `pattern.from` for a stage satisfying
 * `pattern.to`. Callers must pass transitions already sorted by (occurredAt, id).
 */
export function findMilestoneTransition(
  transitions: readonly StageTransition[],
  pattern: MilestonePattern,
  stages: readonly string[],
): StageTransition | null {
  for (const t of transitions) {
    if (t.fromStage !== pattern.from) continue;
    if (matchesTarget(stages, t.toStage, pattern.to)) return t;
  }
  return null;
}

export function findMilestone(milestones: readonly MilestoneDefinition[], id: string): MilestoneDefinition | null {
  return milestones.find((m) => m.id === id) ?? null;
}

export function findMilestoneByLabel(
  milestones: readonly MilestoneDefinition[],
  label: string,
): MilestoneDefinition | null {
  return milestones.find((m) => m.label === label) ?? null;
}

export function validateMilestones(milestones: readonly MilestoneDefinition[]): string[] {
  const errors: string[] = [];
  const ids = new Set<string>();
  const labels = new Set<string>();
  for (const m of milestones) {
    if (ids.has(m.id)) errors.push(`duplicate milestone id: ${m.id}`);
    if (labels.has(m.label)) errors.push(`duplicate milestone label: ${m.label}`);
    ids.add(m.id);
    labels.add(m.label);
    if (!(m.share > 0 && m.share <= 1)) errors.push(`milestone ${m.id}: share must be in (0, 1]`);
  }
  return errors;
}
