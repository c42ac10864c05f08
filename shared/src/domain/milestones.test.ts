import { describe, expect, it } from 'vitest';

import { DEFAULT_MILESTONES, findMilestone, findMilestoneTransition, validateMilestones } from './milestones.js';
import type { StageTransition } from './repairOrder.js';
import { DEFAULT_STAGES } from './stages.js';

function t(id: number, fromStage: string, toStage: string, occurredAt = id * 1000): StageTransition {
  return { id, roNumber: 'RO-1', fromStage, toStage, occurredAt };
}

describe('milestone policy', () => {
  it('ships a valid default table', () => {
    expect(validateMilestones(DEFAULT_MILESTONES)).toEqual([]);
    expect(DEFAULT_MILESTONES.map((m) => m.id)).toEqual(['body_60', 'body_40', 'paint_100', 'mechanical_100']);
  });

  it('reports duplicate ids and out-of-range shares', () => {
    const body60 = DEFAULT_MILESTONES[0];
    if (!body60) throw new Error('missing default milestone');
    const errors = validateMilestones([body60, { ...body60, label: 'Other', share: 1.5 }]);
    expect(errors).toEqual(['duplicate milestone id: body_60', 'milestone body_60: share must be in (0, 1]']);
  });

  it('body_60 fires as soon as the RO leaves Body for Paint or later', () => {
    const body60 = findMilestone(DEFAULT_MILESTONES, 'body_60');
    if (!body60) throw new Error('missing body_60');
    const log = [t(1, 'Intake', 'Body'), t(2, 'Body', 'Paint')];
    expect(findMilestoneTransition(log, body60.pattern, DEFAULT_STAGES)?.id).toBe(2);
    // skipping straight to Reassembly also counts
    expect(findMilestoneTransition([t(1, 'Body', 'Reassembly')], body60.pattern, DEFAULT_STAGES)?.id).toBe(1);
  });

  it('body_60 ignores moves from Body backwards', () => {
    const body60 = findMilestone(DEFAULT_MILESTONES, 'body_60');
    if (!body60) throw new Error('missing body_60');
    expect(findMilestoneTransition([t(1, 'Body', 'Disassembly')], body60.pattern, DEFAULT_STAGES)).toBeNull();
  });

  it('paint_100 requires leaving Paint for a strictly later stage', () => {
    const paint = findMilestone(DEFAULT_MILESTONES, 'paint_100');
    if (!paint) throw new Error('missing paint_100');
    const log = [t(1, 'Paint', 'Body'), t(2, 'Paint', 'Reassembly'), t(3, 'Paint', 'Detail')];
    expect(findMilestoneTransition(log, paint.pattern, DEFAULT_STAGES)?.id).toBe(2);
  });

  it('returns the first match in the order given', () => {
    const body40 = findMilestone(DEFAULT_MILESTONES, 'body_40');
    if (!body40) throw new Error('missing body_40');
    const log = [t(7, 'Reassembly', 'QC', 5000), t(3, 'Reassembly', 'Detail', 5000)];
    expect(findMilestoneTransition(log, body40.pattern, DEFAULT_STAGES)?.id).toBe(7);
  });

  it('does not match when the origin stage differs only by case', () => {
    const body60 = findMilestone(DEFAULT_MILESTONES, 'body_60');
    if (!body60) throw new Error('missing body_60');
    expect(findMilestoneTransition([t(1, 'body', 'Paint')], body60.pattern, DEFAULT_STAGES)).toBeNull();
  });
});
