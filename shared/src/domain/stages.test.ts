import { describe, expect, it } from 'vitest';

import { DEFAULT_STAGES, isAfter, isAtOrAfter, isKnownStage, stageConfigVersion, stageIndex } from './stages.js';

describe('stage ordering', () => {
  it('resolves positions from the configured list, not alphabetically', () => {
    expect(stageIndex(DEFAULT_STAGES, 'Body')).toBe(3);
    expect(stageIndex(DEFAULT_STAGES, 'Paint')).toBe(4);
    expect(isAtOrAfter(DEFAULT_STAGES, 'Paint', 'Body')).toBe(true);
    expect(isAtOrAfter(DEFAULT_STAGES, 'Detail', 'QC')).toBe(false);
  });

  it('distinguishes at-or-after from strictly-after', () => {
    expect(isAtOrAfter(DEFAULT_STAGES, 'Paint', 'Paint')).toBe(true);
    expect(isAfter(DEFAULT_STAGES, 'Paint', 'Paint')).toBe(false);
    expect(isAfter(DEFAULT_STAGES, 'Reassembly', 'Paint')).toBe(true);
  });

  it('matches stage names case-sensitively', () => {
    expect(isKnownStage(DEFAULT_STAGES, 'paint')).toBe(false);
    expect(isAtOrAfter(DEFAULT_STAGES, 'paint', 'Body')).toBe(false);
  });

  it('treats unknown stages as never satisfying a predicate', () => {
    expect(isAfter(DEFAULT_STAGES, 'Wash', 'Body')).toBe(false);
    expect(isAtOrAfter(DEFAULT_STAGES, 'Deliver', 'Wash')).toBe(false);
  });

  it('follows a reordered list without any cached state', () => {
    const reordered = ['Intake', 'Paint', 'Body', 'Deliver'];
    expect(isAfter(DEFAULT_STAGES, 'Paint', 'Body')).toBe(true);
    expect(isAfter(reordered, 'Paint', 'Body')).toBe(false);
  });

  it('changes the version when names or order change', () => {
    const v1 = stageConfigVersion(['A', 'B']);
    expect(stageConfigVersion(['A', 'B'])).toBe(v1);
    expect(stageConfigVersion(['B', 'A'])).not.toBe(v1);
    expect(stageConfigVersion(['A', 'C'])).not.toBe(v1);
    expect(v1.startsWith('2:')).toBe(true);
  });
});
