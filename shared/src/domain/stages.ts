// Ordered workshop stages. The order is owned by settings and may change at runtime,
// so nothing here caches an index: every predicate resolves positions from the list it gets.

export const DEFAULT_STAGES: readonly string[] = [
  'New Entry',
  'Intake',
  'Disassembly',
  'Body',
  'Paint',
  'Reassembly',
  'Mechanical',
  'Detail',
  'QC',
  'Deliver',
];

export function stageIndex(stages: readonly string[], name: string): number {
  return stages.indexOf(name);
}

export function isKnownStage(stages: readonly string[], name: string): boolean {
  return stageIndex(stages, name) >= 0;
}

export function isAtOrAfter(stages: readonly string[], stage: string, target: string): boolean {
  const a = stageIndex(stages, stage);
  const b = stageIndex(stages, target);
  if (a < 0 || b < 0) return false;
  return a >= b;
}

export function isAfter(stages: readonly string[], stage: string, target: string): boolean {
  const a = stageIndex(stages, stage);
  const b = stageIndex(stages, target);
  if (a < 0 || b < 0) return false;
  return a > b;
}

export function stageConfigVersion(stages: readonly string[]): string {
  // FNV-1a over the joined names.
  let h = 0x811c9dc5;
  const joined = stages.join('\u0000');
  for (let i = 0; i < joined.length; i += 1) {
    h ^= joined.charCodeAt(i);
    h = Math.imul(h, 0x01000193) >>> 0;
  }
  return `${stages.length}:${h.toString(16).padStart(8, '0')}`;
}
