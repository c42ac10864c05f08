// Credit-row notes double as identity: overrides are keyed by (ro, from, to, note)
// and the audit writer deduplicates on (ro, employee, note). Keep these formats stable.

export const CLOSE_ADJUSTMENT_NOTE = 'Adjustment on close (recalc)';

const SUPPLEMENT_PREFIX = 'Supplement ';

export type AllocationTag = {
  employee: string;
  percent: number;
};

export type ParsedCreditNote =
  | { kind: 'baseline'; label: string; baseHours: number; fromStage: string; toStage: string; allocation: AllocationTag | null }
  | { kind: 'supplement'; label: string; sign: 1 | -1; magnitude: number; allocation: AllocationTag | null }
  | { kind: 'close_adjustment' }
  | { kind: 'other' };

export function formatHours(value: number): string {
  return Math.abs(value) < 0.005 ? '0.00' : value.toFixed(2);
}

export function formatPercent(percent: number): string {
  return String(Number(percent.toFixed(2)));
}

export function baselineNote(label: string, baseHours: number, fromStage: string, toStage: string): string {
  return `${label} of ${formatHours(baseHours)}h on ${fromStage}→${toStage}`;
}

export function supplementNote(label: string, deltaHours: number): string {
  const sign = deltaHours >= 0 ? '+' : '-';
  return `${SUPPLEMENT_PREFIX}${sign}${formatHours(Math.abs(deltaHours))}h (${label})`;
}

export function withAllocationTag(note: string, tag: AllocationTag): string {
  return `${note} [${tag.employee} ${formatPercent(tag.percent)}%]`;
}

const TAG_RE = /^(.*) \[(.+) (\d+(?:\.\d+)?)%\]$/;
const BASELINE_RE = /^(.+) of (-?\d+\.\d{2})h on (.+)→(.+)$/;
const SUPPLEMENT_RE = /^Supplement ([+-])(\d+\.\d{2})h \((.+)\)$/;

function splitTag(note: string): { body: string; allocation: AllocationTag | null } {
  const m = TAG_RE.exec(note);
  if (!m) return { body: note, allocation: null };
  return { body: m[1] ?? '', allocation: { employee: m[2] ?? '', percent: Number(m[3]) } };
}

/** The note without its ` [Employee P%]` allocation suffix. */
export function stripAllocationTag(note: string): string {
  return splitTag(note.trim()).body;
}

export function parseCreditNote(note: string): ParsedCreditNote {
  const trimmed = note.trim();
  if (trimmed === CLOSE_ADJUSTMENT_NOTE) return { kind: 'close_adjustment' };
  const { body, allocation } = splitTag(trimmed);

  const sup = SUPPLEMENT_RE.exec(body);
  if (sup) {
    return {
      kind: 'supplement',
      sign: sup[1] === '-' ? -1 : 1,
      magnitude: Number(sup[2]),
      label: sup[3] ?? '',
      allocation,
    };
  }
  // Malformed supplement notes are never baselines.
  if (body.startsWith(SUPPLEMENT_PREFIX)) return { kind: 'other' };

  const base = BASELINE_RE.exec(body);
  if (base) {
    return {
      kind: 'baseline',
      label: base[1] ?? '',
      baseHours: Number(base[2]),
      fromStage: base[3] ?? '',
      toStage: base[4] ?? '',
      allocation,
    };
  }
  return { kind: 'other' };
}

export function isBaselineNote(note: string, labels: readonly string[]): boolean {
  const parsed = parseCreditNote(note);
  return parsed.kind === 'baseline' && labels.includes(parsed.label);
}

export function isSupplementNote(note: string): boolean {
  return parseCreditNote(note).kind === 'supplement';
}
