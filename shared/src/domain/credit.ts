import type { CreditSourceKind, RoleBuckets } from './creditSource.js';
import type { MilestoneDefinition } from './milestones.js';

// Residuals below this are float noise, not bucket edits.
export const LEDGER_EPSILON = 1e-6;
// Close-time reconciliation ignores differences up to this many hours.
export const RECONCILE_TOLERANCE = 0.01;
// Matching a displayed supplement back to its adjustment row.
export const SUPPLEMENT_MATCH_TOLERANCE = 1e-5;

export type LedgerConfig = {
  version: string;
  stages: readonly string[];
  milestones: readonly MilestoneDefinition[];
  creditSource: CreditSourceKind;
  roleBuckets: RoleBuckets;
};

/** Identity of a generated credit row; overrides are keyed by it. */
export type CreditRowKey = {
  roNumber: string;
  fromStage: string;
  toStage: string;
  note: string;
};

export type CreditRowKind = 'baseline' | 'supplement';

export type CreditRow = CreditRowKey & {
  date: string;
  employee: string;
  hours: number;
  milestoneId: string;
  // Null for baseline rows.
  adjustmentId: number | null;
  kind: CreditRowKind;
  overridden: boolean;
};

/**
 * Ties an audit posting to the ledger entry that generated it, so that recompute can
 * retract postings the ledger no longer renders. Notes alone are not unique: two
 * adjustments with the same signed delta share one.
 */
export function ledgerSourceKey(row: { milestoneId: string; adjustmentId: number | null }): string {
  return row.adjustmentId === null ? `baseline:${row.milestoneId}` : `adjustment:${row.adjustmentId}`;
}

export type CreditOverrideFields = {
  date?: string | null;
  tech?: string | null;
  hours?: number | null;
};

export type CreditOverride = CreditRowKey & {
  date: string | null;
  tech: string | null;
  hours: number | null;
};

export type CreditAuditEntry = {
  id: number;
  date: string;
  roNumber: string;
  employee: string;
  hours: number;
  note: string;
  fromStage: string | null;
  toStage: string | null;
  // Null for close adjustments and manual postings.
  sourceKey: string | null;
};

export type PostCreditMode = 'always' | 'idempotent';

export type CreditSummaryRow = {
  employee: string;
  workedHours: number;
  creditedHours: number;
  efficiency: number;
};

export type DeleteCreditRowsResult = {
  deleted: number;
  skippedBaseline: number;
  notFound: number;
};

export function roundHours(value: number): number {
  return Math.round(value * 100) / 100;
}
