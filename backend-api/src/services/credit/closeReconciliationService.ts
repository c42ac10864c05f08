import {
  CLOSE_ADJUSTMENT_NOTE,
  RECONCILE_TOLERANCE,
  creditSourceFor,
  type LedgerConfig,
} from '@rocredit/shared';

import type { SqlExecutor } from '../../database/db.js';
import { createLogger } from '../../utils/logger.js';
import { postCredit, postedTotalsByEmployee } from './creditAuditService.js';
import { loadAllocations, loadRepairOrder } from './ledgerReads.js';

const log = createLogger('close-reconcile');

export type CloseAdjustment = {
  employee: string;
  expectedHours: number;
  postedHours: number;
  deltaHours: number;
};

export type CloseReconcileResult =
  | { ok: true; roNumber: string; adjustments: CloseAdjustment[] }
  | { ok: false; error: string };

/**
 * Posts, per employee, the signed difference between the credit the RO owes and what the
 * audit log already holds. Works from current state only, so running it twice is harmless.
 */
export function closeReconcile(db: SqlExecutor, roNumber: string, config: LedgerConfig): CloseReconcileResult {
  return db.transaction(
    (tx): CloseReconcileResult => {
      const ro = loadRepairOrder(tx, roNumber);
      if (!ro) return { ok: false, error: 'repair order not found' };

      const source = creditSourceFor(config.creditSource);
      const expected = source.expectedTotals({ ro, allocations: loadAllocations(tx, roNumber) }, config.roleBuckets);
      const posted = postedTotalsByEmployee(tx, roNumber);

      const employees = Array.from(new Set([...expected.keys(), ...posted.keys()])).sort((a, b) => a.localeCompare(b));
      const adjustments: CloseAdjustment[] = [];
      for (const employee of employees) {
        const expectedHours = expected.get(employee) ?? 0;
        const postedHours = posted.get(employee) ?? 0;
        const deltaHours = expectedHours - postedHours;
        if (Math.abs(deltaHours) <= RECONCILE_TOLERANCE) continue;
        const written = postCredit(tx, { roNumber, employee, hours: deltaHours, note: CLOSE_ADJUSTMENT_NOTE }, 'always');
        if (!written) continue;
        adjustments.push({ employee, expectedHours, postedHours, deltaHours });
        log.info('close adjustment posted', { roNumber, employee, deltaHours });
      }
      return { ok: true, roNumber, adjustments };
    },
    { behavior: 'immediate' },
  );
}
