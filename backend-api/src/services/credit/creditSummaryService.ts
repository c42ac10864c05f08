import { roundHours, type CreditSummaryRow } from '@rocredit/shared';

import type { SqlExecutor } from '../../database/db.js';
import { creditAudit, creditOverrides } from '../../database/schema.js';
import { workedTotalsByEmployee, type DateRange } from '../timeClockService.js';

function inRange(date: string, range: DateRange): boolean {
  if (range.from && date < range.from) return false;
  if (range.to && date > range.to) return false;
  return true;
}

function nonBlank(v: string | null): string | null {
  const t = String(v ?? '').trim();
  return t ? t : null;
}

/**
 * Per-employee worked vs credited hours. Credited hours come from the audit log; an entry
 * posted from a generated row takes the date, employee and hours of that row's override.
 */
export function summary(db: SqlExecutor, range: DateRange = {}): CreditSummaryRow[] {
  const overrides = new Map<string, typeof creditOverrides.$inferSelect>();
  for (const o of db.select().from(creditOverrides).all()) {
    overrides.set([o.roNumber, o.fromStage, o.toStage, o.note].join('\u0000'), o);
  }

  const credited = new Map<string, number>();
  for (const e of db.select().from(creditAudit).all()) {
    let { date, employee, hours } = e;
    if (e.fromStage !== null && e.toStage !== null) {
      const o = overrides.get([e.roNumber, e.fromStage, e.toStage, e.note].join('\u0000'));
      if (o) {
        date = nonBlank(o.date) ?? date;
        employee = nonBlank(o.tech) ?? employee;
        hours = o.hours ?? hours;
      }
    }
    if (!inRange(date, range)) continue;
    credited.set(employee, (credited.get(employee) ?? 0) + hours);
  }

  const worked = workedTotalsByEmployee(db, range);
  const names = Array.from(new Set([...worked.keys(), ...credited.keys()])).sort((a, b) => a.localeCompare(b));
  return names.map((employee) => {
    const workedHours = worked.get(employee) ?? 0;
    const creditedHours = credited.get(employee) ?? 0;
    return {
      employee,
      workedHours: roundHours(workedHours),
      creditedHours: roundHours(creditedHours),
      efficiency: workedHours > 0 ? roundHours(creditedHours / workedHours) : 0,
    };
  });
}
