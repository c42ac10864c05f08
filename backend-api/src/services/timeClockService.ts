import { and, asc, eq, gte, lte, type Column, type SQL } from 'drizzle-orm';

import { roundHours } from '@rocredit/shared';

import type { SqlExecutor } from '../database/db.js';
import { timeClockRecords } from '../database/schema.js';
import { isIsoDay } from '../utils/dates.js';

export type TimeClockEntry = {
  id: number;
  date: string;
  employee: string;
  clockIn: string;
  clockOut: string;
  hours: number;
};

export type DateRange = { from?: string; to?: string };

const HHMM_RE = /^([01]\d|2[0-3]):([0-5]\d)$/;

function minutesOf(hhmm: string): number | null {
  const m = HHMM_RE.exec(hhmm);
  if (!m) return null;
  return Number(m[1]) * 60 + Number(m[2]);
}

/** Hours between two HH:MM clock times; an out time before the in time is an overnight shift. */
export function hoursBetween(clockIn: string, clockOut: string): number | null {
  const a = minutesOf(clockIn);
  const b = minutesOf(clockOut);
  if (a === null || b === null) return null;
  const span = b >= a ? b - a : b + 24 * 60 - a;
  return roundHours(span / 60);
}

export function dateRangeWhere(column: Column, range: DateRange): SQL | undefined {
  const parts: SQL[] = [];
  if (range.from) parts.push(gte(column, range.from));
  if (range.to) parts.push(lte(column, range.to));
  return parts.length > 0 ? and(...parts) : undefined;
}

export function listTimeClock(db: SqlExecutor, filter: DateRange & { employee?: string } = {}): TimeClockEntry[] {
  const conds: SQL[] = [];
  const range = dateRangeWhere(timeClockRecords.date, filter);
  if (range) conds.push(range);
  if (filter.employee) conds.push(eq(timeClockRecords.employee, filter.employee));
  return db
    .select()
    .from(timeClockRecords)
    .where(conds.length > 0 ? and(...conds) : undefined)
    .orderBy(asc(timeClockRecords.date), asc(timeClockRecords.employee), asc(timeClockRecords.clockIn))
    .all();
}

export type TimeClockInput = {
  date: string;
  employee: string;
  clockIn?: string;
  clockOut?: string;
  hours?: number | null;
};

export function addTimeClock(db: SqlExecutor, input: TimeClockInput) {
  const employee = input.employee.trim();
  if (!employee) return { ok: false as const, error: 'employee is required' };
  if (!isIsoDay(input.date)) return { ok: false as const, error: 'date must be YYYY-MM-DD' };
  const clockIn = (input.clockIn ?? '').trim();
  const clockOut = (input.clockOut ?? '').trim();

  let hours = input.hours ?? null;
  if (hours === null) {
    if (!clockIn || !clockOut) return { ok: false as const, error: 'hours or both clock times are required' };
    hours = hoursBetween(clockIn, clockOut);
    if (hours === null) return { ok: false as const, error: 'clock times must be HH:MM' };
  }
  if (!Number.isFinite(hours) || hours < 0) return { ok: false as const, error: 'hours must be a non-negative number' };

  const row = db
    .insert(timeClockRecords)
    .values({ date: input.date, employee, clockIn, clockOut, hours })
    .returning()
    .get();
  return { ok: true as const, entry: row };
}

export function deleteTimeClock(db: SqlExecutor, id: number): boolean {
  return db.delete(timeClockRecords).where(eq(timeClockRecords.id, id)).run().changes > 0;
}

export function workedTotalsByEmployee(db: SqlExecutor, range: DateRange = {}): Map<string, number> {
  const out = new Map<string, number>();
  for (const e of listTimeClock(db, range)) {
    out.set(e.employee, (out.get(e.employee) ?? 0) + e.hours);
  }
  return out;
}
