import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { roundHours, type LedgerConfig } from '@rocredit/shared';

import type { AppDb } from '../database/db.js';
import { generatedCreditRows } from '../services/credit/creditLedgerService.js';
import { summary } from '../services/credit/creditSummaryService.js';
import { setOverride } from '../services/credit/creditOverrideService.js';
import { resolveLedgerConfig } from '../services/ledgerConfigService.js';
import { changeStage, setAllocations, updateRepairOrder } from '../services/repairOrderService.js';
import { addTimeClock, hoursBetween } from '../services/timeClockService.js';
import { allocationConfig, freshDb, seedRepairOrder, setClock } from './utils/ledgerFixtures.js';

describe('credit summary', () => {
  let db: AppDb;

  beforeEach(() => {
    delete process.env.CREDIT_SOURCE;
    vi.useFakeTimers({ toFake: ['Date'] });
    setClock('2026-03-02T10:00:00Z');
    db = freshDb();
    seedRepairOrder(db, { roNumber: 'RO-1001', bodyHours: 40, bodyTech: 'Alice' });
    changeStage(db, 'RO-1001', 'Paint', resolveLedgerConfig(db));
    setClock('2026-03-05T09:00:00Z');
    updateRepairOrder(db, 'RO-1001', { bodyHours: 50 }, resolveLedgerConfig(db));
    addTimeClock(db, { date: '2026-03-02', employee: 'Alice', clockIn: '08:00', clockOut: '16:30' });
    addTimeClock(db, { date: '2026-03-05', employee: 'Alice', hours: 4.5 });
    addTimeClock(db, { date: '2026-03-05', employee: 'Zed', hours: 3 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('sums worked and credited hours per employee', () => {
    expect(summary(db)).toEqual([
      { employee: 'Alice', workedHours: 13, creditedHours: 30, efficiency: 2.31 },
      { employee: 'Zed', workedHours: 3, creditedHours: 0, efficiency: 0 },
    ]);
  });

  it('applies overrides to posted credit', () => {
    setOverride(
      db,
      { roNumber: 'RO-1001', fromStage: 'Body', toStage: 'Paint', note: 'Body 60% of 40.00h on Body→Paint' },
      { hours: 20 },
    );
    expect(summary(db)[0]).toEqual({ employee: 'Alice', workedHours: 13, creditedHours: 26, efficiency: 2 });
  });

  it('moves credit to the override tech', () => {
    setOverride(
      db,
      { roNumber: 'RO-1001', fromStage: 'Body', toStage: 'Paint', note: 'Supplement +10.00h (Body 60%)' },
      { tech: 'Zed' },
    );
    expect(summary(db).map((r) => [r.employee, r.creditedHours])).toEqual([
      ['Alice', 24],
      ['Zed', 6],
    ]);
  });

  it('filters both sources by date range', () => {
    expect(summary(db, { from: '2026-03-03', to: '2026-03-31' })).toEqual([
      { employee: 'Alice', workedHours: 4.5, creditedHours: 6, efficiency: 1.33 },
      { employee: 'Zed', workedHours: 3, creditedHours: 0, efficiency: 0 },
    ]);
  });
});

describe('credited hours follow the generated rows', () => {
  let db: AppDb;

  function expectCreditedMatchesRows(config: LedgerConfig) {
    const fromRows = new Map<string, number>();
    for (const row of generatedCreditRows(db, config)) {
      fromRows.set(row.employee, (fromRows.get(row.employee) ?? 0) + row.hours);
    }
    const expected = Array.from(fromRows, ([employee, hours]): [string, number] => [employee, roundHours(hours)])
      .filter(([, hours]) => hours !== 0)
      .sort((a, b) => a[0].localeCompare(b[0]));
    const credited = summary(db)
      .filter((r) => r.creditedHours !== 0)
      .map((r): [string, number] => [r.employee, r.creditedHours]);
    expect(credited).toEqual(expected);
  }

  beforeEach(() => {
    delete process.env.CREDIT_SOURCE;
    vi.useFakeTimers({ toFake: ['Date'] });
    setClock('2026-04-06T08:00:00Z');
    db = freshDb();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('through bucket edits, reassignments and overrides', () => {
    const config = () => resolveLedgerConfig(db);
    seedRepairOrder(db, { roNumber: 'RO-4001', bodyHours: 40, bodyTech: 'Alice', refinishHours: 10, painter: 'Pat' });
    seedRepairOrder(db, { roNumber: 'RO-4002', bodyHours: 12, bodyTech: 'Carol' });

    changeStage(db, 'RO-4001', 'Paint', config());
    expectCreditedMatchesRows(config());

    setOverride(
      db,
      { roNumber: 'RO-4001', fromStage: 'Body', toStage: 'Paint', note: 'Body 60% of 40.00h on Body→Paint' },
      { hours: 20, tech: 'Zed' },
    );
    expectCreditedMatchesRows(config());

    updateRepairOrder(db, 'RO-4001', { bodyTech: 'Bob' }, config());
    expectCreditedMatchesRows(config());

    setClock('2026-04-07T08:00:00Z');
    for (const hours of [50, 40, 50]) {
      updateRepairOrder(db, 'RO-4001', { bodyHours: hours }, config());
      expectCreditedMatchesRows(config());
    }

    changeStage(db, 'RO-4001', 'Reassembly', config());
    changeStage(db, 'RO-4001', 'Detail', config());
    expectCreditedMatchesRows(config());

    updateRepairOrder(db, 'RO-4001', { painter: 'Quinn', refinishHours: 12 }, config());
    changeStage(db, 'RO-4002', 'QC', config());
    updateRepairOrder(db, 'RO-4002', { bodyTech: 'Alice' }, config());
    expectCreditedMatchesRows(config());
  });

  it('through allocation changes', () => {
    const config = () => allocationConfig(db);
    seedRepairOrder(db, { roNumber: 'RO-4003', bodyHours: 50 }, config());
    setAllocations(
      db,
      'RO-4003',
      [
        { employee: 'Bob', role: 'body_tech', percent: 60 },
        { employee: 'Carol', role: 'body_tech', percent: 40 },
      ],
      config(),
    );
    changeStage(db, 'RO-4003', 'Paint', config());
    expectCreditedMatchesRows(config());

    setAllocations(
      db,
      'RO-4003',
      [
        { employee: 'Bob', role: 'body_tech', percent: 50 },
        { employee: 'Dana', role: 'body_tech', percent: 50 },
      ],
      config(),
    );
    expectCreditedMatchesRows(config());

    updateRepairOrder(db, 'RO-4003', { bodyHours: 60 }, config());
    expectCreditedMatchesRows(config());

    setAllocations(db, 'RO-4003', [{ employee: 'Bob', role: 'body_tech', percent: 100 }], config());
    expectCreditedMatchesRows(config());
    expect(summary(db).map((r) => [r.employee, r.creditedHours])).toEqual([['Bob', 36]]);
  });
});

describe('time clock hours', () => {
  it('handles overnight shifts', () => {
    expect(hoursBetween('08:00', '16:30')).toBe(8.5);
    expect(hoursBetween('22:00', '06:15')).toBe(8.25);
    expect(hoursBetween('8am', '16:30')).toBe(null);
  });

  it('rejects entries without hours or clock times', () => {
    const db = freshDb();
    expect(addTimeClock(db, { date: '2026-03-02', employee: 'Alice' })).toEqual({
      ok: false,
      error: 'hours or both clock times are required',
    });
    expect(addTimeClock(db, { date: '2026-3-2', employee: 'Alice', hours: 1 })).toEqual({
      ok: false,
      error: 'date must be YYYY-MM-DD',
    });
  });
});
