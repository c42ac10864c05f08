import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import request from 'supertest';

import { stageConfigVersion } from '@rocredit/shared';

import { createApp } from '../app.js';
import type { AppDb } from '../database/db.js';
import { freshDb, setClock } from './utils/ledgerFixtures.js';

describe('backend routes', () => {
  let db: AppDb;

  beforeEach(() => {
    delete process.env.CREDIT_SOURCE;
    vi.useFakeTimers({ toFake: ['Date'] });
    setClock('2026-06-01T09:00:00Z');
    db = freshDb();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('GET /health returns ok', async () => {
    const res = await request(createApp(db)).get('/health');
    expect(res.status).toBe(200);
    expect(res.body.ok).toBe(true);
    expect(res.body.schemaVersion).toBe(3);
    expect(res.body.creditSource).toBe('role_field');
  });

  it('validates repair order input', async () => {
    const app = createApp(db);
    const missing = await request(app).post('/repair-orders').send({ totalHours: 10 });
    expect(missing.status).toBe(400);
    expect(missing.body.ok).toBe(false);

    const nonNumeric = await request(app).post('/repair-orders').send({ roNumber: 'RO-1', totalHours: 10, bodyHours: 'abc' });
    expect(nonNumeric.status).toBe(400);

    const blank = await request(app).post('/repair-orders').send({ roNumber: 'RO-1', totalHours: 10, bodyHours: '' });
    expect(blank.status).toBe(201);
    expect(blank.body.repairOrder.buckets.body_hours).toBe(0);
    expect(blank.body.repairOrder.currentStage).toBe('New Entry');

    const dup = await request(app).post('/repair-orders').send({ roNumber: 'RO-1', totalHours: 10 });
    expect(dup.status).toBe(409);
  });

  it('runs an RO from intake to close', async () => {
    const app = createApp(db);
    await request(app)
      .post('/repair-orders')
      .send({ roNumber: 'RO-2001', totalHours: 30, bodyHours: 20, bodyTech: 'Dana', currentStage: 'Body' })
      .expect(201);

    const badStage = await request(app).post('/repair-orders/RO-2001/stage').send({ stage: 'Nope' });
    expect(badStage.status).toBe(400);
    expect(badStage.body).toEqual({ ok: false, error: 'unknown stage: Nope' });

    const moved = await request(app).post('/repair-orders/RO-2001/stage').send({ stage: 'Paint' });
    expect(moved.status).toBe(200);
    expect(moved.body.repairOrder.hoursTaken).toBe(12);

    const transitions = await request(app).get('/repair-orders/RO-2001/transitions');
    expect(transitions.body.transitions).toHaveLength(1);
    expect(transitions.body.transitions[0].fromStage).toBe('Body');

    const note = 'Body 60% of 20.00h on Body→Paint';
    await request(app)
      .put('/credits/overrides')
      .send({ roNumber: 'RO-2001', fromStage: 'Body', toStage: 'Paint', note, hours: 10 })
      .expect(200);

    const rows = await request(app).get('/credits/rows').query({ ro: 'RO-2001' });
    expect(rows.body.rows).toHaveLength(1);
    expect(rows.body.rows[0].hours).toBe(10);
    expect(rows.body.rows[0].overridden).toBe(true);

    const closed = await request(app).post('/repair-orders/RO-2001/status').send({ status: 'closed' });
    expect(closed.status).toBe(200);
    expect(closed.body.reconciliation.adjustments).toHaveLength(1);
    expect(closed.body.reconciliation.adjustments[0].employee).toBe('Dana');
    expect(closed.body.reconciliation.adjustments[0].deltaHours).toBeCloseTo(8, 6);

    const audit = await request(app).get('/credits/audit').query({ ro: 'RO-2001' });
    expect(audit.body.rows.map((e: { note: string }) => e.note)).toEqual(['Adjustment on close (recalc)', note]);

    const report = await request(app).get('/reports/summary');
    expect(report.body.rows).toEqual([{ employee: 'Dana', workedHours: 0, creditedHours: 18, efficiency: 0 }]);
  });

  it('returns 404 for unknown repair orders', async () => {
    const app = createApp(db);
    expect((await request(app).get('/repair-orders/RO-404')).status).toBe(404);
    expect((await request(app).post('/credits/recompute/RO-404')).status).toBe(404);
    expect((await request(app).delete('/repair-orders/RO-404')).status).toBe(404);
  });

  it('manages stage settings and lists statuses', async () => {
    const app = createApp(db);
    const bad = await request(app).put('/settings/stages').send({ stages: ['A', 'A'] });
    expect(bad.status).toBe(400);
    expect(bad.body.error).toBe('stage names must be unique');

    await request(app).put('/settings/stages').send({ stages: ['Intake', 'Body', 'Paint'] }).expect(200);
    const stages = await request(app).get('/settings/stages');
    expect(stages.body.stages).toEqual(['Intake', 'Body', 'Paint']);
    expect(stages.body.version).toBe(stageConfigVersion(['Intake', 'Body', 'Paint']));

    const stale = await request(app)
      .put('/settings/stages')
      .send({ stages: ['Intake', 'Paint'], version: stageConfigVersion(['Intake', 'Body']) });
    expect(stale.status).toBe(409);
    expect(stale.body).toEqual({ ok: false, error: 'stage settings changed since they were read', conflict: true });

    const saved = await request(app)
      .put('/settings/stages')
      .send({ stages: ['Intake', 'Paint'], version: stages.body.version });
    expect(saved.status).toBe(200);
    expect(saved.body.version).toBe(stageConfigVersion(['Intake', 'Paint']));
    expect((await request(app).get('/settings/stages')).body.stages).toEqual(['Intake', 'Paint']);

    const statuses = await request(app).get('/settings/statuses');
    expect(statuses.body.statuses).toEqual([
      { code: 'open', label: 'Open' },
      { code: 'on_hold', label: 'On Hold' },
      { code: 'closed', label: 'Closed' },
    ]);
  });

  it('maintains the employee directory and books credit to canonical names', async () => {
    const app = createApp(db);
    await request(app).post('/employees').send({ name: 'Daniel Ortiz', nickname: 'Danny', roles: ['body_tech'] }).expect(200);
    const list = await request(app).get('/employees');
    expect(list.body.rows).toEqual([{ name: 'Daniel Ortiz', nickname: 'Danny', roles: ['body_tech'] }]);

    const created = await request(app)
      .post('/repair-orders')
      .send({ roNumber: 'RO-3', totalHours: 5, bodyTech: 'Danny', currentStage: 'Body' });
    expect(created.body.repairOrder.assignees.body_tech).toBe('Daniel Ortiz');

    expect((await request(app).delete('/employees/Daniel%20Ortiz')).status).toBe(200);
    expect((await request(app).delete('/employees/Daniel%20Ortiz')).status).toBe(404);
  });

  it('records worked hours', async () => {
    const app = createApp(db);
    const created = await request(app)
      .post('/time-clock')
      .send({ date: '2026-06-01', employee: 'Dana', clockIn: '07:30', clockOut: '15:00' });
    expect(created.status).toBe(201);
    expect(created.body.entry.hours).toBe(7.5);

    const list = await request(app).get('/time-clock').query({ employee: 'Dana' });
    expect(list.body.rows).toHaveLength(1);

    expect((await request(app).delete('/time-clock/abc')).status).toBe(400);
    expect((await request(app).delete(`/time-clock/${created.body.entry.id}`)).status).toBe(200);
  });

  it('answers 400 on malformed json', async () => {
    const res = await request(createApp(db)).post('/employees').set('Content-Type', 'application/json').send('{bad');
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ ok: false, error: 'invalid json' });
  });
});
