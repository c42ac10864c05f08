import { Router } from 'express';
import { z } from 'zod';

import type { AppDb } from '../database/db.js';
import { addTimeClock, deleteTimeClock, listTimeClock } from '../services/timeClockService.js';

const isoDay = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

export function timeClockRouter(db: AppDb) {
  const router = Router();

  router.get('/', (req, res) => {
    try {
      const schema = z.object({ from: isoDay.optional(), to: isoDay.optional(), employee: z.string().min(1).optional() });
      const parsed = schema.safeParse(req.query);
      if (!parsed.success) return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      const { from, to, employee } = parsed.data;
      const rows = listTimeClock(db, {
        ...(from !== undefined && { from }),
        ...(to !== undefined && { to }),
        ...(employee !== undefined && { employee }),
      });
      return res.json({ ok: true, rows });
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.post('/', (req, res) => {
    try {
      const schema = z.object({
        date: z.string(),
        employee: z.string().min(1),
        clockIn: z.string().optional(),
        clockOut: z.string().optional(),
        hours: z.preprocess((v) => (v === '' ? null : v), z.coerce.number().nullable().optional()),
      });
      const parsed = schema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      const r = addTimeClock(db, parsed.data);
      if (!r.ok) return res.status(400).json(r);
      return res.status(201).json(r);
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.delete('/:id', (req, res) => {
    try {
      const parsed = z.coerce.number().int().positive().safeParse(req.params.id);
      if (!parsed.success) return res.status(400).json({ ok: false, error: 'invalid id' });
      if (!deleteTimeClock(db, parsed.data)) return res.status(404).json({ ok: false, error: 'entry not found' });
      return res.json({ ok: true });
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  return router;
}
