import { Router } from 'express';
import { z } from 'zod';

import type { AppDb } from '../database/db.js';
import { summary } from '../services/credit/creditSummaryService.js';

const isoDay = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

export function reportsRouter(db: AppDb) {
  const router = Router();

  router.get('/summary', (req, res) => {
    try {
      const parsed = z.object({ from: isoDay.optional(), to: isoDay.optional() }).safeParse(req.query);
      if (!parsed.success) return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      const rows = summary(db, {
        ...(parsed.data.from !== undefined && { from: parsed.data.from }),
        ...(parsed.data.to !== undefined && { to: parsed.data.to }),
      });
      return res.json({ ok: true, rows });
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  return router;
}
