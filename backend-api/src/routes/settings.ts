import { Router } from 'express';
import { z } from 'zod';

import { REPAIR_ORDER_STATUS_LABELS, RepairOrderStatus } from '@rocredit/shared';

import type { AppDb } from '../database/db.js';
import { resolveLedgerConfig, saveStages } from '../services/ledgerConfigService.js';

export function settingsRouter(db: AppDb) {
  const router = Router();

  router.get('/stages', (_req, res) => {
    try {
      const config = resolveLedgerConfig(db);
      return res.json({ ok: true, stages: config.stages, version: config.version });
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.put('/stages', (req, res) => {
    try {
      const parsed = z.object({ stages: z.array(z.string()), version: z.string().min(1).optional() }).safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      const r = saveStages(db, parsed.data.stages, {
        ...(parsed.data.version !== undefined && { expectedVersion: parsed.data.version }),
      });
      if (!r.ok) return res.status(r.conflict ? 409 : 400).json(r);
      return res.json(r);
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.get('/statuses', (_req, res) => {
    const statuses = Object.values(RepairOrderStatus).map((code) => ({ code, label: REPAIR_ORDER_STATUS_LABELS[code] }));
    return res.json({ ok: true, statuses });
  });

  return router;
}
