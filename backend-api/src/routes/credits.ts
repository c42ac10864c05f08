import { Router } from 'express';
import { z } from 'zod';

import type { AppDb } from '../database/db.js';
import { listAudit } from '../services/credit/creditAuditService.js';
import {
  generatedCreditRows,
  milestoneLedger,
  recompute,
  recomputeAll,
} from '../services/credit/creditLedgerService.js';
import {
  deleteCreditRows,
  deleteOverride,
  deleteSupplement,
  listOverrides,
  setOverride,
} from '../services/credit/creditOverrideService.js';
import { closeReconcile } from '../services/credit/closeReconciliationService.js';
import { repairOrderExists } from '../services/credit/ledgerReads.js';
import { resolveLedgerConfig } from '../services/ledgerConfigService.js';

const rowKeySchema = z.object({
  roNumber: z.string().min(1),
  fromStage: z.string().min(1),
  toStage: z.string().min(1),
  note: z.string().min(1),
});

const displayedRowSchema = rowKeySchema.extend({
  date: z.string().min(1),
  employee: z.string().nullable().optional(),
  hours: z.coerce.number(),
  adjustmentId: z.number().int().nullable().optional(),
});

export function creditsRouter(db: AppDb) {
  const router = Router();

  router.post('/recompute', (_req, res) => {
    try {
      return res.json(recomputeAll(db, resolveLedgerConfig(db)));
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.post('/recompute/:roNumber', (req, res) => {
    try {
      const r = recompute(db, String(req.params.roNumber), resolveLedgerConfig(db));
      if (!r.ok) return res.status(404).json(r);
      return res.json(r);
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.get('/rows', (req, res) => {
    try {
      const parsed = z.object({ ro: z.string().min(1).optional() }).safeParse(req.query);
      if (!parsed.success) return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      const rows = generatedCreditRows(db, resolveLedgerConfig(db), {
        ...(parsed.data.ro !== undefined && { roNumber: parsed.data.ro }),
      });
      return res.json({ ok: true, rows });
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.get('/ledger/:roNumber', (req, res) => {
    try {
      const roNumber = String(req.params.roNumber);
      if (!repairOrderExists(db, roNumber)) return res.status(404).json({ ok: false, error: 'repair order not found' });
      return res.json({ ok: true, milestones: milestoneLedger(db, roNumber, resolveLedgerConfig(db)) });
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.get('/overrides', (req, res) => {
    try {
      const parsed = z.object({ ro: z.string().min(1).optional() }).safeParse(req.query);
      if (!parsed.success) return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      const rows = listOverrides(db, { ...(parsed.data.ro !== undefined && { roNumber: parsed.data.ro }) });
      return res.json({ ok: true, rows });
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.put('/overrides', (req, res) => {
    try {
      const schema = rowKeySchema.extend({
        date: z.string().nullable().optional(),
        tech: z.string().nullable().optional(),
        hours: z.preprocess((v) => (v === '' ? null : v), z.coerce.number().nullable().optional()),
      });
      const parsed = schema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      const { date, tech, hours, ...key } = parsed.data;
      const r = setOverride(db, key, { date, tech, hours });
      if (!r.ok) return res.status(r.error === 'repair order not found' ? 404 : 400).json(r);
      return res.json(r);
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.post('/overrides/delete', (req, res) => {
    try {
      const parsed = rowKeySchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      return res.json({ ok: true, deleted: deleteOverride(db, parsed.data) });
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.post('/supplements/delete', (req, res) => {
    try {
      const parsed = displayedRowSchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      const r = deleteSupplement(db, parsed.data, resolveLedgerConfig(db));
      if (!r.ok) return res.status(400).json(r);
      return res.json(r);
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.post('/rows/delete', (req, res) => {
    try {
      const parsed = z.object({ rows: z.array(displayedRowSchema).min(1) }).safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      const r = deleteCreditRows(db, parsed.data.rows, resolveLedgerConfig(db));
      return res.json({ ok: true, ...r });
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.post('/close/:roNumber', (req, res) => {
    try {
      const r = closeReconcile(db, String(req.params.roNumber), resolveLedgerConfig(db));
      if (!r.ok) return res.status(404).json(r);
      return res.json(r);
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.get('/audit', (req, res) => {
    try {
      const parsed = z.object({ ro: z.string().min(1).optional() }).safeParse(req.query);
      if (!parsed.success) return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      const rows = listAudit(db, { ...(parsed.data.ro !== undefined && { roNumber: parsed.data.ro }) });
      return res.json({ ok: true, rows });
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  return router;
}
