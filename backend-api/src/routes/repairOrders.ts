import { Router } from 'express';
import { z } from 'zod';

import { EmployeeRole, RepairOrderStatus } from '@rocredit/shared';

import type { AppDb } from '../database/db.js';
import { resolveLedgerConfig } from '../services/ledgerConfigService.js';
import {
  changeStage,
  changeStatus,
  createRepairOrder,
  deleteRepairOrder,
  getAllocations,
  getRepairOrder,
  listRepairOrders,
  listTransitions,
  setAllocations,
  updateRepairOrder,
} from '../services/repairOrderService.js';

// Blank optional hours mean 0; anything else must parse as a number.
const optionalHours = z.preprocess((v) => (v === '' || v === null ? 0 : v), z.coerce.number().nonnegative().optional());

const statusSchema = z.enum([RepairOrderStatus.Open, RepairOrderStatus.OnHold, RepairOrderStatus.Closed]);
const roleSchema = z.enum([EmployeeRole.Estimator, EmployeeRole.BodyTech, EmployeeRole.Painter, EmployeeRole.Mechanic]);

const editableFields = {
  date: z.string().optional(),
  bodyHours: optionalHours,
  refinishHours: optionalHours,
  mechanicalHours: optionalHours,
  estimator: z.string().optional(),
  bodyTech: z.string().optional(),
  painter: z.string().optional(),
  mechanic: z.string().optional(),
};

function notFound(error: string) {
  return error === 'repair order not found';
}

export function repairOrdersRouter(db: AppDb) {
  const router = Router();

  router.get('/', (req, res) => {
    try {
      const parsed = z.object({ status: statusSchema.optional() }).safeParse(req.query);
      if (!parsed.success) return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      const rows = listRepairOrders(db, { ...(parsed.data.status !== undefined && { status: parsed.data.status }) });
      return res.json({ ok: true, rows });
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.post('/', (req, res) => {
    try {
      const schema = z.object({
        roNumber: z.string().min(1),
        totalHours: z.coerce.number().positive(),
        currentStage: z.string().optional(),
        ...editableFields,
      });
      const parsed = schema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      const r = createRepairOrder(db, parsed.data, resolveLedgerConfig(db));
      if (!r.ok) return res.status(r.error === 'repair order already exists' ? 409 : 400).json(r);
      return res.status(201).json(r);
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.get('/:roNumber', (req, res) => {
    try {
      const r = getRepairOrder(db, String(req.params.roNumber));
      if (!r.ok) return res.status(404).json(r);
      return res.json(r);
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.patch('/:roNumber', (req, res) => {
    try {
      const schema = z.object({ totalHours: z.coerce.number().positive().optional(), ...editableFields });
      const parsed = schema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      const r = updateRepairOrder(db, String(req.params.roNumber), parsed.data, resolveLedgerConfig(db));
      if (!r.ok) return res.status(notFound(r.error) ? 404 : 400).json(r);
      return res.json(r);
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.delete('/:roNumber', (req, res) => {
    try {
      const deleted = deleteRepairOrder(db, String(req.params.roNumber));
      if (!deleted) return res.status(404).json({ ok: false, error: 'repair order not found' });
      return res.json({ ok: true });
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.post('/:roNumber/stage', (req, res) => {
    try {
      const parsed = z.object({ stage: z.string().min(1) }).safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      const r = changeStage(db, String(req.params.roNumber), parsed.data.stage, resolveLedgerConfig(db));
      if (!r.ok) return res.status(notFound(r.error) ? 404 : 400).json(r);
      return res.json(r);
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.post('/:roNumber/status', (req, res) => {
    try {
      const parsed = z.object({ status: statusSchema }).safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      const r = changeStatus(db, String(req.params.roNumber), parsed.data.status, resolveLedgerConfig(db));
      if (!r.ok) return res.status(notFound(r.error) ? 404 : 400).json(r);
      return res.json(r);
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.get('/:roNumber/allocations', (req, res) => {
    try {
      return res.json({ ok: true, allocations: getAllocations(db, String(req.params.roNumber)) });
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.put('/:roNumber/allocations', (req, res) => {
    try {
      const schema = z.object({
        allocations: z.array(z.object({ employee: z.string().min(1), role: roleSchema, percent: z.coerce.number() })),
      });
      const parsed = schema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      const r = setAllocations(db, String(req.params.roNumber), parsed.data.allocations, resolveLedgerConfig(db));
      if (!r.ok) return res.status(notFound(r.error) ? 404 : 400).json(r);
      return res.json(r);
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.get('/:roNumber/transitions', (req, res) => {
    try {
      const r = listTransitions(db, String(req.params.roNumber));
      if (!r.ok) return res.status(404).json(r);
      return res.json(r);
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  return router;
}
