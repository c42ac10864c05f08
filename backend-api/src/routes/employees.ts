import { Router } from 'express';
import { z } from 'zod';

import { EmployeeRole } from '@rocredit/shared';

import type { AppDb } from '../database/db.js';
import { deleteEmployee, listEmployees, upsertEmployee } from '../services/employeeService.js';

const roleSchema = z.enum([EmployeeRole.Estimator, EmployeeRole.BodyTech, EmployeeRole.Painter, EmployeeRole.Mechanic]);

export function employeesRouter(db: AppDb) {
  const router = Router();

  router.get('/', (_req, res) => {
    try {
      return res.json({ ok: true, rows: listEmployees(db) });
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.post('/', (req, res) => {
    try {
      const schema = z.object({
        name: z.string().min(1),
        nickname: z.string().nullable().optional(),
        roles: z.array(roleSchema).default([]),
      });
      const parsed = schema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      const r = upsertEmployee(db, parsed.data);
      if (!r.ok) return res.status(400).json(r);
      return res.json(r);
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  router.delete('/:name', (req, res) => {
    try {
      const name = String(req.params.name || '');
      if (!name) return res.status(400).json({ ok: false, error: 'missing name' });
      if (!deleteEmployee(db, name)) return res.status(404).json({ ok: false, error: 'employee not found' });
      return res.json({ ok: true });
    } catch (e) {
      return res.status(500).json({ ok: false, error: String(e) });
    }
  });

  return router;
}
