import { Router } from 'express';

import { parseCreditSourceKind } from '@rocredit/shared';

import { CURRENT_SCHEMA_VERSION } from '../database/migrate.js';
import { backendVersion } from '../version.js';

export const healthRouter = Router();

healthRouter.get('/', (_req, res) => {
  res.json({
    ok: true,
    version: backendVersion,
    schemaVersion: CURRENT_SCHEMA_VERSION,
    creditSource: parseCreditSourceKind(process.env.CREDIT_SOURCE),
  });
});
