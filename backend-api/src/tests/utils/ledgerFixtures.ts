import { vi } from 'vitest';

import type { LedgerConfig } from '@rocredit/shared';

import { openMemorySqlite, type AppDb } from '../../database/db.js';
import { resolveLedgerConfig } from '../../services/ledgerConfigService.js';
import { createRepairOrder, type RepairOrderInput } from '../../services/repairOrderService.js';

export function freshDb(): AppDb {
  return openMemorySqlite().db;
}

export function setClock(iso: string) {
  vi.setSystemTime(new Date(iso));
}

export function allocationConfig(db: AppDb): LedgerConfig {
  return { ...resolveLedgerConfig(db), creditSource: 'allocation' };
}

export function seedRepairOrder(db: AppDb, input: Partial<RepairOrderInput> & { roNumber: string }, config?: LedgerConfig) {
  const r = createRepairOrder(
    db,
    { totalHours: 60, currentStage: 'Body', ...input },
    config ?? resolveLedgerConfig(db),
  );
  if (!r.ok) throw new Error(r.error);
  return r.repairOrder;
}
