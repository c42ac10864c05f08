import { asc, eq } from 'drizzle-orm';

import type { StageTransition } from '@rocredit/shared';

import type { SqlExecutor } from '../../database/db.js';
import { stageTransitions } from '../../database/schema.js';

// Append-only. Stage names are stored verbatim; callers validate them against the stage list.

export function recordTransition(
  db: SqlExecutor,
  roNumber: string,
  fromStage: string,
  toStage: string,
  when: number,
): StageTransition {
  const row = db
    .insert(stageTransitions)
    .values({ roNumber, fromStage, toStage, occurredAt: when })
    .returning()
    .get();
  return { id: row.id, roNumber: row.roNumber, fromStage: row.fromStage, toStage: row.toStage, occurredAt: row.occurredAt };
}

/** Ordered by occurrence, ties broken by append order. Milestone matching depends on this order. */
export function transitionsFor(db: SqlExecutor, roNumber: string): StageTransition[] {
  return db
    .select({
      id: stageTransitions.id,
      roNumber: stageTransitions.roNumber,
      fromStage: stageTransitions.fromStage,
      toStage: stageTransitions.toStage,
      occurredAt: stageTransitions.occurredAt,
    })
    .from(stageTransitions)
    .where(eq(stageTransitions.roNumber, roNumber))
    .orderBy(asc(stageTransitions.occurredAt), asc(stageTransitions.id))
    .all();
}
