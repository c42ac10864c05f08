import { asc, eq } from 'drizzle-orm';

import type { Employee, EmployeeRole } from '@rocredit/shared';

import type { SqlExecutor } from '../database/db.js';
import { employeeRoles, employees } from '../database/schema.js';
import { toRole } from './credit/ledgerReads.js';
import { nowMs } from '../utils/dates.js';

export function listEmployees(db: SqlExecutor): Employee[] {
  const rows = db.select().from(employees).orderBy(asc(employees.name)).all();
  const roles = db.select().from(employeeRoles).all();
  const byName = new Map<string, EmployeeRole[]>();
  for (const r of roles) {
    const role = toRole(r.role);
    if (!role) continue;
    const list = byName.get(r.employeeName) ?? [];
    list.push(role);
    byName.set(r.employeeName, list);
  }
  return rows.map((e) => ({ name: e.name, nickname: e.nickname, roles: byName.get(e.name) ?? [] }));
}

export function upsertEmployee(db: SqlExecutor, input: { name: string; nickname?: string | null; roles: EmployeeRole[] }) {
  const name = input.name.trim();
  if (!name) return { ok: false as const, error: 'name is required' };
  const nickname = String(input.nickname ?? '').trim() || null;
  const roles = Array.from(new Set(input.roles));

  db.transaction((tx) => {
    tx.insert(employees)
      .values({ name, nickname, createdAt: nowMs() })
      .onConflictDoUpdate({ target: employees.name, set: { nickname } })
      .run();
    tx.delete(employeeRoles).where(eq(employeeRoles.employeeName, name)).run();
    if (roles.length > 0) {
      tx.insert(employeeRoles)
        .values(roles.map((role) => ({ employeeName: name, role })))
        .run();
    }
  });
  const employee: Employee = { name, nickname, roles };
  return { ok: true as const, employee };
}

/** Past credit stays booked to the name; only the directory entry goes. */
export function deleteEmployee(db: SqlExecutor, name: string): boolean {
  return db.delete(employees).where(eq(employees.name, name)).run().changes > 0;
}
