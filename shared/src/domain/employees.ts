import type { EmployeeRole } from './repairOrder.js';

export type Employee = {
  name: string;
  nickname: string | null;
  roles: EmployeeRole[];
};

// Forms show the nickname; credit is always booked to the canonical name.
export function employeeDisplayName(e: Pick<Employee, 'name' | 'nickname'>): string {
  const nick = String(e.nickname ?? '').trim();
  return nick || e.name;
}

export function resolveEmployeeName(employees: readonly Employee[], role: EmployeeRole, chosen: string): string {
  const wanted = chosen.trim();
  for (const e of employees) {
    if (!e.roles.includes(role)) continue;
    if (employeeDisplayName(e) === wanted || e.name === wanted) return e.name;
  }
  return wanted;
}
