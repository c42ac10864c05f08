import { index, integer, primaryKey, real, sqliteTable, text, uniqueIndex } from 'drizzle-orm/sqlite-core';

// Timestamps are Unix ms (int). Calendar days ("date" columns) are ISO YYYY-MM-DD text.

export const schemaVersion = sqliteTable('schema_version', {
  version: integer('version').notNull(),
});

export const repairOrders = sqliteTable('repair_orders', {
  roNumber: text('ro_number').primaryKey(),
  date: text('date').notNull(),
  totalHours: real('total_hours').notNull(),
  bodyHours: real('body_hours').notNull().default(0),
  refinishHours: real('refinish_hours').notNull().default(0),
  mechanicalHours: real('mechanical_hours').notNull().default(0),
  estimator: text('estimator').notNull().default(''),
  bodyTech: text('body_tech').notNull().default(''),
  painter: text('painter').notNull().default(''),
  mechanic: text('mechanic').notNull().default(''),
  currentStage: text('current_stage').notNull(),
  status: text('status').notNull().default('open'),
  // Written only by the credit ledger.
  hoursTaken: real('hours_taken').notNull().default(0),
  hoursRemaining: real('hours_remaining').notNull().default(0),
  createdAt: integer('created_at').notNull(),
  updatedAt: integer('updated_at').notNull(),
});

export const roAllocations = sqliteTable(
  'ro_allocations',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    roNumber: text('ro_number')
      .notNull()
      .references(() => repairOrders.roNumber, { onDelete: 'cascade' }),
    employee: text('employee').notNull(),
    role: text('role').notNull(),
    percent: real('percent').notNull(),
  },
  (t) => ({
    roIdx: index('ro_allocations_ro_idx').on(t.roNumber),
  }),
);

export const employees = sqliteTable('employees', {
  name: text('name').primaryKey(),
  nickname: text('nickname'),
  createdAt: integer('created_at').notNull(),
});

export const employeeRoles = sqliteTable(
  'employee_roles',
  {
    employeeName: text('employee_name')
      .notNull()
      .references(() => employees.name, { onDelete: 'cascade' }),
    role: text('role').notNull(),
  },
  (t) => ({
    pk: primaryKey({ columns: [t.employeeName, t.role] }),
  }),
);

export const settingsStages = sqliteTable(
  'settings_stages',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    name: text('name').notNull(),
    orderIndex: integer('order_index').notNull(),
  },
  (t) => ({
    nameUq: uniqueIndex('settings_stages_name_uq').on(t.name),
  }),
);

export const timeClockRecords = sqliteTable(
  'time_clock_records',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    date: text('date').notNull(),
    employee: text('employee').notNull(),
    clockIn: text('clock_in').notNull().default(''),
    clockOut: text('clock_out').notNull().default(''),
    hours: real('hours').notNull(),
  },
  (t) => ({
    dateIdx: index('time_clock_records_date_idx').on(t.date, t.employee),
  }),
);

export const stageTransitions = sqliteTable(
  'stage_transitions',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    roNumber: text('ro_number')
      .notNull()
      .references(() => repairOrders.roNumber, { onDelete: 'cascade' }),
    fromStage: text('from_stage').notNull(),
    toStage: text('to_stage').notNull(),
    occurredAt: integer('occurred_at').notNull(),
  },
  (t) => ({
    roIdx: index('stage_transitions_ro_idx').on(t.roNumber, t.occurredAt, t.id),
  }),
);

export const creditBaseline = sqliteTable(
  'credit_baseline',
  {
    roNumber: text('ro_number')
      .notNull()
      .references(() => repairOrders.roNumber, { onDelete: 'cascade' }),
    milestoneId: text('milestone_id').notNull(),
    baseHours: real('base_hours').notNull(),
    createdAt: integer('created_at').notNull(),
  },
  (t) => ({
    pk: primaryKey({ columns: [t.roNumber, t.milestoneId] }),
  }),
);

export const creditAdjustments = sqliteTable(
  'credit_adjustments',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    roNumber: text('ro_number')
      .notNull()
      .references(() => repairOrders.roNumber, { onDelete: 'cascade' }),
    milestoneId: text('milestone_id').notNull(),
    // In bucket hours, before the milestone share is applied.
    deltaHours: real('delta_hours').notNull(),
    fromStage: text('from_stage').notNull(),
    toStage: text('to_stage').notNull(),
    date: text('date').notNull(),
    tech: text('tech'),
    share: real('share').notNull(),
    createdAt: integer('created_at').notNull(),
  },
  (t) => ({
    roMilestoneIdx: index('credit_adjustments_ro_milestone_idx').on(t.roNumber, t.milestoneId),
  }),
);

export const creditOverrides = sqliteTable(
  'credit_overrides',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    roNumber: text('ro_number')
      .notNull()
      .references(() => repairOrders.roNumber, { onDelete: 'cascade' }),
    fromStage: text('from_stage').notNull(),
    toStage: text('to_stage').notNull(),
    note: text('note').notNull(),
    date: text('date'),
    tech: text('tech'),
    hours: real('hours'),
    updatedAt: integer('updated_at').notNull(),
  },
  (t) => ({
    keyUq: uniqueIndex('credit_overrides_key_uq').on(t.roNumber, t.fromStage, t.toStage, t.note),
  }),
);

export const creditAudit = sqliteTable(
  'credit_audit',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    roNumber: text('ro_number')
      .notNull()
      .references(() => repairOrders.roNumber, { onDelete: 'cascade' }),
    date: text('date').notNull(),
    employee: text('employee').notNull(),
    hours: real('hours').notNull(),
    note: text('note').notNull(),
    // Stage pair of the generated row this entry was posted from; null for close adjustments.
    fromStage: text('from_stage'),
    toStage: text('to_stage'),
    // `baseline:<milestone>` or `adjustment:<id>` for generated postings.
    sourceKey: text('source_key'),
    createdAt: integer('created_at').notNull(),
  },
  (t) => ({
    roEmployeeNoteIdx: index('credit_audit_ro_employee_note_idx').on(t.roNumber, t.employee, t.note),
    roSourceIdx: index('credit_audit_ro_source_idx').on(t.roNumber, t.sourceKey),
  }),
);
