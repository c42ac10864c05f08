export * from './domain/stages.js';
export * from './domain/repairOrder.js';
export * from './domain/milestones.js';
export * from './domain/creditNotes.js';
export * from './domain/creditSource.js';
export * from './domain/credit.js';
export * from './domain/employees.js';
