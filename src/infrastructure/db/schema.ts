import {
  pgTable,
  uuid,
  varchar,
  timestamp,
  doublePrecision,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `configs` catalog.
 *
 * Rows are managed outside this system; `label` is unique across the
 * catalog and is the key used to refuse duplicate attachments.
 */
export const configs = pgTable('configs', {
  config_id: uuid('config_id').primaryKey(),
  label: varchar('label', { length: 255 }).notNull(),
  type: varchar('type', { length: 255 }).notNull(),
  amount: doublePrecision('amount').notNull(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  uniqueIndex('uq_configs_label').on(table.label),
  index('idx_configs_created_at').on(table.created_at),
]);

/** Drizzle schema for the `cases` table. */
export const cases = pgTable('cases', {
  case_id: uuid('case_id').primaryKey(),
  subject: varchar('subject', { length: 255 }).notNull().default(''),
  status: varchar('status', { length: 20, enum: ['Open', 'Closed'] }).notNull().default('Open'),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

/**
 * Drizzle schema for `case_configs`, the per-case copies of catalog rows.
 *
 * The unique (case_id, label) index backs the attach operation's own
 * label check: when two sessions race, the second batch insert fails.
 */
export const caseConfigs = pgTable('case_configs', {
  case_config_id: uuid('case_config_id').primaryKey(),
  case_id: uuid('case_id').notNull(),
  label: varchar('label', { length: 255 }).notNull(),
  type: varchar('type', { length: 255 }).notNull(),
  amount: doublePrecision('amount').notNull(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  uniqueIndex('uq_case_configs_case_label').on(table.case_id, table.label),
  index('idx_case_configs_case_id').on(table.case_id),
]);
