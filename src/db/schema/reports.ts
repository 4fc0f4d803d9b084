import { pgTable, uuid, text, integer, timestamp, uniqueIndex } from 'drizzle-orm/pg-core';
import {
  FAMILY_STATUSES,
  HOUSING_STATUSES,
  JOB_STATUSES,
  MENTAL_STATES,
} from '@shared/constants';
import { cases } from './cases';

export const reports = pgTable(
  'monthly_reports',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    caseId: uuid('case_id')
      .notNull()
      .references(() => cases.id, { onDelete: 'cascade' }),
    monthIndex: integer('month_index').notNull(),
    housingStatus: text('housing_status', { enum: HOUSING_STATUSES }).notNull(),
    jobStatus: text('job_status', { enum: JOB_STATUSES }).notNull(),
    mentalState: text('mental_state', { enum: MENTAL_STATES }).notNull(),
    familyStatus: text('family_status', { enum: FAMILY_STATUSES }).notNull(),
    notes: text('notes').notNull().default(''),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    submittedAt: timestamp('submitted_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    caseMonthUq: uniqueIndex('monthly_reports_case_month_uq').on(table.caseId, table.monthIndex),
  }),
);
