import { pgTable, uuid, text, date, boolean, timestamp, index } from 'drizzle-orm/pg-core';
import { CITIES, RISK_TIERS } from '@shared/constants';
import { persons } from './persons';

export const cases = pgTable(
  'cases',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    personId: uuid('person_id')
      .notNull()
      .unique()
      .references(() => persons.id, { onDelete: 'cascade' }),
    releaseDate: date('release_date').notNull(),
    followupEndDate: date('followup_end_date').notNull(),
    riskTier: text('risk_tier', { enum: RISK_TIERS }).notNull().default('green'),
    city: text('city', { enum: CITIES }).notNull().default('riyadh'),
    notes: text('notes').notNull().default(''),
    assignedCaseWorkerId: uuid('assigned_case_worker_id').references(() => persons.id, {
      onDelete: 'set null',
    }),
    completed: boolean('completed').notNull().default(false),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    riskTierIdx: index('cases_risk_tier_idx').on(table.riskTier),
  }),
);
