import { sql } from 'drizzle-orm';
import { pgTable, uuid, text, boolean, timestamp, uniqueIndex } from 'drizzle-orm/pg-core';
import { TICKET_CATEGORIES, TICKET_STATUSES } from '@shared/constants';
import { cases } from './cases';
import { persons } from './persons';

export const tickets = pgTable(
  'support_tickets',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    caseId: uuid('case_id')
      .notNull()
      .references(() => cases.id, { onDelete: 'cascade' }),
    category: text('category', { enum: TICKET_CATEGORIES }).notNull(),
    status: text('status', { enum: TICKET_STATUSES }).notNull().default('open'),
    notes: text('notes').notNull().default(''),
    autoGenerated: boolean('auto_generated').notNull().default(false),
    createdById: uuid('created_by_id').references(() => persons.id, { onDelete: 'set null' }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    // At most one open auto-generated ticket per case and category.
    openAutoUq: uniqueIndex('support_tickets_open_auto_uq')
      .on(table.caseId, table.category)
      .where(sql`${table.status} = 'open' and ${table.autoGenerated}`),
  }),
);

/** Predicate of the partial unique index, reused as the ON CONFLICT target. */
export const openAutoTicketPredicate = sql`status = 'open' and auto_generated`;
