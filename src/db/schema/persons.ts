import { pgTable, uuid, text, timestamp } from 'drizzle-orm/pg-core';
import { ROLES } from '@shared/constants';

export const persons = pgTable('persons', {
  id: uuid('id').primaryKey().defaultRandom(),
  nationalId: text('national_id').notNull().unique(),
  fullName: text('full_name').notNull(),
  role: text('role', { enum: ROLES }).notNull().default('beneficiary'),
  phone: text('phone').notNull().default(''),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});
