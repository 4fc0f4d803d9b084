import { pgTable, uuid, text, boolean, timestamp } from 'drizzle-orm/pg-core';
import { CITIES } from '@shared/constants';

export const jobOpportunities = pgTable('job_opportunities', {
  id: uuid('id').primaryKey().defaultRandom(),
  title: text('title').notNull(),
  company: text('company').notNull().default(''),
  description: text('description').notNull(),
  city: text('city', { enum: CITIES }).notNull(),
  active: boolean('active').notNull().default(true),
  linkUrl: text('link_url').notNull().default(''),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});
