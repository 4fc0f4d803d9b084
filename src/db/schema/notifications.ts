import { pgTable, uuid, text, boolean, timestamp } from 'drizzle-orm/pg-core';
import { persons } from './persons';

export const notifications = pgTable('notifications', {
  id: uuid('id').primaryKey().defaultRandom(),
  recipientId: uuid('recipient_id')
    .notNull()
    .references(() => persons.id, { onDelete: 'cascade' }),
  message: text('message').notNull(),
  link: text('link').notNull().default(''),
  read: boolean('read').notNull().default(false),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});
