import { pgTable, text, timestamp } from 'drizzle-orm/pg-core';

export const objects = pgTable('objects', {
  key: text('key').primaryKey(),
  body: text('body').notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
});
