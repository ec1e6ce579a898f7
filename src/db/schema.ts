import { sqliteTable, text } from 'drizzle-orm/sqlite-core';

export const strategies = sqliteTable('strategies', {
  name: text('name').primaryKey(),
  config: text('config').notNull(),
  createdAt: text('createdAt').notNull(),
  updatedAt: text('updatedAt'),
});
