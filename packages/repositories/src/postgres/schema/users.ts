import { pgTable, serial, text, uniqueIndex } from 'drizzle-orm/pg-core';

/**
 * LogUser table - people who log sessions.
 */
export const logUsers = pgTable(
  'log_user',
  {
    id: serial('user_id').primaryKey(),
    username: text('username').notNull(),
    passkey: text('passkey').notNull(),
    email: text('email'),
  },
  (table) => [uniqueIndex('log_user_username_idx').on(table.username)]
);
