import { index, pgTable, primaryKey, text, timestamp, varchar } from 'drizzle-orm/pg-core';

export const accessTokensTable = pgTable(
  'access_tokens',
  {
    tokenUrl: text('token_url').notNull(),
    clientId: varchar('client_id', { length: 255 }).notNull(),
    /** Sorted scopes joined by single spaces */
    scopes: text('scopes').notNull(),
    token: text('token').notNull(),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.tokenUrl, table.clientId, table.scopes] }),
    index('access_tokens_expires_at_idx').on(table.expiresAt),
  ],
);
