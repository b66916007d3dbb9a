import { index, pgTable, text, timestamp, varchar } from 'drizzle-orm/pg-core';

export const noncesTable = pgTable(
  'nonces',
  {
    nonce: varchar('nonce', { length: 255 }).primaryKey(),
    targetLinkUri: text('target_link_uri').notNull(),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
  },
  (table) => [index('nonces_expires_at_idx').on(table.expiresAt)],
);
