import { index, pgTable, text, timestamp, varchar } from 'drizzle-orm/pg-core';

export const launchDataTable = pgTable(
  'launch_data',
  {
    launchId: varchar('launch_id', { length: 255 }).primaryKey(),
    // raw JSON text of the verified token payload, kept byte for byte
    data: text('data').notNull(),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
  },
  (table) => [index('launch_data_expires_at_idx').on(table.expiresAt)],
);
