import { pgTable, text, uniqueIndex, uuid, varchar } from 'drizzle-orm/pg-core';

export const registrationsTable = pgTable(
  'registrations',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    issuer: varchar('issuer', { length: 255 }).notNull(),
    clientId: varchar('client_id', { length: 255 }).notNull(),
    authTokenUrl: text('auth_token_url').notNull(),
    authLoginUrl: text('auth_login_url').notNull(),
    keysetUrl: text('keyset_url').notNull(),
    targetLinkUri: text('target_link_uri').notNull(),
  },
  (table) => [uniqueIndex('registrations_issuer_client_id_unique').on(table.issuer, table.clientId)],
);
