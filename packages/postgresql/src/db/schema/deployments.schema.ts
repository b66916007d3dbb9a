import { pgTable, uniqueIndex, uuid, varchar } from 'drizzle-orm/pg-core';

export const deploymentsTable = pgTable(
  'deployments',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    issuer: varchar('issuer', { length: 255 }).notNull(),
    deploymentId: varchar('deployment_id', { length: 255 }).notNull(),
  },
  (table) => [
    uniqueIndex('deployments_issuer_deployment_id_unique').on(table.issuer, table.deploymentId),
  ],
);
