export { accessTokensTable } from './accessTokens.schema.js';
export { deploymentsTable } from './deployments.schema.js';
export { launchDataTable } from './launchData.schema.js';
export { noncesTable } from './nonces.schema.js';
export { registrationsTable } from './registrations.schema.js';
