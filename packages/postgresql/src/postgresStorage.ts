import {
  type AccessToken,
  AccessTokenExpiredError,
  AccessTokenNotFoundError,
  canonicalizeScopes,
  type Deployment,
  DeploymentNotFoundError,
  LaunchDataNotFoundError,
  type LTIStorage,
  NonceNotFoundError,
  NonceTargetLinkUriMismatchError,
  type Registration,
  RegistrationNotFoundError,
} from '@lti-bridge/core';
import { and, eq, gt, lte } from 'drizzle-orm';
import { drizzle } from 'drizzle-orm/postgres-js';
import type { LRUCache } from 'lru-cache';
import { type Logger, pino } from 'pino';
import postgres from 'postgres';

import {
  createDeploymentCache,
  createRegistrationCache,
  type undefinedDeployment,
  undefinedDeploymentValue,
  type undefinedRegistration,
  undefinedRegistrationValue,
} from './cacheConfig.js';
import * as schema from './db/schema/index.js';
import type {
  PostgresDatabase,
  PostgresStorageConfig,
} from './interfaces/postgresStorageConfig.js';

/**
 * PostgreSQL implementation of LTI storage interface.
 *
 * Stores registrations, deployments, nonces, launch data and access tokens in
 * PostgreSQL, with LRU caching of registration and deployment lookups
 * (including misses). Uses Drizzle ORM for type-safe database operations.
 *
 * Create the tables with the SQL in `migrations/` before first use.
 */
export class PostgresStorage implements LTIStorage {
  private logger: Logger;
  private db: PostgresDatabase;
  private client?: postgres.Sql;
  private registrationCache: LRUCache<string, Registration | undefinedRegistration>;
  private deploymentCache: LRUCache<string, Deployment | undefinedDeployment>;

  constructor(config: PostgresStorageConfig) {
    this.logger = config.logger ?? pino({ level: 'silent' });
    this.registrationCache = createRegistrationCache(config.cache);
    this.deploymentCache = createDeploymentCache(config.cache);

    if ('db' in config) {
      this.db = config.db;
      this.logger.debug('using provided PostgreSQL database');
      return;
    }

    const max = config.poolOptions?.max ?? 10;
    const idleTimeout = config.poolOptions?.idleTimeout ?? 20;
    this.client = postgres(config.connectionUrl, { max, idle_timeout: idleTimeout });
    this.db = drizzle(this.client, { schema });
    this.logger.debug({ max, idleTimeout }, 'PostgreSQL connection pool initialized');
  }

  async storeRegistration(registration: Registration): Promise<void> {
    const { issuer, clientId, ...endpoints } = registration;
    await this.db
      .insert(schema.registrationsTable)
      .values(registration)
      .onConflictDoUpdate({
        target: [schema.registrationsTable.issuer, schema.registrationsTable.clientId],
        set: endpoints,
      });
    this.registrationCache.delete(`${issuer}#${clientId}`);
    this.logger.debug({ issuer, clientId }, 'registration stored');
  }

  async findRegistration(issuer: string, clientId: string): Promise<Registration> {
    const cacheKey = `${issuer}#${clientId}`;
    const cached = this.registrationCache.get(cacheKey);
    if (cached === undefinedRegistrationValue) {
      this.logger.debug({ issuer, clientId }, 'cache hit: registration not found');
      throw new RegistrationNotFoundError(issuer, clientId);
    }
    if (cached) {
      this.logger.debug({ issuer, clientId }, 'cache hit: registration');
      return { ...cached };
    }

    const [row] = await this.db
      .select()
      .from(schema.registrationsTable)
      .where(
        and(
          eq(schema.registrationsTable.issuer, issuer),
          eq(schema.registrationsTable.clientId, clientId),
        ),
      )
      .limit(1);

    if (!row) {
      this.logger.warn({ issuer, clientId }, 'registration not found');
      this.registrationCache.set(cacheKey, undefinedRegistrationValue);
      throw new RegistrationNotFoundError(issuer, clientId);
    }

    const { id: _id, ...registration } = row;
    this.registrationCache.set(cacheKey, registration);
    return { ...registration };
  }

  async storeDeployment(issuer: string, deployment: Deployment): Promise<void> {
    await this.db
      .insert(schema.deploymentsTable)
      .values({ issuer, deploymentId: deployment.deploymentId })
      .onConflictDoNothing({
        target: [schema.deploymentsTable.issuer, schema.deploymentsTable.deploymentId],
      });
    this.deploymentCache.delete(`${issuer}#${deployment.deploymentId}`);
    this.logger.debug({ issuer, deploymentId: deployment.deploymentId }, 'deployment stored');
  }

  async findDeployment(issuer: string, deploymentId: string): Promise<Deployment> {
    const cacheKey = `${issuer}#${deploymentId}`;
    const cached = this.deploymentCache.get(cacheKey);
    if (cached === undefinedDeploymentValue) {
      throw new DeploymentNotFoundError(issuer, deploymentId);
    }
    if (cached) {
      return { ...cached };
    }

    const [row] = await this.db
      .select({ deploymentId: schema.deploymentsTable.deploymentId })
      .from(schema.deploymentsTable)
      .where(
        and(
          eq(schema.deploymentsTable.issuer, issuer),
          eq(schema.deploymentsTable.deploymentId, deploymentId),
        ),
      )
      .limit(1);

    if (!row) {
      this.logger.warn({ issuer, deploymentId }, 'deployment not found');
      this.deploymentCache.set(cacheKey, undefinedDeploymentValue);
      throw new DeploymentNotFoundError(issuer, deploymentId);
    }
    this.deploymentCache.set(cacheKey, row);
    return { ...row };
  }

  async storeNonce(nonce: string, targetLinkUri: string, expiresAt: Date): Promise<void> {
    await this.db
      .insert(schema.noncesTable)
      .values({ nonce, targetLinkUri, expiresAt })
      .onConflictDoUpdate({
        target: schema.noncesTable.nonce,
        set: { targetLinkUri, expiresAt },
      });
    this.logger.debug({ expiresAt }, 'nonce stored with expiration');
  }

  /**
   * One `DELETE ... RETURNING` statement, so two concurrent launches with the
   * same nonce cannot both receive the row.
   */
  async testAndClearNonce(nonce: string, targetLinkUri: string): Promise<void> {
    const [row] = await this.db
      .delete(schema.noncesTable)
      .where(eq(schema.noncesTable.nonce, nonce))
      .returning();

    if (!row || row.expiresAt.getTime() <= Date.now()) {
      this.logger.warn('nonce not found - invalid, used or expired nonce');
      throw new NonceNotFoundError();
    }
    if (row.targetLinkUri !== targetLinkUri) {
      this.logger.warn({ targetLinkUri }, 'nonce bound to a different target link uri');
      throw new NonceTargetLinkUriMismatchError();
    }
    this.logger.debug('nonce validated and consumed');
  }

  async storeLaunchData(launchId: string, launchData: string, expiresAt: Date): Promise<void> {
    await this.db
      .insert(schema.launchDataTable)
      .values({ launchId, data: launchData, expiresAt })
      .onConflictDoUpdate({
        target: schema.launchDataTable.launchId,
        set: { data: launchData, expiresAt },
      });
    this.logger.debug({ launchId, expiresAt }, 'launch data stored');
  }

  async findLaunchData(launchId: string): Promise<string> {
    const [row] = await this.db
      .select({ data: schema.launchDataTable.data })
      .from(schema.launchDataTable)
      .where(
        and(
          eq(schema.launchDataTable.launchId, launchId),
          gt(schema.launchDataTable.expiresAt, new Date()),
        ),
      )
      .limit(1);

    if (!row) {
      this.logger.warn({ launchId }, 'launch data not found');
      throw new LaunchDataNotFoundError(launchId);
    }
    return row.data;
  }

  async storeAccessToken(token: AccessToken): Promise<void> {
    const scopes = scopeKey(token.scopes);
    await this.db
      .insert(schema.accessTokensTable)
      .values({
        tokenUrl: token.tokenUrl,
        clientId: token.clientId,
        scopes,
        token: token.token,
        expiresAt: token.expiresAt,
      })
      .onConflictDoUpdate({
        target: [
          schema.accessTokensTable.tokenUrl,
          schema.accessTokensTable.clientId,
          schema.accessTokensTable.scopes,
        ],
        set: { token: token.token, expiresAt: token.expiresAt },
      });
  }

  async findAccessToken(
    tokenUrl: string,
    clientId: string,
    scopes: string[],
  ): Promise<AccessToken> {
    const [row] = await this.db
      .select()
      .from(schema.accessTokensTable)
      .where(
        and(
          eq(schema.accessTokensTable.tokenUrl, tokenUrl),
          eq(schema.accessTokensTable.clientId, clientId),
          eq(schema.accessTokensTable.scopes, scopeKey(scopes)),
        ),
      )
      .limit(1);

    if (!row) {
      throw new AccessTokenNotFoundError();
    }
    if (row.expiresAt.getTime() <= Date.now()) {
      throw new AccessTokenExpiredError();
    }
    return { ...row, scopes: row.scopes.split(' ') };
  }

  /**
   * Deletes expired nonces, launch data and access tokens.
   *
   * @returns Number of deleted rows per table
   */
  async cleanup(
    now: Date = new Date(),
  ): Promise<{ nonces: number; launchData: number; accessTokens: number }> {
    const nonces = await this.db
      .delete(schema.noncesTable)
      .where(lte(schema.noncesTable.expiresAt, now))
      .returning({ nonce: schema.noncesTable.nonce });
    const launchData = await this.db
      .delete(schema.launchDataTable)
      .where(lte(schema.launchDataTable.expiresAt, now))
      .returning({ launchId: schema.launchDataTable.launchId });
    const accessTokens = await this.db
      .delete(schema.accessTokensTable)
      .where(lte(schema.accessTokensTable.expiresAt, now))
      .returning({ tokenUrl: schema.accessTokensTable.tokenUrl });

    const removed = {
      nonces: nonces.length,
      launchData: launchData.length,
      accessTokens: accessTokens.length,
    };
    this.logger.debug(removed, 'expired rows removed');
    return removed;
  }

  /**
   * Closes the connection pool this storage opened. A database passed in
   * through the config is left open.
   */
  async close(): Promise<void> {
    if (this.client) {
      await this.client.end();
      this.logger.debug('PostgreSQL connection pool closed');
    }
  }
}

function scopeKey(scopes: readonly string[]): string {
  const canonical = canonicalizeScopes(scopes);
  if (canonical.length === 0) {
    throw new Error('access token scopes must not be empty');
  }
  return canonical.join(' ');
}
