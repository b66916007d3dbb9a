import type { Deployment, Registration } from '@lti-bridge/core';
import { LRUCache } from 'lru-cache';

// we need an undefined value to handle cache misses and cache them
export const undefinedRegistrationValue = Symbol('undefinedRegistration');
export type undefinedRegistration = typeof undefinedRegistrationValue;
export const undefinedDeploymentValue = Symbol('undefinedDeployment');
export type undefinedDeployment = typeof undefinedDeploymentValue;

export interface CacheOptions {
  /** Entries per cache (default: 1000) */
  max?: number;
  /** Entry lifetime in milliseconds (default: 15 minutes) */
  ttlMs?: number;
}

export function createRegistrationCache(
  options: CacheOptions = {},
): LRUCache<string, Registration | undefinedRegistration> {
  return new LRUCache({
    max: options.max ?? 1000,
    ttl: options.ttlMs ?? 1000 * 60 * 15, // 15 minutes
  });
}

export function createDeploymentCache(
  options: CacheOptions = {},
): LRUCache<string, Deployment | undefinedDeployment> {
  return new LRUCache({
    max: options.max ?? 1000,
    ttl: options.ttlMs ?? 1000 * 60 * 15,
  });
}
