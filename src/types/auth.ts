/**
 * API key and quota type definitions
 */

import type { CAPABILITIES } from './schemas/config.js';

export type Capability = (typeof CAPABILITIES)[number];

export type KeyStatus = 'active' | 'revoked';

export interface RateLimitPolicy {
  /** Requests admitted per rolling window */
  maxRequests: number;
  /** Window length in milliseconds */
  windowMs: number;
}

/**
 * Monotonic usage counters. Never decremented, never reset.
 */
export interface KeyUsageCounters {
  /** Successful authentications */
  authentications: number;
  /** Successful capability checks */
  authorizations: number;
  /** Failed capability checks */
  denials: number;
  byCapability: Partial<Record<Capability, number>>;
  lastUsedAt?: number;
}

export interface ApiKeyRecord {
  /** Opaque identifier (UUID) */
  id: string;
  /** First characters of the raw key, safe to display */
  keyPrefix: string;
  /** Hex SHA-256 of the raw key */
  digest: string;
  owner: string;
  description: string;
  capabilities: Capability[];
  rateLimit: RateLimitPolicy;
  status: KeyStatus;
  createdAt: number;
  updatedAt: number;
  expiresAt?: number;
  usage: KeyUsageCounters;
}

/**
 * Record as handed to admin surfaces: everything except the digest.
 */
export type ApiKeyView = Omit<ApiKeyRecord, 'digest'>;

export interface CreateKeyOptions {
  owner: string;
  description?: string;
  capabilities: Capability[];
  rateLimit?: RateLimitPolicy;
  expiresInDays?: number;
}

export interface CreatedKey {
  record: ApiKeyView;
  /** Returned exactly once; not retrievable afterwards */
  rawKey: string;
}

export interface UpdateKeyOptions {
  owner?: string;
  description?: string;
  capabilities?: Capability[];
  rateLimit?: RateLimitPolicy;
}

export interface ListKeysOptions {
  activeOnly?: boolean;
}

/**
 * Quota state after a successful consume (or a peek).
 */
export interface RateLimitInfo {
  limit: number;
  remaining: number;
  /** Epoch ms at which the oldest admitted request leaves the window */
  resetAt: number;
  windowMs: number;
}

export interface UsageLogEntry {
  keyPrefix: string;
  endpoint: string;
  method: string;
  status: number;
  ip: string;
  timestamp: number;
}

export interface GlobalKeyStats {
  totalKeys: number;
  activeKeys: number;
  revokedKeys: number;
  expiredKeys: number;
  adminKeys: number;
  /** Sum of successful authorizations across keys */
  totalRequests: number;
  /** Keys authenticated at least once */
  keysUsed: number;
  /** Requests currently held in the usage log */
  loggedRequests: number;
}

export interface KeyStats {
  keyPrefix: string;
  owner: string;
  status: KeyStatus;
  expired: boolean;
  createdAt: number;
  capabilities: Capability[];
  usage: KeyUsageCounters;
  /** Derived from the usage log, which is bounded */
  loggedRequests: number;
  uniqueEndpoints: number;
  firstRequestAt?: number;
  lastRequestAt?: number;
}
