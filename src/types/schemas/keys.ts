/**
 * API key record schemas
 *
 * Used to validate the persisted key store snapshot and admin input.
 *
 * @module schemas/keys
 */

import { z } from 'zod';
import { CAPABILITIES } from './config.js';
import type { ApiKeyRecord, RateLimitPolicy } from '../auth.js';

export const CapabilitySchema = z.enum(CAPABILITIES);

export const RateLimitPolicySchema: z.ZodType<RateLimitPolicy> = z.object({
  maxRequests: z.number().int().positive('Max requests must be positive'),
  windowMs: z.number().int().positive('Window must be positive'),
});

export const KeyUsageCountersSchema = z.object({
  authentications: z.number().int().nonnegative(),
  authorizations: z.number().int().nonnegative(),
  denials: z.number().int().nonnegative(),
  byCapability: z.record(CapabilitySchema, z.number().int().nonnegative()),
  lastUsedAt: z.number().int().optional(),
});

export const ApiKeyRecordSchema: z.ZodType<ApiKeyRecord> = z.object({
  id: z.string().min(1),
  keyPrefix: z.string().min(1),
  digest: z.string().regex(/^[0-9a-f]{64}$/, 'must be a hex SHA-256 digest'),
  owner: z.string().min(1),
  description: z.string(),
  capabilities: z.array(CapabilitySchema),
  rateLimit: RateLimitPolicySchema,
  status: z.enum(['active', 'revoked']),
  createdAt: z.number().int(),
  updatedAt: z.number().int(),
  expiresAt: z.number().int().optional(),
  usage: KeyUsageCountersSchema,
});

export const KEY_STORE_VERSION = 1;

export const KeyStoreSnapshotSchema = z.object({
  version: z.literal(KEY_STORE_VERSION),
  keys: z.array(ApiKeyRecordSchema),
});

export type KeyStoreSnapshot = z.infer<typeof KeyStoreSnapshotSchema>;
