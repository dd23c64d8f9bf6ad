/**
 * Zod schema exports for request and configuration validation
 *
 * @example
 * ```typescript
 * import { EmbeddingsRequestSchema } from 'edge-inference-gateway';
 *
 * const result = EmbeddingsRequestSchema.safeParse({ texts: ['a', 'b'] });
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

// Common primitives
export * from './common.js';

// Runtime configuration
export * from './config.js';

// API key store snapshot
export * from './keys.js';

// HTTP bodies and query strings
export * from './requests.js';
