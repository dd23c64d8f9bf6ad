/**
 * Common Zod schema primitives shared by request schemas
 */

import { z } from 'zod';

/**
 * String with at least one non-whitespace character
 */
export const NonEmptyString = z.string().refine((value) => value.trim().length > 0, 'Cannot be empty');

/**
 * Positive integer validator
 */
export const PositiveInteger = z
  .number()
  .int('Must be an integer')
  .positive('Must be a positive integer');

/**
 * Temperature parameter (0-2 range)
 */
export const ClampedTemperature = z
  .number()
  .min(0, 'Temperature must be at least 0')
  .max(2, 'Temperature cannot exceed 2');

/**
 * Top-p parameter (0-1 range)
 */
export const ClampedTopP = z
  .number()
  .min(0, 'Top-p must be at least 0')
  .max(1, 'Top-p cannot exceed 1');

/**
 * ISO 639-1 language code
 */
export const LanguageCode = z.string().regex(/^[a-z]{2}$/, 'Must be a two-letter language code');

/**
 * Boolean carried in a query string ("true" / "false" / "1" / "0")
 */
export const QueryBoolean = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');
