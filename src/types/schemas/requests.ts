/**
 * HTTP request schemas
 *
 * Bodies and query strings use snake_case field names.
 *
 * @module schemas/requests
 */

import { z } from 'zod';
import { ChatMessageSchema } from '../../inference/schemas.js';
import { CapabilitySchema } from './keys.js';
import {
  ClampedTemperature,
  ClampedTopP,
  LanguageCode,
  NonEmptyString,
  PositiveInteger,
  QueryBoolean,
} from './common.js';

/**
 * Chat and completion requests
 */
export const GenerateRequestSchema = z.object({
  messages: z.array(ChatMessageSchema).min(1, 'At least one message is required'),
  max_tokens: z.number().int().min(1).max(2048).default(512),
  temperature: ClampedTemperature.default(0.7),
  top_p: ClampedTopP.default(0.9),
  stop: z.array(z.string()).optional(),
  stream: z
    .boolean()
    .default(false)
    .refine((stream) => !stream, 'Streaming responses are not supported'),
});

export type GenerateRequest = z.infer<typeof GenerateRequestSchema>;

export const AUDIO_CONTENT_TYPES = [
  'audio/mpeg',
  'audio/wav',
  'audio/x-wav',
  'audio/mp4',
  'audio/x-m4a',
  'audio/ogg',
  'audio/webm',
  'audio/flac',
] as const;

export const IMAGE_CONTENT_TYPES = ['image/jpeg', 'image/png', 'image/bmp', 'image/tiff', 'image/webp'] as const;

export const TranscribeQuerySchema = z.object({
  language: LanguageCode.optional(),
  timestamps: QueryBoolean.default('false'),
});

export const TranslateAudioQuerySchema = z.object({
  target_language: LanguageCode.default('en'),
});

export const MAX_EMBEDDING_TEXTS = 100;

export const EmbeddingsRequestSchema = z.object({
  texts: z
    .array(z.string())
    .min(1, 'At least one text is required')
    .max(MAX_EMBEDDING_TEXTS, `At most ${MAX_EMBEDDING_TEXTS} texts per request`),
  normalize: z.boolean().default(true),
});

export type EmbeddingsRequest = z.infer<typeof EmbeddingsRequestSchema>;

/**
 * Exactly two texts or exactly two vectors.
 */
export const SimilarityRequestSchema = z.union([
  z.object({ texts: z.tuple([z.string(), z.string()]) }),
  z.object({ embeddings: z.tuple([z.array(z.number()).min(1), z.array(z.number()).min(1)]) }),
]);

export type SimilarityRequest = z.infer<typeof SimilarityRequestSchema>;

const LanguageList = z.array(LanguageCode).min(1).default(['es', 'en']);

export const RecognizeQuerySchema = z.object({
  languages: z
    .string()
    .default('es,en')
    .transform((value) => value.split(',').map((language) => language.trim()).filter((language) => language.length > 0))
    .pipe(z.array(LanguageCode).min(1)),
  detail: QueryBoolean.default('true'),
});

const Base64Image = NonEmptyString.refine((value) => /^[A-Za-z0-9+/=\s]+$/.test(value), 'Must be base64 encoded');

export const RecognizeBase64RequestSchema = z.object({
  image: Base64Image,
  languages: LanguageList,
});

export const MAX_BATCH_IMAGES = 10;

export const RecognizeBatchRequestSchema = z.object({
  images: z
    .array(Base64Image)
    .min(1, 'At least one image is required')
    .max(MAX_BATCH_IMAGES, `At most ${MAX_BATCH_IMAGES} images per batch`),
  languages: LanguageList,
});

export const ClassifyRequestSchema = z.object({
  text: NonEmptyString,
  categories: z.array(NonEmptyString).min(1, 'At least one category is required'),
  multi_label: z.boolean().default(false),
});

export const SentimentRequestSchema = z.object({
  text: NonEmptyString,
  language: LanguageCode.optional(),
});

export const EntitiesRequestSchema = z.object({
  text: NonEmptyString,
  entity_types: z.array(NonEmptyString).optional(),
});

export const SummarizeRequestSchema = z
  .object({
    text: NonEmptyString,
    max_length: z.number().int().min(30).max(500).default(150),
    min_length: PositiveInteger.optional(),
    type: z.enum(['abstractive', 'extractive']).default('abstractive'),
  })
  .refine((data) => data.min_length === undefined || data.min_length <= data.max_length, {
    message: 'min_length cannot exceed max_length',
    path: ['min_length'],
  });

export const TranslateRequestSchema = z.object({
  text: NonEmptyString,
  source_lang: LanguageCode.default('es'),
  target_lang: LanguageCode.default('en'),
});

export const ComprehensiveRequestSchema = z.object({
  text: NonEmptyString,
  include_sentiment: z.boolean().default(true),
  include_entities: z.boolean().default(true),
  include_summary: z.boolean().default(true),
  summary_length: z.number().int().min(50).max(300).default(100),
});

/**
 * Admin requests
 */
export const RateLimitBodySchema = z.object({
  max_requests: z.number().int().min(1).max(100_000),
  window_ms: z.number().int().min(1000).max(86_400_000),
});

export const CreateKeyRequestSchema = z.object({
  owner: z.string().trim().min(3, 'Owner must be at least 3 characters').max(100),
  description: z.string().max(500).default(''),
  capabilities: z.array(CapabilitySchema).min(1, 'At least one capability is required'),
  rate_limit: RateLimitBodySchema.optional(),
  expires_in_days: PositiveInteger.optional(),
});

export const KeyReferenceRequestSchema = z.object({
  key_prefix: NonEmptyString,
});

export const ListKeysQuerySchema = z.object({
  active_only: QueryBoolean.default('false'),
});

export const KeyStatsQuerySchema = z.object({
  key_prefix: NonEmptyString.optional(),
});
