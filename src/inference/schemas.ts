/**
 * Worker method parameter and result schemas.
 *
 * Parameters are sent as-is over JSON-RPC; results are validated here
 * before anything reaches an HTTP response.
 */

import { z } from 'zod';

export const ChatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string(),
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;

export interface SamplingParams {
  max_tokens: number;
  temperature: number;
  top_p: number;
  stop?: string[];
}

// chat
export interface ChatParams extends SamplingParams {
  messages: ChatMessage[];
}

export const ChatResultSchema = z.object({
  message: ChatMessageSchema,
  finish_reason: z.string().optional(),
  usage: z
    .object({
      prompt_tokens: z.number().int().nonnegative().optional(),
      completion_tokens: z.number().int().nonnegative().optional(),
      total_tokens: z.number().int().nonnegative(),
    })
    .optional(),
});

export type ChatResult = z.infer<typeof ChatResultSchema>;

// complete
export interface CompleteParams extends SamplingParams {
  prompt: string;
}

export const CompleteResultSchema = z.object({
  text: z.string(),
  finish_reason: z.string().optional(),
  tokens_used: z.number().int().nonnegative().optional(),
});

export type CompleteResult = z.infer<typeof CompleteResultSchema>;

// transcribe
export interface TranscribeParams {
  audio_base64: string;
  content_type: string;
  language?: string;
  task: 'transcribe' | 'translate';
  timestamps: boolean;
}

export const TranscriptSegmentSchema = z.object({
  start: z.number(),
  end: z.number(),
  text: z.string(),
  confidence: z.number().min(0).max(1).optional(),
});

export const TranscribeResultSchema = z.object({
  text: z.string(),
  language: z.string().optional(),
  duration: z.number().nonnegative().optional(),
  confidence: z.number().min(0).max(1).optional(),
  segments: z.array(TranscriptSegmentSchema).optional(),
});

export type TranscribeResult = z.infer<typeof TranscribeResultSchema>;

// embed
export interface EmbedParams {
  texts: string[];
  normalize: boolean;
}

export const EmbedResultSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

export type EmbedResult = z.infer<typeof EmbedResultSchema>;

// recognize
export interface RecognizeParams {
  image_base64: string;
  languages: string[];
  detail: boolean;
}

export const RecognizedTextSchema = z.object({
  text: z.string(),
  confidence: z.number().min(0).max(1),
  bbox: z.array(z.array(z.number())),
});

export const RecognizeResultSchema = z.object({
  results: z.array(RecognizedTextSchema),
  image_size: z.object({ width: z.number(), height: z.number() }).optional(),
});

export type RecognizeResult = z.infer<typeof RecognizeResultSchema>;

// classify
export interface ClassifyParams {
  text: string;
  labels: string[];
  multi_label: boolean;
}

export const ClassifyResultSchema = z
  .object({
    labels: z.array(z.string()).min(1),
    scores: z.array(z.number()).min(1),
  })
  .refine((data) => data.labels.length === data.scores.length, {
    message: 'labels and scores must have the same length',
    path: ['scores'],
  });

export type ClassifyResult = z.infer<typeof ClassifyResultSchema>;

// sentiment
export interface SentimentParams {
  text: string;
}

export const SentimentResultSchema = z.object({
  label: z.union([z.string(), z.number()]),
  score: z.number(),
});

export type SentimentResult = z.infer<typeof SentimentResultSchema>;

// entities
export interface EntitiesParams {
  text: string;
}

export const EntitySchema = z.object({
  entity_group: z.string(),
  word: z.string(),
  score: z.number(),
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
});

export type Entity = z.infer<typeof EntitySchema>;

export const EntitiesResultSchema = z.object({
  entities: z.array(EntitySchema),
});

export type EntitiesResult = z.infer<typeof EntitiesResultSchema>;

// summarize
export interface SummarizeParams {
  text: string;
  max_length: number;
  min_length: number;
}

export const SummarizeResultSchema = z.object({
  summary_text: z.string(),
});

export type SummarizeResult = z.infer<typeof SummarizeResultSchema>;

// translate
export interface TranslateParams {
  text: string;
  source_lang: string;
  target_lang: string;
}

export const TranslateResultSchema = z.object({
  translation_text: z.string(),
});

export type TranslateResult = z.infer<typeof TranslateResultSchema>;
