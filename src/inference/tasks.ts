/**
 * Typed task clients.
 *
 * Each function calls one worker method on a loaded model and returns
 * its validated result. A result that does not match its schema is a
 * BackendError, never a ValidationError: the caller's input was fine.
 */

import type { z } from 'zod';
import type { CallOptions, LoadedModel } from '../types/models.js';
import { GatewayError, zodErrorToGatewayError } from '../api/errors.js';
import {
  ChatResultSchema,
  ClassifyResultSchema,
  CompleteResultSchema,
  EmbedResultSchema,
  EntitiesResultSchema,
  RecognizeResultSchema,
  SentimentResultSchema,
  SummarizeResultSchema,
  TranscribeResultSchema,
  TranslateResultSchema,
  type ChatParams,
  type ChatResult,
  type ClassifyParams,
  type ClassifyResult,
  type CompleteParams,
  type CompleteResult,
  type EmbedParams,
  type EmbedResult,
  type EntitiesParams,
  type EntitiesResult,
  type RecognizeParams,
  type RecognizeResult,
  type SentimentParams,
  type SentimentResult,
  type SummarizeParams,
  type SummarizeResult,
  type TranscribeParams,
  type TranscribeResult,
  type TranslateParams,
  type TranslateResult,
} from './schemas.js';

async function callWorker<T>(
  model: LoadedModel,
  method: string,
  params: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options?: CallOptions
): Promise<T> {
  const raw = await model.call(method, params, options);
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const error = zodErrorToGatewayError(parsed.error, 'BackendError');
    throw new GatewayError('BackendError', `Malformed ${method} result from ${model.modelId}: ${error.message}`, {
      modelId: model.modelId,
      method,
    });
  }
  return parsed.data;
}

export function chat(model: LoadedModel, params: ChatParams, options?: CallOptions): Promise<ChatResult> {
  return callWorker(model, 'chat', params, ChatResultSchema, options);
}

export function complete(model: LoadedModel, params: CompleteParams, options?: CallOptions): Promise<CompleteResult> {
  return callWorker(model, 'complete', params, CompleteResultSchema, options);
}

export function transcribe(
  model: LoadedModel,
  params: TranscribeParams,
  options?: CallOptions
): Promise<TranscribeResult> {
  return callWorker(model, 'transcribe', params, TranscribeResultSchema, options);
}

/**
 * One vector per input text, in input order.
 */
export async function embed(model: LoadedModel, params: EmbedParams, options?: CallOptions): Promise<EmbedResult> {
  const result = await callWorker(model, 'embed', params, EmbedResultSchema, options);
  if (result.embeddings.length !== params.texts.length) {
    throw new GatewayError(
      'BackendError',
      `Worker returned ${result.embeddings.length} embeddings for ${params.texts.length} texts`,
      { modelId: model.modelId, method: 'embed' }
    );
  }
  return result;
}

export function recognize(
  model: LoadedModel,
  params: RecognizeParams,
  options?: CallOptions
): Promise<RecognizeResult> {
  return callWorker(model, 'recognize', params, RecognizeResultSchema, options);
}

export function classify(model: LoadedModel, params: ClassifyParams, options?: CallOptions): Promise<ClassifyResult> {
  return callWorker(model, 'classify', params, ClassifyResultSchema, options);
}

export function sentiment(
  model: LoadedModel,
  params: SentimentParams,
  options?: CallOptions
): Promise<SentimentResult> {
  return callWorker(model, 'sentiment', params, SentimentResultSchema, options);
}

export function entities(model: LoadedModel, params: EntitiesParams, options?: CallOptions): Promise<EntitiesResult> {
  return callWorker(model, 'entities', params, EntitiesResultSchema, options);
}

export function summarize(
  model: LoadedModel,
  params: SummarizeParams,
  options?: CallOptions
): Promise<SummarizeResult> {
  return callWorker(model, 'summarize', params, SummarizeResultSchema, options);
}

export function translate(
  model: LoadedModel,
  params: TranslateParams,
  options?: CallOptions
): Promise<TranslateResult> {
  return callWorker(model, 'translate', params, TranslateResultSchema, options);
}
