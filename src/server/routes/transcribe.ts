/**
 * Speech routes. The request body is the audio file itself.
 */

import express, { type Request, type Response, type Router } from 'express';
import { validationError } from '../../api/errors.js';
import { transcribe } from '../../inference/tasks.js';
import type { TranscribeResult } from '../../inference/schemas.js';
import {
  AUDIO_CONTENT_TYPES,
  TranscribeQuerySchema,
  TranslateAudioQuerySchema,
} from '../../types/schemas/requests.js';
import { asyncHandler, parseInput } from '../http-helpers.js';
import type { RouteContext } from './context.js';
import { configuredLanguages } from './model-info.js';
import { rawUpload, readUpload } from './uploads.js';

/** Used when the speech model has no `languages` option */
const DEFAULT_SPEECH_LANGUAGES = ['es', 'en', 'fr', 'de', 'it', 'pt', 'ru', 'zh', 'ja', 'ko', 'ar', 'hi'];

function transcriptBody(result: TranscribeResult, modelId: string): Record<string, unknown> {
  return {
    text: result.text.trim(),
    language: result.language ?? null,
    duration: result.duration ?? null,
    confidence: result.confidence ?? null,
    segments: result.segments ?? [],
    model: modelId,
  };
}

export function createTranscribeRouter(ctx: RouteContext): Router {
  const router = express.Router();
  const upload = rawUpload(ctx.config.server.audio_upload_limit_mb);

  router.post(
    '/',
    ctx.requireKey('transcribe'),
    upload,
    asyncHandler(async (req: Request, res: Response) => {
      const context = ctx.contextOf(req);
      const query = parseInput(TranscribeQuerySchema, req.query);
      const audio = readUpload(req, AUDIO_CONTENT_TYPES, 'audio');
      const signal = ctx.signalFor(res);

      const modelId = ctx.modelFor('transcribe');
      const result = await ctx.run(
        context,
        'transcribe',
        (model, options) =>
          transcribe(
            model,
            {
              audio_base64: audio.data.toString('base64'),
              content_type: audio.contentType,
              language: query.language,
              task: 'transcribe',
              timestamps: query.timestamps,
            },
            options
          ),
        { signal }
      );

      res.json(transcriptBody(result, modelId));
    })
  );

  router.post(
    '/translate',
    ctx.requireKey('transcribe'),
    upload,
    asyncHandler(async (req: Request, res: Response) => {
      const context = ctx.contextOf(req);
      const query = parseInput(TranslateAudioQuerySchema, req.query);
      if (query.target_language !== 'en') {
        throw validationError('Speech translation only targets English', { field: 'target_language' });
      }
      const audio = readUpload(req, AUDIO_CONTENT_TYPES, 'audio');
      const signal = ctx.signalFor(res);

      const modelId = ctx.modelFor('transcribe');
      const result = await ctx.run(
        context,
        'transcribe',
        (model, options) =>
          transcribe(
            model,
            {
              audio_base64: audio.data.toString('base64'),
              content_type: audio.contentType,
              task: 'translate',
              timestamps: false,
            },
            options
          ),
        { signal }
      );

      res.json({
        ...transcriptBody(result, modelId),
        source_language: result.language ?? null,
        target_language: query.target_language,
      });
    })
  );

  router.get('/supported-formats', ctx.requireKey('transcribe'), (_req: Request, res: Response) => {
    res.json({
      supported_formats: AUDIO_CONTENT_TYPES,
      max_size_mb: ctx.config.server.audio_upload_limit_mb,
    });
  });

  router.get('/supported-languages', ctx.requireKey('transcribe'), (_req: Request, res: Response) => {
    const modelId = ctx.optionalModelFor('transcribe');
    const languages =
      modelId !== undefined ? configuredLanguages(ctx.modelOptions(modelId), DEFAULT_SPEECH_LANGUAGES) : [];
    res.json({ languages, total: languages.length, auto_detect: true });
  });

  return router;
}
