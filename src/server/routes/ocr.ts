/**
 * Text recognition routes.
 */

import express, { type Request, type Response, type Router } from 'express';
import { cancelled } from '../../api/errors.js';
import { failedStep, isFailedStep } from '../../business/analytics.js';
import type { RecognizeResult } from '../../inference/schemas.js';
import { recognize } from '../../inference/tasks.js';
import {
  IMAGE_CONTENT_TYPES,
  RecognizeBase64RequestSchema,
  RecognizeBatchRequestSchema,
  RecognizeQuerySchema,
} from '../../types/schemas/requests.js';
import { asyncHandler, parseInput } from '../http-helpers.js';
import type { RouteContext } from './context.js';
import { configuredLanguages } from './model-info.js';
import { rawUpload, readUpload } from './uploads.js';

const DEFAULT_OCR_LANGUAGES = ['es', 'en'];

function recognitionBody(result: RecognizeResult, languages: readonly string[], startedAt: number): Record<string, unknown> {
  return {
    texts: result.results,
    image_size: result.image_size ?? null,
    language: languages.join(','),
    processing_time: (Date.now() - startedAt) / 1000,
  };
}

export function createOcrRouter(ctx: RouteContext): Router {
  const router = express.Router();

  const loadedLanguages = (): string[] => {
    const modelId = ctx.optionalModelFor('ocr');
    return modelId !== undefined ? configuredLanguages(ctx.modelOptions(modelId), DEFAULT_OCR_LANGUAGES) : [];
  };

  router.post(
    '/recognize',
    ctx.requireKey('ocr'),
    rawUpload(ctx.config.server.image_upload_limit_mb),
    asyncHandler(async (req: Request, res: Response) => {
      const startedAt = Date.now();
      const context = ctx.contextOf(req);
      const query = parseInput(RecognizeQuerySchema, req.query);
      const image = readUpload(req, IMAGE_CONTENT_TYPES, 'image');
      const signal = ctx.signalFor(res);

      const result = await ctx.run(
        context,
        'ocr',
        (model, options) =>
          recognize(
            model,
            { image_base64: image.data.toString('base64'), languages: query.languages, detail: query.detail },
            options
          ),
        { signal }
      );

      res.json(recognitionBody(result, query.languages, startedAt));
    })
  );

  router.post(
    '/recognize-base64',
    ctx.requireKey('ocr'),
    ctx.jsonBody(),
    asyncHandler(async (req: Request, res: Response) => {
      const startedAt = Date.now();
      const context = ctx.contextOf(req);
      const body = parseInput(RecognizeBase64RequestSchema, req.body);
      const signal = ctx.signalFor(res);

      const imageBase64 = body.image.replace(/\s+/g, '');
      const result = await ctx.run(
        context,
        'ocr',
        (model, options) => recognize(model, { image_base64: imageBase64, languages: body.languages, detail: true }, options),
        { signal }
      );

      res.json(recognitionBody(result, body.languages, startedAt));
    })
  );

  // One quota unit for the batch; each image is admitted on its own and
  // a failed image is reported in its slot.
  router.post(
    '/batch',
    ctx.requireKey('ocr'),
    ctx.jsonBody(),
    asyncHandler(async (req: Request, res: Response) => {
      const startedAt = Date.now();
      const context = ctx.contextOf(req);
      const body = parseInput(RecognizeBatchRequestSchema, req.body);
      const signal = ctx.signalFor(res);

      const results: Array<Record<string, unknown>> = [];
      for (const [index, image] of body.images.entries()) {
        const imageStartedAt = Date.now();
        try {
          const result = await ctx.run(
            context,
            'ocr',
            (model, options) =>
              recognize(model, { image_base64: image.replace(/\s+/g, ''), languages: body.languages, detail: true }, options),
            { signal }
          );
          results.push({ index, status: 'ok', ...recognitionBody(result, body.languages, imageStartedAt) });
        } catch (error) {
          if (signal.aborted) {
            throw cancelled();
          }
          results.push({ index, ...failedStep(error) });
        }
      }

      const failed = results.filter((result) => isFailedStep(result)).length;
      res.json({
        results,
        succeeded: results.length - failed,
        failed,
        processing_time: (Date.now() - startedAt) / 1000,
      });
    })
  );

  router.get('/supported-languages', ctx.requireKey('ocr'), (_req: Request, res: Response) => {
    const languages = loadedLanguages();
    res.json({ supported_languages: languages, total_supported: languages.length });
  });

  router.get('/health', ctx.requireAccess('ocr'), (_req: Request, res: Response) => {
    const modelId = ctx.optionalModelFor('ocr');
    const status = modelId !== undefined ? ctx.slots.getSlotStatus(modelId) : undefined;
    res.json({
      status: status?.state === 'ready' ? 'active' : 'inactive',
      model_id: modelId ?? null,
      state: status?.state ?? 'not_configured',
      enabled: status?.enabled === true,
      languages_loaded: status?.state === 'ready' ? loadedLanguages() : [],
    });
  });

  return router;
}
