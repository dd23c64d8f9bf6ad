/**
 * Sentence embedding routes.
 */

import express, { type Request, type Response, type Router } from 'express';
import { round } from '../../business/analytics.js';
import { cosineSimilarity } from '../../inference/similarity.js';
import { embed } from '../../inference/tasks.js';
import {
  EmbeddingsRequestSchema,
  MAX_EMBEDDING_TEXTS,
  SimilarityRequestSchema,
} from '../../types/schemas/requests.js';
import { asyncHandler, parseInput } from '../http-helpers.js';
import type { RouteContext } from './context.js';
import { describeModel } from './model-info.js';

export function createEmbeddingsRouter(ctx: RouteContext): Router {
  const router = express.Router();

  router.post(
    '/',
    ctx.requireKey('embed'),
    ctx.jsonBody(),
    asyncHandler(async (req: Request, res: Response) => {
      const context = ctx.contextOf(req);
      const body = parseInput(EmbeddingsRequestSchema, req.body);
      const signal = ctx.signalFor(res);

      const modelId = ctx.modelFor('embed');
      const result = await ctx.run(
        context,
        'embed',
        (model, options) => embed(model, { texts: body.texts, normalize: body.normalize }, options),
        { signal }
      );

      res.json({
        embeddings: result.embeddings,
        model: modelId,
        dimensions: result.embeddings[0]?.length ?? 0,
        tokens_used: body.texts.reduce((sum, text) => sum + text.split(/\s+/).filter(Boolean).length, 0),
      });
    })
  );

  router.post(
    '/similarity',
    ctx.requireKey('embed'),
    ctx.jsonBody(),
    asyncHandler(async (req: Request, res: Response) => {
      const context = ctx.contextOf(req);
      const body = parseInput(SimilarityRequestSchema, req.body);

      let vectors: number[][];
      if ('texts' in body) {
        const signal = ctx.signalFor(res);
        const result = await ctx.run(
          context,
          'embed',
          (model, options) => embed(model, { texts: [...body.texts], normalize: true }, options),
          { signal }
        );
        vectors = result.embeddings;
      } else {
        vectors = [...body.embeddings];
      }

      const similarity = cosineSimilarity(vectors[0], vectors[1]);
      res.json({
        similarity: round(similarity, 6),
        similarity_percentage: round(similarity * 100, 2),
      });
    })
  );

  router.get('/model-info', ctx.requireKey('embed'), (_req: Request, res: Response) => {
    res.json({ ...describeModel(ctx, 'embed'), max_texts: MAX_EMBEDDING_TEXTS, normalized_by_default: true });
  });

  return router;
}
