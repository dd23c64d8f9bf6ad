/**
 * Business text analytics routes.
 *
 * Each endpoint is a thin wrapper over one step function; the
 * comprehensive analysis runs several steps under a single quota charge
 * and reports every failed step in place instead of failing the call.
 */

import express, { type Request, type Response, type Router } from 'express';
import type { RequestContext } from '../../core/dispatcher.js';
import type { RouteName } from '../../types/schemas/config.js';
import { cancelled, toGatewayError } from '../../api/errors.js';
import {
  assertSupportedPair,
  buildClassificationReport,
  buildEntityReport,
  buildSentimentReport,
  buildSummaryReport,
  buildTranslationReport,
  countWords,
  failedStep,
  successRate,
  summaryBounds,
  supportedPairs,
  textStatistics,
  type EntityReport,
  type SentimentReport,
  type SummaryReport,
} from '../../business/analytics.js';
import { classify, entities, sentiment, summarize, translate } from '../../inference/tasks.js';
import {
  ClassifyRequestSchema,
  ComprehensiveRequestSchema,
  EntitiesRequestSchema,
  SentimentRequestSchema,
  SummarizeRequestSchema,
  TranslateRequestSchema,
} from '../../types/schemas/requests.js';
import { asyncHandler, parseInput } from '../http-helpers.js';
import type { RouteContext } from './context.js';

/** Service name in health reports -> route serving it */
const BUSINESS_SERVICES: ReadonlyArray<readonly [string, RouteName]> = [
  ['classifier', 'classify'],
  ['sentiment', 'sentiment'],
  ['ner', 'ner'],
  ['summarizer', 'summarize'],
  ['translator', 'translate'],
];

interface SummaryInput {
  text: string;
  max_length: number;
  min_length?: number;
  type: 'abstractive' | 'extractive';
}

class BusinessSteps {
  constructor(private readonly ctx: RouteContext) {}

  async sentiment(context: RequestContext, text: string, signal: AbortSignal, language?: string): Promise<SentimentReport> {
    const result = await this.ctx.run(context, 'sentiment', (model, options) => sentiment(model, { text }, options), {
      signal,
    });
    return buildSentimentReport(text, result, language);
  }

  async entities(
    context: RequestContext,
    text: string,
    signal: AbortSignal,
    entityTypes?: readonly string[]
  ): Promise<EntityReport> {
    const result = await this.ctx.run(context, 'ner', (model, options) => entities(model, { text }, options), {
      signal,
    });
    return buildEntityReport(text, result.entities, entityTypes);
  }

  async summary(context: RequestContext, input: SummaryInput, signal: AbortSignal): Promise<SummaryReport> {
    const bounds = summaryBounds(input.text, input.max_length, input.min_length);
    const result = await this.ctx.run(
      context,
      'summarize',
      (model, options) =>
        summarize(model, { text: input.text, max_length: bounds.maxLength, min_length: bounds.minLength }, options),
      { signal }
    );
    return buildSummaryReport(input.text, result.summary_text.trim(), input.type);
  }

  /**
   * Whether a comprehensive step can run: its route is configured and
   * its model enabled.
   */
  available(route: RouteName): boolean {
    const modelId = this.ctx.optionalModelFor(route);
    return modelId !== undefined && this.ctx.slots.getSlotStatus(modelId)?.enabled === true;
  }
}

export function createBusinessRouter(ctx: RouteContext): Router {
  const router = express.Router();
  const steps = new BusinessSteps(ctx);

  router.post(
    '/classify',
    ctx.requireKey('business'),
    ctx.jsonBody(),
    asyncHandler(async (req: Request, res: Response) => {
      const context = ctx.contextOf(req);
      const body = parseInput(ClassifyRequestSchema, req.body);
      const signal = ctx.signalFor(res);

      const startedAt = Date.now();
      const result = await ctx.run(
        context,
        'classify',
        (model, options) =>
          classify(model, { text: body.text, labels: body.categories, multi_label: body.multi_label }, options),
        { signal }
      );

      res.json({
        ...buildClassificationReport(body.text, result, body.multi_label),
        processing_time_ms: Date.now() - startedAt,
      });
    })
  );

  router.post(
    '/sentiment',
    ctx.requireKey('business'),
    ctx.jsonBody(),
    asyncHandler(async (req: Request, res: Response) => {
      const context = ctx.contextOf(req);
      const body = parseInput(SentimentRequestSchema, req.body);
      res.json(await steps.sentiment(context, body.text, ctx.signalFor(res), body.language));
    })
  );

  router.post(
    '/entities',
    ctx.requireKey('business'),
    ctx.jsonBody(),
    asyncHandler(async (req: Request, res: Response) => {
      const context = ctx.contextOf(req);
      const body = parseInput(EntitiesRequestSchema, req.body);
      res.json(await steps.entities(context, body.text, ctx.signalFor(res), body.entity_types));
    })
  );

  router.post(
    '/summarize',
    ctx.requireKey('business'),
    ctx.jsonBody(),
    asyncHandler(async (req: Request, res: Response) => {
      const context = ctx.contextOf(req);
      const body = parseInput(SummarizeRequestSchema, req.body);
      res.json(await steps.summary(context, body, ctx.signalFor(res)));
    })
  );

  router.post(
    '/translate',
    ctx.requireKey('business'),
    ctx.jsonBody(),
    asyncHandler(async (req: Request, res: Response) => {
      const context = ctx.contextOf(req);
      const body = parseInput(TranslateRequestSchema, req.body);
      const modelId = ctx.modelFor('translate');
      assertSupportedPair(body.source_lang, body.target_lang, supportedPairs(ctx.modelOptions(modelId)));
      const signal = ctx.signalFor(res);

      const result = await ctx.run(
        context,
        'translate',
        (model, options) =>
          translate(model, { text: body.text, source_lang: body.source_lang, target_lang: body.target_lang }, options),
        { signal }
      );

      res.json(buildTranslationReport(body.text, result.translation_text.trim(), body.source_lang, body.target_lang));
    })
  );

  router.post(
    '/analyze/comprehensive',
    ctx.requireKey('business'),
    ctx.jsonBody(),
    asyncHandler(async (req: Request, res: Response) => {
      const context = ctx.contextOf(req);
      const body = parseInput(ComprehensiveRequestSchema, req.body);
      const signal = ctx.signalFor(res);

      const analysis: Record<string, unknown> = {};
      const runStep = async (name: string, step: () => Promise<unknown>): Promise<void> => {
        try {
          analysis[name] = await step();
        } catch (error) {
          if (signal.aborted) {
            throw cancelled();
          }
          analysis[name] = failedStep(error);
          ctx.logger?.warn({ step: name, code: toGatewayError(error).code }, 'Comprehensive analysis step failed');
        }
      };

      if (body.include_sentiment && steps.available('sentiment')) {
        await runStep('sentiment', () => steps.sentiment(context, body.text, signal));
      }
      if (body.include_entities && steps.available('ner')) {
        await runStep('entities', () => steps.entities(context, body.text, signal));
      }
      if (body.include_summary && steps.available('summarize')) {
        await runStep('summary', () =>
          steps.summary(context, { text: body.text, max_length: body.summary_length, type: 'abstractive' }, signal)
        );
      }

      res.json({
        metadata: {
          api_key: context.key.keyPrefix,
          text_length: body.text.length,
          word_count: countWords(body.text),
          success_rate: successRate(Object.values(analysis)),
        },
        analysis,
        statistics: textStatistics(body.text),
      });
    })
  );

  router.get('/health', ctx.requireAccess('business'), (req: Request, res: Response) => {
    const key = ctx.keyOf(req);

    let degraded = false;
    const services: Record<string, { model_id: string | null; enabled: boolean; state: string }> = {};
    for (const [service, route] of BUSINESS_SERVICES) {
      const modelId = ctx.optionalModelFor(route);
      const status = modelId !== undefined ? ctx.slots.getSlotStatus(modelId) : undefined;
      const enabled = status?.enabled === true;
      if (enabled && status?.state === 'failed') {
        degraded = true;
      }
      services[service] = {
        model_id: modelId ?? null,
        enabled,
        state: status?.state ?? 'not_configured',
      };
    }

    res.json({
      timestamp: new Date().toISOString(),
      services,
      overall: degraded ? 'degraded' : 'healthy',
      api_key: key.keyPrefix,
    });
  });

  return router;
}
