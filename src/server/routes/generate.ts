/**
 * Text generation routes.
 */

import express, { type Request, type Response, type Router } from 'express';
import type { ChatMessage } from '../../inference/schemas.js';
import { chat, complete } from '../../inference/tasks.js';
import { GenerateRequestSchema, type GenerateRequest } from '../../types/schemas/requests.js';
import { asyncHandler, parseInput } from '../http-helpers.js';
import type { RouteContext } from './context.js';
import { describeModel } from './model-info.js';

/**
 * Flatten a conversation into a plain prompt, one "role: content" line
 * per message, ending with the assistant turn.
 */
export function buildPrompt(messages: readonly ChatMessage[]): string {
  const lines = messages.map((message) => `${message.role}: ${message.content}\n`);
  return `${lines.join('')}assistant: `;
}

function sampling(body: GenerateRequest): { max_tokens: number; temperature: number; top_p: number; stop?: string[] } {
  return {
    max_tokens: body.max_tokens,
    temperature: body.temperature,
    top_p: body.top_p,
    stop: body.stop,
  };
}

export function createGenerateRouter(ctx: RouteContext): Router {
  const router = express.Router();

  router.post(
    '/chat',
    ctx.requireKey('generate'),
    ctx.jsonBody(),
    asyncHandler(async (req: Request, res: Response) => {
      const context = ctx.contextOf(req);
      const body = parseInput(GenerateRequestSchema, req.body);
      const signal = ctx.signalFor(res);

      const modelId = ctx.modelFor('generate');
      const result = await ctx.run(
        context,
        'generate',
        (model, options) => chat(model, { messages: body.messages, ...sampling(body) }, options),
        { signal }
      );

      res.json({
        message: result.message,
        model: modelId,
        finish_reason: result.finish_reason ?? 'stop',
        usage: result.usage ?? null,
      });
    })
  );

  router.post(
    '/completion',
    ctx.requireKey('generate'),
    ctx.jsonBody(),
    asyncHandler(async (req: Request, res: Response) => {
      const context = ctx.contextOf(req);
      const body = parseInput(GenerateRequestSchema, req.body);
      const signal = ctx.signalFor(res);

      const modelId = ctx.modelFor('generate');
      const result = await ctx.run(
        context,
        'generate',
        (model, options) => complete(model, { prompt: buildPrompt(body.messages), ...sampling(body) }, options),
        { signal }
      );

      res.json({
        text: result.text,
        model: modelId,
        finish_reason: result.finish_reason ?? 'stop',
        tokens_used: result.tokens_used ?? null,
      });
    })
  );

  router.get('/model-info', ctx.requireKey('generate'), (_req: Request, res: Response) => {
    res.json(describeModel(ctx, 'generate'));
  });

  return router;
}
