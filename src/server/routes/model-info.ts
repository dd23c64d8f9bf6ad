/**
 * Descriptions served by the informational routes. Nothing here loads a
 * model; the slot state is reported as it stands.
 */

import { z } from 'zod';
import { round } from '../../business/analytics.js';
import { LanguageCode } from '../../types/schemas/common.js';
import type { RouteName } from '../../types/schemas/config.js';
import type { RouteContext } from './context.js';

const MB = 1024 * 1024;

const LanguagesOptionSchema = z.array(LanguageCode).min(1);

/**
 * Languages a model was configured with through its `languages` option.
 */
export function configuredLanguages(options: Record<string, unknown>, fallback: readonly string[]): string[] {
  const parsed = LanguagesOptionSchema.safeParse(options.languages);
  return parsed.success ? parsed.data : [...fallback];
}

export function describeModel(ctx: RouteContext, route: RouteName): Record<string, unknown> {
  const modelId = ctx.modelFor(route);
  const definition = ctx.modelDefinition(modelId);
  const status = ctx.slots.getSlotStatus(modelId);

  return {
    model_id: modelId,
    kind: definition.kind,
    state: status?.state ?? 'unloaded',
    loaded: status?.state === 'ready',
    enabled: status?.enabled ?? definition.enabled,
    pinned: status?.pinned ?? false,
    estimated_memory_mb: definition.estimated_memory_mb,
    reserved_memory_mb: round((status?.reservedBytes ?? 0) / MB, 1),
    max_concurrent: definition.max_concurrent,
    load_count: status?.loadCount ?? 0,
    last_error: status?.lastError ?? null,
    options: definition.options,
  };
}
