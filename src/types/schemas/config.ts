/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating runtime.yaml configuration, with
 * cross-field validation of model routes, pinned and preloaded ids.
 *
 * @module schemas/config
 */

import { z } from 'zod';

export const CAPABILITIES = ['generate', 'transcribe', 'embed', 'ocr', 'business', 'admin'] as const;

export const MODEL_KINDS = [
  'generate',
  'transcribe',
  'embed',
  'ocr',
  'classify',
  'sentiment',
  'ner',
  'summarize',
  'translate',
] as const;

/**
 * Model ids are "<type>:<name>", e.g. "llm:mistral-7b".
 */
export const ModelIdSchema = z
  .string()
  .regex(/^[a-z0-9][a-z0-9_-]*:[A-Za-z0-9][A-Za-z0-9._\-/]*$/, 'must look like "<type>:<name>"');

/**
 * HTTP Server Configuration
 */
export const ServerConfigSchema = z.object({
  host: z.string().min(1, 'Host cannot be empty'),
  port: z.number().int().min(0).max(65535, 'Port must be <= 65535'),
  json_body_limit_mb: z.number().positive('must be positive'),
  audio_upload_limit_mb: z.number().positive('must be positive'),
  image_upload_limit_mb: z.number().positive('must be positive'),
  cors_origins: z.array(z.string()),
});

/**
 * Rate limit policy as written in YAML
 */
export const RateLimitPolicyConfigSchema = z.object({
  max_requests: z.number().int().positive('Max requests must be positive'),
  window_ms: z.number().int().positive('Window must be positive'),
});

/**
 * API Key Authentication Configuration
 */
export const AuthConfigSchema = z
  .object({
    header_name: z.string().min(1, 'Header name cannot be empty'),
    key_prefix: z.string().min(1).max(8, 'Key prefix must be <= 8 characters'),
    store: z.enum(['file', 'memory']),
    store_path: z.string().min(1, 'Store path cannot be empty').optional(),
    default_rate_limit: RateLimitPolicyConfigSchema,
    /** How often key usage counters are written back to the store; 0 writes only on shutdown */
    usage_flush_interval_ms: z.number().int().nonnegative().default(30_000),
  })
  .refine((data) => data.store !== 'file' || data.store_path !== undefined, {
    message: 'store_path is required when store is "file"',
    path: ['store_path'],
  });

/**
 * Rate Limiter Configuration
 */
export const RateLimitConfigSchema = z.object({
  scope: z.enum(['key', 'capability']),
  /** 0 disables the background sweep */
  cleanup_interval_ms: z.number().int().nonnegative('Cleanup interval cannot be negative'),
});

export const UsageLogConfigSchema = z.object({
  max_entries: z.number().int().min(0, 'must be >= 0'),
});

export const AdmissionConfigSchema = z.object({
  priority_ordering: z.boolean(),
});

/**
 * Worker process settings; `default_worker` applies to every model,
 * a definition's `worker` block overrides individual fields.
 */
export const WorkerConfigSchema = z.object({
  command: z.string().min(1, 'Worker command cannot be empty'),
  args: z.array(z.string()),
  env: z.record(z.string()).optional(),
  startup_timeout_ms: z.number().int().min(1000, 'must be >= 1000ms'),
  request_timeout_ms: z.number().int().positive('must be positive'),
  shutdown_timeout_ms: z.number().int().positive('must be positive'),
  max_line_buffer_bytes: z.number().int().min(1024, 'must be >= 1024 bytes'),
});

export const ModelDefinitionConfigSchema = z
  .object({
    id: ModelIdSchema,
    kind: z.enum(MODEL_KINDS),
    enabled: z.boolean().default(true),
    path: z.string().min(1).optional(),
    estimated_memory_mb: z.number().positive('Estimated memory must be positive'),
    max_concurrent: z.number().int().positive('Max concurrent must be positive'),
    queue_depth: z.number().int().min(0, 'must be >= 0'),
    queue_timeout_ms: z.number().int().positive('Queue timeout must be positive'),
    options: z.record(z.unknown()).default({}),
    worker: WorkerConfigSchema.partial().optional(),
  });

/**
 * Model Slot Manager Configuration
 */
export const ModelsConfigSchema = z.object({
  memory_budget_mb: z.number().positive('Memory budget must be positive'),
  drain_timeout_ms: z.number().int().positive('Drain timeout must be positive'),
  pinned: z.array(z.string()),
  preload: z.array(z.string()),
  default_worker: WorkerConfigSchema,
  definitions: z.array(ModelDefinitionConfigSchema),
});

/**
 * Route name -> model id. Route names are model kinds.
 */
export const RoutesConfigSchema = z.object({
  generate: z.string().optional(),
  transcribe: z.string().optional(),
  embed: z.string().optional(),
  ocr: z.string().optional(),
  classify: z.string().optional(),
  sentiment: z.string().optional(),
  ner: z.string().optional(),
  summarize: z.string().optional(),
  translate: z.string().optional(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
});

/**
 * Runtime Configuration Schema (Base)
 */
const RuntimeConfigSchemaBase = z.object({
  server: ServerConfigSchema,
  auth: AuthConfigSchema,
  rate_limit: RateLimitConfigSchema,
  usage_log: UsageLogConfigSchema,
  admission: AdmissionConfigSchema,
  models: ModelsConfigSchema,
  routes: RoutesConfigSchema,
  logging: LoggingConfigSchema,
});

type RuntimeConfigBase = z.infer<typeof RuntimeConfigSchemaBase>;

/**
 * Cross-field checks that only make sense on the merged document.
 * Budget arithmetic is left to the slot manager, which owns the budget.
 */
function validateReferences(config: RuntimeConfigBase, ctx: z.RefinementCtx): void {
  const byId = new Map<string, (typeof config.models.definitions)[number]>();

  config.models.definitions.forEach((definition, index) => {
    if (byId.has(definition.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `duplicate model id "${definition.id}"`,
        path: ['models', 'definitions', index, 'id'],
      });
    }
    byId.set(definition.id, definition);
  });

  for (const [route, modelId] of Object.entries(config.routes)) {
    if (modelId === undefined) {
      continue;
    }
    const definition = byId.get(modelId);
    if (!definition) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `route points at unknown model "${modelId}"`,
        path: ['routes', route],
      });
    } else if (definition.kind !== route) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `route expects a "${route}" model but "${modelId}" is "${definition.kind}"`,
        path: ['routes', route],
      });
    }
  }

  for (const list of ['pinned', 'preload'] as const) {
    config.models[list].forEach((modelId, index) => {
      if (!byId.has(modelId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `unknown model "${modelId}"`,
          path: ['models', list, index],
        });
      }
    });
  }
}

/**
 * Runtime Configuration Schema
 *
 * Validates the merged document (environments already applied).
 */
export const RuntimeConfigSchema = RuntimeConfigSchemaBase.superRefine(validateReferences);

/**
 * Shape of the raw YAML file before environment overrides are applied.
 * Environment entries are free-form partial documents.
 */
export const RuntimeConfigFileSchema = z
  .object({
    environments: z
      .object({
        production: z.record(z.unknown()).optional(),
        development: z.record(z.unknown()).optional(),
        test: z.record(z.unknown()).optional(),
      })
      .optional(),
  })
  .passthrough();

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
export type RuntimeConfigInput = z.input<typeof RuntimeConfigSchema>;
export type ModelDefinitionConfig = z.infer<typeof ModelDefinitionConfigSchema>;
export type WorkerConfig = z.infer<typeof WorkerConfigSchema>;
export type RouteName = keyof z.infer<typeof RoutesConfigSchema>;
