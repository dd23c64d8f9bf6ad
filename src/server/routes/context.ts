/**
 * Shared state handed to every route module.
 *
 * Routes mount `requireKey()` (or `requireAccess()`) ahead of any body
 * parser, so an unauthenticated caller is refused before its body is
 * read.
 */

import express, { type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import type { Logger } from 'pino';
import type { ApiKeyView, Capability } from '../../types/auth.js';
import type { ModelDefinitionConfig, RouteName, RuntimeConfig } from '../../types/schemas/config.js';
import type { KeyRegistry } from '../../auth/key-registry.js';
import type { UsageLog } from '../../auth/usage-log.js';
import type { AdmissionController } from '../../core/admission-controller.js';
import type { Dispatcher, ModelInvoker, RequestContext, RunOptions } from '../../core/dispatcher.js';
import type { ModelSlotManager } from '../../core/model-slot-manager.js';
import { GatewayError, modelUnavailable } from '../../api/errors.js';
import { headerValue, requestSignal, setRateLimitHeaders } from '../http-helpers.js';

const MB = 1024 * 1024;

export interface RouteDeps {
  config: RuntimeConfig;
  dispatcher: Dispatcher;
  registry: KeyRegistry;
  slots: ModelSlotManager;
  admission: AdmissionController;
  usageLog: UsageLog;
  logger?: Logger;
}

export class RouteContext {
  public readonly config: RuntimeConfig;
  public readonly dispatcher: Dispatcher;
  public readonly registry: KeyRegistry;
  public readonly slots: ModelSlotManager;
  public readonly admission: AdmissionController;
  public readonly usageLog: UsageLog;
  public readonly logger?: Logger;

  private readonly callers = new WeakMap<Request, string>();
  private readonly contexts = new WeakMap<Request, RequestContext>();
  private readonly keys = new WeakMap<Request, ApiKeyView>();
  private readonly definitions = new Map<string, ModelDefinitionConfig>();
  private readonly jsonParser: RequestHandler;

  constructor(deps: RouteDeps) {
    this.config = deps.config;
    this.dispatcher = deps.dispatcher;
    this.registry = deps.registry;
    this.slots = deps.slots;
    this.admission = deps.admission;
    this.usageLog = deps.usageLog;
    this.logger = deps.logger;

    for (const definition of deps.config.models.definitions) {
      this.definitions.set(definition.id, definition);
    }
    this.jsonParser = express.json({ limit: Math.floor(deps.config.server.json_body_limit_mb * MB) });
  }

  /**
   * Model id configured for a route.
   */
  public modelFor(route: RouteName): string {
    const modelId = this.config.routes[route];
    if (modelId === undefined) {
      throw modelUnavailable(route, 'unknown_model', `No model is configured for ${route}`);
    }
    return modelId;
  }

  /** Model id for a route, or undefined when the route is not configured */
  public optionalModelFor(route: RouteName): string | undefined {
    return this.config.routes[route];
  }

  public modelOptions(modelId: string): Record<string, unknown> {
    return this.definitions.get(modelId)?.options ?? {};
  }

  public modelDefinition(modelId: string): ModelDefinitionConfig {
    const definition = this.definitions.get(modelId);
    if (!definition) {
      throw modelUnavailable(modelId, 'unknown_model');
    }
    return definition;
  }

  /**
   * Middleware: authenticate, authorize and charge the request, then set
   * the quota headers. Handlers read the result with `contextOf()`.
   */
  public requireKey(capability: Capability): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
      try {
        const context = this.dispatcher.authorizeRequest(this.apiKey(req), capability);
        this.callers.set(req, context.key.keyPrefix);
        this.contexts.set(req, context);
        setRateLimitHeaders(res, context.rateLimit);
      } catch (error) {
        next(error);
        return;
      }
      next();
    };
  }

  /**
   * Middleware: authenticate and authorize without charging quota.
   * Handlers read the key with `keyOf()`.
   */
  public requireAccess(capability: Capability): RequestHandler {
    return (req: Request, _res: Response, next: NextFunction) => {
      try {
        const key = this.dispatcher.checkAccess(this.apiKey(req), capability);
        this.callers.set(req, key.keyPrefix);
        this.keys.set(req, key);
      } catch (error) {
        next(error);
        return;
      }
      next();
    };
  }

  /** JSON body parser with the configured size limit */
  public jsonBody(): RequestHandler {
    return this.jsonParser;
  }

  public contextOf(req: Request): RequestContext {
    const context = this.contexts.get(req);
    if (!context) {
      throw new GatewayError('InternalError', `No request context for ${req.method} ${req.originalUrl}`);
    }
    return context;
  }

  public keyOf(req: Request): ApiKeyView {
    const key = this.keys.get(req) ?? this.contexts.get(req)?.key;
    if (!key) {
      throw new GatewayError('InternalError', `No API key for ${req.method} ${req.originalUrl}`);
    }
    return key;
  }

  public run<T>(
    context: RequestContext,
    route: RouteName,
    invoke: ModelInvoker<T>,
    options: RunOptions = {}
  ): Promise<T> {
    return this.dispatcher.runOnModel(context, this.modelFor(route), invoke, options);
  }

  /** Signal for one request, aborted on client disconnect */
  public signalFor(res: Response): AbortSignal {
    return requestSignal(res);
  }

  /** Prefix of the key that made the request, once authenticated */
  public callerOf(req: Request): string | undefined {
    return this.callers.get(req);
  }

  private apiKey(req: Request): string | undefined {
    return headerValue(req, this.config.auth.header_name);
  }
}
