/**
 * HTTP Server
 *
 * Express application exposing the gateway routes:
 * - /generate, /transcribe, /embeddings, /ocr, /business (API key)
 * - /admin (API key with the admin capability)
 * - GET /health (open)
 *
 * Bodies are parsed per route, after the API key is checked.
 *
 * @example
 * ```typescript
 * const server = new HttpServer(routeContext);
 * const address = await server.start(8000, '0.0.0.0');
 * ```
 */

import express, { type Application, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Logger } from 'pino';
import { notFound } from '../api/errors.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { sendError } from './http-helpers.js';
import type { RouteContext } from './routes/context.js';
import { createAdminRouter } from './routes/admin.js';
import { createBusinessRouter } from './routes/business.js';
import { createEmbeddingsRouter } from './routes/embeddings.js';
import { createGenerateRouter } from './routes/generate.js';
import { createHealthRouter } from './routes/health.js';
import { createOcrRouter } from './routes/ocr.js';
import { createTranscribeRouter } from './routes/transcribe.js';

export class HttpServer {
  private readonly app: Application;
  private readonly ctx: RouteContext;
  private readonly logger?: Logger;
  private server?: Server;
  private closing?: Server;

  constructor(ctx: RouteContext) {
    this.ctx = ctx;
    this.logger = ctx.logger?.child({ component: 'http' });

    this.app = express();
    this.app.disable('x-powered-by');
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  /** The Express application, for tests that drive it directly */
  get application(): Application {
    return this.app;
  }

  private setupMiddleware(): void {
    const { server, auth } = this.ctx.config;

    this.app.use(
      cors({
        origin: server.cors_origins.includes('*') ? '*' : server.cors_origins,
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type', auth.header_name],
        exposedHeaders: ['Retry-After', 'X-RateLimit-Limit', 'X-RateLimit-Remaining', 'X-RateLimit-Reset'],
      })
    );

    // Request logging and usage accounting
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const startedAt = Date.now();
      res.on('finish', () => {
        const endpoint = `${req.baseUrl}${req.path}`;
        const keyPrefix = this.ctx.callerOf(req);
        if (keyPrefix !== undefined) {
          this.ctx.usageLog.record({
            keyPrefix,
            endpoint,
            method: req.method,
            status: res.statusCode,
            ip: req.ip ?? 'unknown',
            timestamp: startedAt,
          });
        }
        lazyLog(
          this.logger,
          'debug',
          () => ({
            method: req.method,
            path: endpoint,
            status: res.statusCode,
            keyPrefix,
            durationMs: Date.now() - startedAt,
          }),
          'HTTP request'
        );
      });
      next();
    });
  }

  private setupRoutes(): void {
    this.app.use('/health', createHealthRouter(this.ctx));
    this.app.use('/generate', createGenerateRouter(this.ctx));
    this.app.use('/transcribe', createTranscribeRouter(this.ctx));
    this.app.use('/embeddings', createEmbeddingsRouter(this.ctx));
    this.app.use('/ocr', createOcrRouter(this.ctx));
    this.app.use('/business', createBusinessRouter(this.ctx));
    this.app.use('/admin', createAdminRouter(this.ctx));
  }

  private setupErrorHandling(): void {
    // 404 handler
    this.app.use((req: Request, res: Response) => {
      sendError(res, notFound(`Route ${req.method} ${req.path}`));
    });

    // Global error handler
    this.app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      sendError(res, err, this.logger);
    });
  }

  /**
   * Start listening; resolves with the bound address (port 0 picks a
   * free one).
   */
  async start(port: number, host: string): Promise<AddressInfo> {
    if (this.server) {
      throw new Error('HTTP server already started');
    }

    return new Promise<AddressInfo>((resolve, reject) => {
      const server = this.app.listen(port, host);
      const onError = (error: Error): void => {
        this.server = undefined;
        this.logger?.error({ err: error, port, host }, 'Failed to start HTTP server');
        reject(error);
      };

      server.once('error', onError);
      server.once('listening', () => {
        server.off('error', onError);
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('HTTP server is not bound to a TCP port'));
          return;
        }
        this.logger?.info({ host: address.address, port: address.port }, 'HTTP server listening');
        resolve(address);
      });
      this.server = server;
    });
  }

  /**
   * Stop accepting connections and wait for open ones to finish.
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.closing = server;
    this.server = undefined;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          this.logger?.error({ err: error }, 'Failed to stop HTTP server');
          reject(error);
        } else {
          this.logger?.info('HTTP server stopped');
          resolve();
        }
      });
      server.closeIdleConnections();
    });
    this.closing = undefined;
  }

  /**
   * Drop keep-alive connections still open after stop().
   */
  closeAllConnections(): void {
    (this.closing ?? this.server)?.closeAllConnections();
  }
}
