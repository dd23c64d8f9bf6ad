/**
 * Logger Helpers
 *
 * Root logger construction and lazy evaluation of log context objects,
 * so hot paths (authentication, admission) only build context when the
 * level is enabled.
 */

import { pino, type Logger } from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

export type ConfiguredLogLevel = LogLevel | 'silent';

const LOG_LEVELS: ReadonlySet<string> = new Set<ConfiguredLogLevel>([
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
]);

function isLogLevel(value: string): value is ConfiguredLogLevel {
  return LOG_LEVELS.has(value);
}

/**
 * Create the process root logger.
 *
 * GATEWAY_LOG_LEVEL overrides the configured level. Raw API keys never
 * reach a log line: header values are redacted.
 */
export function createLogger(level: ConfiguredLogLevel = 'info', name = 'edge-inference-gateway'): Logger {
  const override = process.env.GATEWAY_LOG_LEVEL;
  const finalLevel = override !== undefined && isLogLevel(override) ? override : level;

  return pino({
    name,
    level: finalLevel,
    redact: {
      paths: ['req.headers["x-api-key"]', 'headers["x-api-key"]', 'rawKey', 'digest'],
      censor: '[redacted]',
    },
  });
}

/**
 * Lazy log helper that only evaluates context when log level is enabled
 *
 * @param logger - Pino logger instance (can be undefined)
 * @param level - Log level (trace, debug, info, warn, error, fatal)
 * @param contextBuilder - Function that builds the context object (only called if logging)
 * @param message - Log message string
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ keyPrefix, capability }), 'Authorized request');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
