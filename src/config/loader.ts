/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import {
  RuntimeConfigFileSchema,
  RuntimeConfigSchema,
  type RuntimeConfig,
} from '../types/schemas/config.js';
import { GatewayError, configurationError } from '../api/errors.js';

export type Environment = 'production' | 'development' | 'test';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. Arrays and scalars in `source` replace the
 * target value; nested objects merge.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

export function defaultConfigPath(): string {
  return join(findPackageRoot(), 'config', 'runtime.yaml');
}

function resolveEnvironment(environment?: string): Environment {
  const env = environment ?? process.env.NODE_ENV ?? 'development';
  return env === 'production' || env === 'test' ? env : 'development';
}

/**
 * Apply process environment overrides to the merged document.
 */
function applyEnvOverrides(document: PlainObject, env: NodeJS.ProcessEnv): PlainObject {
  const server: PlainObject = isPlainObject(document.server) ? { ...document.server } : {};

  if (env.GATEWAY_PORT !== undefined) {
    const port = Number.parseInt(env.GATEWAY_PORT, 10);
    if (!Number.isInteger(port)) {
      throw configurationError(`GATEWAY_PORT must be an integer, got "${env.GATEWAY_PORT}"`);
    }
    server.port = port;
  }
  if (env.GATEWAY_HOST !== undefined && env.GATEWAY_HOST.length > 0) {
    server.host = env.GATEWAY_HOST;
  }

  return { ...document, server };
}

/**
 * Validate a parsed YAML document: apply the environment entry, the
 * process environment overrides, then the schema.
 */
export function parseConfig(
  raw: unknown,
  environment?: Environment,
  env: NodeJS.ProcessEnv = process.env
): RuntimeConfig {
  const fileResult = RuntimeConfigFileSchema.safeParse(raw);
  if (!fileResult.success) {
    throw configurationError('Configuration file must contain a YAML mapping');
  }

  const { environments, ...base } = fileResult.data;
  const overrides = environments?.[resolveEnvironment(environment)];
  const merged = applyEnvOverrides(overrides ? deepMerge(base, overrides) : base, env);

  const parseResult = RuntimeConfigSchema.safeParse(merged);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field} ${issue.message}`;
    });
    throw configurationError(`Configuration validation failed:\n${errors.join('\n')}`, {
      issues: errors,
    });
  }

  return parseResult.data;
}

/**
 * Load configuration from YAML file
 *
 * The path defaults to GATEWAY_CONFIG, then config/runtime.yaml in the
 * package root.
 */
export function loadConfig(configPath?: string, environment?: Environment): RuntimeConfig {
  const finalPath = configPath ?? process.env.GATEWAY_CONFIG ?? defaultConfigPath();

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(finalPath, 'utf8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw configurationError(`Configuration file not found: ${finalPath}`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw configurationError(`Failed to load configuration from ${finalPath}: ${message}`);
  }

  return parseConfig(raw, environment);
}

/**
 * Global configuration instance
 */
let globalConfig: RuntimeConfig | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: Environment): RuntimeConfig {
  globalConfig = loadConfig(configPath, environment);
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): RuntimeConfig {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}

export function isConfigurationError(error: unknown): error is GatewayError {
  return error instanceof GatewayError && error.code === 'ConfigurationError';
}
