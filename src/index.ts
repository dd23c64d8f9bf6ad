export { Gateway, createGateway, type GatewayComponents, type GatewayDependencies } from './gateway.js';
export {
  GatewayError,
  RETRY_POLICY,
  isGatewayError,
  toGatewayError,
  type GatewayErrorCode,
  type GatewayErrorShape,
  type ModelUnavailableReason,
  type RetryPolicy,
} from './api/errors.js';
export { loadConfig, parseConfig, initializeConfig, getConfig, resetConfig, type Environment } from './config/loader.js';
export { createLogger, lazyLog } from './utils/logger-helpers.js';

// Access control
export { KeyRegistry, hashKey, KEY_PREFIX_LENGTH, type KeyRegistryOptions } from './auth/key-registry.js';
export { FileKeyStore, InMemoryKeyStore, type KeyStore } from './auth/key-store.js';
export { RateLimiter, type RateLimiterOptions, type RateLimitScope } from './auth/rate-limiter.js';
export { UsageLog } from './auth/usage-log.js';

// Scheduling
export { ModelSlotManager, type ModelSlotDefinition, type ModelSlotManagerConfig } from './core/model-slot-manager.js';
export { AdmissionController, type AdmissionControllerConfig } from './core/admission-controller.js';
export { Dispatcher, type DispatchRequest, type RequestContext, type RunOptions } from './core/dispatcher.js';

// Back-ends
export { WorkerBackend, type WorkerBackendOptions } from './backends/worker-backend.js';
export { JsonRpcTransport, JsonRpcError } from './bridge/jsonrpc-transport.js';
export * as tasks from './inference/tasks.js';

// HTTP
export { HttpServer } from './server/http-server.js';
export { RouteContext } from './server/routes/context.js';

export * from './types/index.js';
export * from './types/schemas/index.js';
