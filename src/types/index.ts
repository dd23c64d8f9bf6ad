/**
 * Main type exports for edge-inference-gateway
 */

export * from './auth.js';
export * from './models.js';
export * from './admission.js';
