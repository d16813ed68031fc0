export { deny, errorEnvelope, replyWithError, toApiError } from './errors.js';
export { registerServiceMetrics } from './metrics.js';
export { runService, runServiceAndExit, type ServiceBootstrapOptions } from './bootstrap.js';
