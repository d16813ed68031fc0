export { log, setLogSink, type LogLevel, type LogSink } from './logger.js';
export { createServiceLogger, redactMetadata, type ServiceLogger, type ServiceLoggerConfig } from './service-logger.js';
export { createServiceMetrics, type ServiceMetrics } from './metrics.js';
