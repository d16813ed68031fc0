import { Counter, Gauge, Histogram, Registry } from 'prom-client';

export interface ServiceMetrics {
  registry: Registry;
  requestDurationMs: Histogram<string>;
  requestCount: Counter<string>;
  errorCount: Counter<string>;
  providerCallCount: Counter<string>;
  buildInfo: Gauge<string>;
}

export function createServiceMetrics(serviceName: string): ServiceMetrics {
  const registry = new Registry();
  const prefix = serviceName.replaceAll('-', '_');

  const requestDurationMs = new Histogram({
    name: `${prefix}_request_duration_ms`,
    help: 'Request duration in milliseconds',
    labelNames: ['method', 'route', 'status'] as const,
    buckets: [10, 25, 50, 100, 250, 500, 1000, 2000],
    registers: [registry]
  });

  const requestCount = new Counter({
    name: `${prefix}_request_total`,
    help: 'Total HTTP requests',
    labelNames: ['method', 'route', 'status'] as const,
    registers: [registry]
  });

  const errorCount = new Counter({
    name: `${prefix}_error_total`,
    help: 'Total errors by error code',
    labelNames: ['code'] as const,
    registers: [registry]
  });

  const providerCallCount = new Counter({
    name: `${prefix}_provider_call_total`,
    help: 'Calls made to the social-login and payment provider',
    labelNames: ['operation', 'outcome'] as const,
    registers: [registry]
  });

  const buildInfo = new Gauge({
    name: `${prefix}_build_info`,
    help: 'Build and deployment metadata for this running service',
    labelNames: ['release_id', 'git_sha', 'environment'] as const,
    registers: [registry]
  });

  buildInfo
    .labels(process.env.RELEASE_ID ?? 'dev', process.env.GIT_SHA ?? 'local', process.env.NODE_ENV ?? 'development')
    .set(1);

  return {
    registry,
    requestDurationMs,
    requestCount,
    errorCount,
    providerCallCount,
    buildInfo
  };
}
