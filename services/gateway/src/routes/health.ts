import type { ServiceLogger, ServiceMetrics } from '@wxgate/observability';
import type { FastifyInstance } from 'fastify';

function runtimeVersion(service: string): Record<string, string> {
  return {
    service,
    releaseId: process.env.RELEASE_ID ?? 'dev',
    gitSha: process.env.GIT_SHA ?? 'local',
    environment: process.env.NODE_ENV ?? 'development'
  };
}

export type ReadinessCheck = () => Promise<boolean>;

async function runCheck(check: ReadinessCheck, logger: ServiceLogger, name: string): Promise<boolean> {
  try {
    return await check();
  } catch (error) {
    logger.warn('readiness check failed', { check: name, error: error instanceof Error ? error.message : String(error) });
    return false;
  }
}

export function registerHealthRoutes(
  app: FastifyInstance,
  deps: {
    service: string;
    metrics: ServiceMetrics;
    logger: ServiceLogger;
    checks?: Record<string, ReadinessCheck>;
  }
): void {
  app.get('/healthz', async () => ({ ok: true, service: deps.service }));
  app.get('/readyz', async (_request, reply) => {
    const checks: Record<string, boolean> = {};
    for (const [name, check] of Object.entries(deps.checks ?? {})) {
      checks[name] = await runCheck(check, deps.logger, name);
    }
    const ok = Object.values(checks).every(Boolean);
    return reply.status(ok ? 200 : 503).send({ ok, service: deps.service, checks });
  });
  app.get('/version', async () => runtimeVersion(deps.service));
  app.get('/metrics', async (_request, reply) => {
    reply.header('content-type', deps.metrics.registry.contentType);
    return deps.metrics.registry.metrics();
  });
}
