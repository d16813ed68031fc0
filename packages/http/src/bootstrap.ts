import { log } from '@wxgate/observability';
import type { FastifyInstance } from 'fastify';

export interface ServiceBootstrapOptions {
  serviceName: string;
  buildApp: () => Promise<FastifyInstance>;
  host: string;
  port: number;
  onShutdown?: () => Promise<void> | void;
}

export async function runService(options: ServiceBootstrapOptions): Promise<void> {
  const app = await options.buildApp();

  await app.listen({ port: options.port, host: options.host });
  log('info', `${options.serviceName} listening`, { host: options.host, port: options.port });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    log('warn', `${options.serviceName} shutting down`, { signal });

    await app.close();
    await options.onShutdown?.();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

export function runServiceAndExit(options: ServiceBootstrapOptions): void {
  void runService(options).catch((error: unknown) => {
    log('error', `${options.serviceName} failed to start`, {
      error: error instanceof Error ? error.message : String(error)
    });
    process.exit(1);
  });
}
