import { loadGatewayConfig } from '@wxgate/config';
import { closeDb } from '@wxgate/db';
import { createServiceLogger } from '@wxgate/observability';
import { PostgresSessionBackend } from '@wxgate/session';
import { createSessionBackend } from '../app.js';
import { runSessionCleanupJob } from './session-cleanup.js';

const logger = createServiceLogger({ service: 'gateway' }).child({ job: 'session-cleanup' });

async function main(): Promise<void> {
  const config = loadGatewayConfig();
  const backend = createSessionBackend(config, () => new Date());
  if (!(backend instanceof PostgresSessionBackend)) {
    logger.info('Session store is in memory; nothing to clean up');
    return;
  }

  try {
    await runSessionCleanupJob(backend, { batchSize: config.SESSION_CLEANUP_BATCH_SIZE, maxBatches: 20 }, logger);
  } finally {
    await closeDb();
  }
}

main().catch((error: unknown) => {
  logger.error('Session cleanup failed', { error: error instanceof Error ? error.message : String(error) });
  process.exitCode = 1;
});
