/**
 * Session Cleanup Job
 *
 * Deletes `wx_session` rows past their sliding expiry. Reads already skip
 * expired rows; this keeps the table from growing without bound.
 */

import type { ServiceLogger } from '@wxgate/observability';
import type { PostgresSessionBackend } from '@wxgate/session';

export interface SessionCleanupConfig {
  /** Max rows deleted per batch. */
  batchSize: number;
  /** Batches per run; a run stops early once a batch comes back short. */
  maxBatches: number;
}

export interface SessionCleanupResult {
  expiredDeleted: number;
  batches: number;
}

export async function runSessionCleanupJob(
  backend: Pick<PostgresSessionBackend, 'purgeExpired'>,
  config: SessionCleanupConfig,
  logger?: ServiceLogger
): Promise<SessionCleanupResult> {
  const result: SessionCleanupResult = { expiredDeleted: 0, batches: 0 };

  while (result.batches < config.maxBatches) {
    const deleted = await backend.purgeExpired(config.batchSize);
    result.batches++;
    result.expiredDeleted += deleted;
    if (deleted < config.batchSize) {
      break;
    }
  }

  if (result.expiredDeleted > 0) {
    logger?.info('Session cleanup completed', { ...result });
  }

  return result;
}
