/**
 * Environment-driven connection settings for the session database.
 */

export interface DbConfig {
  /** Max pool connections (default: 10 in production, 3 elsewhere). */
  maxConnections: number;
  /** Close idle connections after this many seconds (default: 30). */
  idleTimeoutSeconds: number;
  /** Give up connecting after this many seconds (default: 5). */
  connectTimeoutSeconds: number;
  /** Recycle connections after this many seconds (default: 30 minutes). */
  maxLifetimeSeconds: number;
  /** Statement timeout in ms (default: 5s). Session reads are single-row. */
  statementTimeoutMs: number;
  /** Use prepared statements; disable behind transaction-mode poolers. */
  prepareStatements: boolean;
}

function numberFromEnv(value: string | undefined, fallback: number): number {
  const parsed = Number(value ?? fallback);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadDbConfig(env: NodeJS.ProcessEnv = process.env): DbConfig {
  const isProd = (env.NODE_ENV ?? 'development') === 'production';

  return {
    maxConnections: numberFromEnv(env.DB_POOL_MAX, isProd ? 10 : 3),
    idleTimeoutSeconds: numberFromEnv(env.DB_IDLE_TIMEOUT_SECONDS, 30),
    connectTimeoutSeconds: numberFromEnv(env.DB_CONNECT_TIMEOUT_SECONDS, 5),
    maxLifetimeSeconds: numberFromEnv(env.DB_MAX_LIFETIME_SECONDS, 30 * 60),
    statementTimeoutMs: numberFromEnv(env.DB_STATEMENT_TIMEOUT_MS, 5_000),
    prepareStatements: env.DB_PREPARE_STATEMENTS !== 'false'
  };
}
