import { loadGatewayConfig } from '@wxgate/config';
import postgres from 'postgres';
import { loadDbConfig } from './pool-config.js';

export type QueryRow = Record<string, unknown>;
type PostgresSql = ReturnType<typeof postgres>;

let singletonSql: PostgresSql | undefined;

export interface QueryResult<Row extends QueryRow = QueryRow> {
  rows: Row[];
  rowCount: number;
}

export interface Queryable {
  query: <Row extends QueryRow = QueryRow>(sql: string, params?: unknown[]) => Promise<QueryResult<Row>>;
}

function normalizeParam(param: unknown): unknown {
  if (param instanceof Date) {
    return param.toISOString();
  }

  if (Array.isArray(param)) {
    return JSON.stringify(param);
  }

  if (param !== null && typeof param === 'object' && !(param instanceof Buffer) && !ArrayBuffer.isView(param)) {
    return JSON.stringify(param);
  }

  return param;
}

export function normalizeQueryParams(params: unknown[] = []): unknown[] {
  return params.map((param) => normalizeParam(param));
}

function withStatementTimeout(connectionString: string, statementTimeoutMs: number): string {
  try {
    const url = new URL(connectionString);
    if (!url.searchParams.has('statement_timeout')) {
      url.searchParams.set('statement_timeout', String(statementTimeoutMs));
    }
    return url.toString();
  } catch {
    return connectionString;
  }
}

function toRowCount(rows: { length: number; count?: unknown }): number {
  const resultCount = rows.count;
  if (typeof resultCount === 'number') {
    return resultCount;
  }
  if (typeof resultCount === 'bigint') {
    return Number(resultCount);
  }
  return rows.length;
}

export function getSql(): PostgresSql {
  if (singletonSql) {
    return singletonSql;
  }

  const runtime = loadGatewayConfig();
  if (!runtime.DATABASE_URL) {
    throw new Error('DATABASE_URL is not configured.');
  }

  const config = loadDbConfig();
  singletonSql = postgres(withStatementTimeout(runtime.DATABASE_URL, config.statementTimeoutMs), {
    max: config.maxConnections,
    idle_timeout: config.idleTimeoutSeconds,
    connect_timeout: config.connectTimeoutSeconds,
    max_lifetime: config.maxLifetimeSeconds,
    prepare: config.prepareStatements
  });

  return singletonSql;
}

export async function query<Row extends QueryRow = QueryRow>(
  queryText: string,
  params: unknown[] = []
): Promise<QueryResult<Row>> {
  const rows = await getSql().unsafe<Row[]>(queryText, normalizeQueryParams(params) as never[]);
  return {
    rows: [...rows],
    rowCount: toRowCount(rows)
  };
}

export async function dbHealthcheck(): Promise<boolean> {
  const result = await query<{ ok: number }>('select 1 as ok');
  return result.rows[0]?.ok === 1;
}

export async function closeDb(): Promise<void> {
  if (singletonSql) {
    await singletonSql.end({ timeout: 5 });
    singletonSql = undefined;
  }
}
