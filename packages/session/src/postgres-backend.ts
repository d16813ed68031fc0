import { query as defaultQuery, type Queryable } from '@wxgate/db';
import type { ServiceLogger } from '@wxgate/observability';
import { openSealed, seal, type KeyProvider } from '@wxgate/security';
import { z } from 'zod';
import { systemClock, type Clock, type SessionBackend, type SessionStore } from './types.js';

const sealedPayloadSchema = z.object({
  algo: z.literal('aes-256-gcm'),
  keyVersion: z.string().min(1),
  ivB64: z.string(),
  tagB64: z.string(),
  ciphertextB64: z.string()
});

const sessionFieldsSchema = z.record(z.string());

function parseJsonColumn(value: unknown): unknown {
  return typeof value === 'string' ? JSON.parse(value) : value;
}

export interface PostgresSessionBackendOptions {
  keys: KeyProvider;
  ttlSeconds: number;
  db?: Queryable;
  clock?: Clock;
  logger?: ServiceLogger;
}

/**
 * Sessions persisted in `wx_session`. Each row holds every field of one
 * session as a single AES-GCM sealed JSON document bound to the session id.
 * Every write re-seals the document and slides the expiry forward.
 */
export class PostgresSessionBackend implements SessionBackend {
  private readonly db: Queryable;
  private readonly clock: Clock;

  constructor(private readonly options: PostgresSessionBackendOptions) {
    this.db = options.db ?? { query: defaultQuery };
    this.clock = options.clock ?? systemClock;
  }

  async open(sessionId: string): Promise<SessionStore> {
    const fields = await this.load(sessionId);

    return {
      sessionId,
      get: async (field) => fields.get(field),
      set: async (field, value) => {
        fields.set(field, value);
        await this.persist(sessionId, fields);
      },
      delete: async (field) => {
        if (fields.delete(field)) {
          await this.persist(sessionId, fields);
        }
      }
    };
  }

  async destroy(sessionId: string): Promise<void> {
    await this.db.query('delete from wx_session where session_id = $1', [sessionId]);
  }

  /** Deletes up to `batchSize` expired rows; returns how many were deleted. */
  async purgeExpired(batchSize = 5000): Promise<number> {
    const result = await this.db.query(
      `
    delete from wx_session
    where ctid in (
      select ctid from wx_session
      where expires_at <= $1
      limit $2
    )
    `,
      [this.clock(), batchSize]
    );
    return result.rowCount;
  }

  private async load(sessionId: string): Promise<Map<string, string>> {
    const result = await this.db.query<{ payload: unknown }>(
      'select payload from wx_session where session_id = $1 and expires_at > $2',
      [sessionId, this.clock()]
    );
    const row = result.rows[0];
    if (!row) {
      return new Map();
    }

    const sealed = sealedPayloadSchema.safeParse(parseJsonColumn(row.payload));
    if (!sealed.success) {
      this.options.logger?.warn('session payload is malformed; starting a fresh session', { sessionId });
      return new Map();
    }

    let plainText: string;
    try {
      plainText = await openSealed(sealed.data, sessionId, this.options.keys);
    } catch (error) {
      this.options.logger?.warn('session payload could not be opened; starting a fresh session', {
        sessionId,
        keyVersion: sealed.data.keyVersion,
        error: error instanceof Error ? error.message : String(error)
      });
      return new Map();
    }

    const fields = sessionFieldsSchema.parse(JSON.parse(plainText));
    return new Map(Object.entries(fields));
  }

  private async persist(sessionId: string, fields: Map<string, string>): Promise<void> {
    const sealed = await seal(JSON.stringify(Object.fromEntries(fields)), sessionId, this.options.keys);
    const expiresAt = new Date(this.clock().getTime() + this.options.ttlSeconds * 1000);

    await this.db.query(
      `insert into wx_session (session_id, payload, expires_at, updated_at)
       values ($1, $2::jsonb, $3, now())
       on conflict (session_id)
       do update set payload = excluded.payload, expires_at = excluded.expires_at, updated_at = now()`,
      [sessionId, sealed, expiresAt]
    );
  }
}
