import { z } from 'zod';
import { epochSeconds, SESSION_FIELDS, systemClock, type Clock, type SessionStore } from './types.js';

const cacheEnvelopeSchema = z.object({ expires_at: z.number().default(0) }).passthrough();

export interface ProfileCacheOptions<Profile> {
  /** Zero disables caching entirely. */
  ttlSeconds: number;
  schema: z.ZodType<Profile, z.ZodTypeDef, unknown>;
  clock?: Clock;
}

/**
 * Session-scoped copy of the user's profile. The stored JSON is the profile
 * plus an `expires_at` epoch-seconds field; a missing stamp counts as expired.
 */
export class ProfileCache<Profile extends object> {
  private readonly ttlSeconds: number;
  private readonly schema: z.ZodType<Profile, z.ZodTypeDef, unknown>;
  private readonly clock: Clock;

  constructor(
    private readonly session: SessionStore,
    options: ProfileCacheOptions<Profile>
  ) {
    this.ttlSeconds = options.ttlSeconds;
    this.schema = options.schema;
    this.clock = options.clock ?? systemClock;
  }

  get enabled(): boolean {
    return this.ttlSeconds > 0;
  }

  async get(): Promise<Profile | null> {
    const raw = await this.session.get(SESSION_FIELDS.profile);
    if (!raw) {
      return null;
    }

    let stored: unknown;
    try {
      stored = JSON.parse(raw);
    } catch {
      // Corrupt entries are treated as a cache miss and overwritten on the next fetch.
      return null;
    }
    const envelope = cacheEnvelopeSchema.safeParse(stored);
    if (!envelope.success) {
      return null;
    }

    const { expires_at: expiresAt, ...profile } = envelope.data;
    if (expiresAt <= epochSeconds(this.clock)) {
      return null;
    }

    const parsed = this.schema.safeParse(profile);
    return parsed.success ? parsed.data : null;
  }

  async set(profile: Profile): Promise<void> {
    if (!this.enabled) {
      return;
    }

    const expiresAt = epochSeconds(this.clock) + this.ttlSeconds;
    await this.session.set(SESSION_FIELDS.profile, JSON.stringify({ ...profile, expires_at: expiresAt }));
  }

  async clear(): Promise<void> {
    await this.session.delete(SESSION_FIELDS.profile);
  }
}
