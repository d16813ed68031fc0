import { epochSeconds, SESSION_FIELDS, systemClock, type Clock, type SessionStore } from './types.js';

/** Seconds shaved off the provider's lifetime so a token is never used at the edge of expiry. */
export const ACCESS_TOKEN_SAFETY_MARGIN_SECONDS = 180;

export interface TokenGrant {
  accessToken: string;
  expiresIn: number;
  refreshToken: string;
}

export interface StoredTokens {
  accessToken: string;
  /** Epoch seconds after which the access token is treated as expired. */
  accessTokenExpiresAt: number;
  refreshToken: string;
}

export class TokenStore {
  constructor(
    private readonly session: SessionStore,
    private readonly clock: Clock = systemClock
  ) {}

  async getIdentityId(): Promise<string | null> {
    const value = await this.session.get(SESSION_FIELDS.identityId);
    return value ? value : null;
  }

  async setIdentityId(identityId: string): Promise<void> {
    await this.session.set(SESSION_FIELDS.identityId, identityId);
  }

  async getTokens(): Promise<StoredTokens | null> {
    const accessToken = await this.session.get(SESSION_FIELDS.accessToken);
    if (!accessToken) {
      return null;
    }

    const rawExpiresAt = Number(await this.session.get(SESSION_FIELDS.accessTokenExpiresAt));
    return {
      accessToken,
      // An unreadable expiry forces a refresh.
      accessTokenExpiresAt: Number.isFinite(rawExpiresAt) ? rawExpiresAt : 0,
      refreshToken: (await this.session.get(SESSION_FIELDS.refreshToken)) ?? ''
    };
  }

  /** Persists a grant and returns the computed expiry in epoch seconds. */
  async setTokens(grant: TokenGrant): Promise<number> {
    const expiresAt = epochSeconds(this.clock) + grant.expiresIn - ACCESS_TOKEN_SAFETY_MARGIN_SECONDS;

    await this.session.set(SESSION_FIELDS.accessToken, grant.accessToken);
    await this.session.set(SESSION_FIELDS.accessTokenExpiresAt, String(expiresAt));
    await this.session.set(SESSION_FIELDS.refreshToken, grant.refreshToken);

    return expiresAt;
  }

  isExpired(tokens: Pick<StoredTokens, 'accessTokenExpiresAt'>): boolean {
    return epochSeconds(this.clock) >= tokens.accessTokenExpiresAt;
  }

  async clear(): Promise<void> {
    for (const field of Object.values(SESSION_FIELDS)) {
      await this.session.delete(field);
    }
  }
}
