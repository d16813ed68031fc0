/** Session field names shared with the host's session storage. */
export const SESSION_FIELDS = {
  identityId: 'wx_openid',
  accessToken: 'wx_access_token',
  accessTokenExpiresAt: 'wx_access_token_expires_at',
  refreshToken: 'wx_refresh_token',
  profile: 'wx_userinfo'
} as const;

export type SessionField = (typeof SESSION_FIELDS)[keyof typeof SESSION_FIELDS];

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function epochSeconds(clock: Clock): number {
  return clock().getTime() / 1000;
}

/** One user agent's session, as seen by a single request. */
export interface SessionStore {
  readonly sessionId: string;
  get(field: string): Promise<string | undefined>;
  set(field: string, value: string): Promise<void>;
  delete(field: string): Promise<void>;
}

export interface SessionBackend {
  open(sessionId: string): Promise<SessionStore>;
  destroy(sessionId: string): Promise<void>;
}
