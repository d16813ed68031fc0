import { userProfileSchema, type OAuthScope, type ProviderClient, type UserProfile } from '@wxgate/adapters';
import type { ServiceLogger } from '@wxgate/observability';
import { ProfileCache, systemClock, TokenStore, type Clock } from '@wxgate/session';
import { GroupDirectory, UserView } from '../users/index.js';
import type { AuthenticateInput, AuthOutcome } from './types.js';

export interface AuthFlowOptions {
  provider: ProviderClient;
  scope: OAuthScope;
  /** Zero disables the session profile cache. */
  profileTtlSeconds: number;
  clock?: Clock;
  logger?: ServiceLogger;
}

/** Removes the one-shot `code` and `state` parameters so they are not replayed after consent. */
export function stripAuthParams(currentUrl: string): string {
  const url = new URL(currentUrl);
  url.searchParams.delete('code');
  url.searchParams.delete('state');
  return url.toString();
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Login state machine for one request.
 *
 * A code in the request is exchanged and its grant stored. A session without
 * an identity, without a stored token, with a token that cannot be refreshed,
 * or whose profile cannot be fetched is sent back to the consent page.
 */
export class AuthFlow {
  private readonly clock: Clock;

  constructor(private readonly options: AuthFlowOptions) {
    this.clock = options.clock ?? systemClock;
  }

  async authenticate(input: AuthenticateInput): Promise<AuthOutcome> {
    const tokens = new TokenStore(input.session, this.clock);

    if (input.code) {
      // Exchange failures are not a reason to loop back to consent; they surface as-is.
      const grant = await this.options.provider.exchangeCode(input.code);
      await tokens.setIdentityId(grant.openid);
      await tokens.setTokens({
        accessToken: grant.access_token,
        expiresIn: grant.expires_in,
        refreshToken: grant.refresh_token
      });
    }

    const identityId = await tokens.getIdentityId();
    if (!identityId) {
      return this.redirect(input.currentUrl);
    }

    const stored = await tokens.getTokens();
    if (!stored) {
      return this.redirect(input.currentUrl);
    }

    let accessToken = stored.accessToken;
    if (tokens.isExpired(stored)) {
      try {
        const refreshed = await this.options.provider.refreshAccessToken(stored.refreshToken);
        await tokens.setTokens({
          accessToken: refreshed.access_token,
          expiresIn: refreshed.expires_in,
          refreshToken: refreshed.refresh_token
        });
        accessToken = refreshed.access_token;
      } catch (error) {
        this.options.logger?.info('access token refresh failed; asking for consent again', {
          identityId,
          reason: reasonOf(error)
        });
        return this.redirect(input.currentUrl);
      }
    }

    const profile = await this.loadProfile(input, identityId, accessToken);
    if (!profile) {
      return this.redirect(input.currentUrl);
    }

    const user = new UserView(identityId, profile, {
      provider: this.options.provider,
      // Group list is memoized for this request only.
      groups: new GroupDirectory(this.options.provider)
    });
    return { kind: 'authenticated', identityId, user };
  }

  private async loadProfile(input: AuthenticateInput, identityId: string, accessToken: string): Promise<UserProfile | null> {
    // Base-scope grants cannot read the profile endpoint.
    if (this.options.scope === 'snsapi_base') {
      return { openid: identityId };
    }

    const cache = new ProfileCache(input.session, {
      ttlSeconds: this.options.profileTtlSeconds,
      schema: userProfileSchema,
      clock: this.clock
    });

    if (cache.enabled) {
      const cached = await cache.get();
      if (cached) {
        return cached;
      }
    }

    let profile: UserProfile;
    try {
      profile = await this.options.provider.getUserInfoByToken(accessToken, identityId);
    } catch (error) {
      this.options.logger?.warn('profile fetch failed; asking for consent again', { identityId, reason: reasonOf(error) });
      return null;
    }

    await cache.set(profile);
    return profile;
  }

  private redirect(currentUrl: string): AuthOutcome {
    return { kind: 'redirect', location: this.options.provider.authorizeUrl(stripAuthParams(currentUrl)) };
  }
}
