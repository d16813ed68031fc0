import { describe, expect, it } from 'vitest';
import { InMemorySessionBackend } from '../src/memory-backend.js';
import { TokenStore } from '../src/token-store.js';

const NOW_MS = 1_700_000_000_000;

function clockAt(ms: number) {
  return () => new Date(ms);
}

describe('TokenStore', () => {
  it('stores the expiry as now + expires_in - 180 seconds', async () => {
    const backend = new InMemorySessionBackend();
    const store = new TokenStore(await backend.open('sid-1'), clockAt(NOW_MS));

    const expiresAt = await store.setTokens({ accessToken: 'access-1', expiresIn: 7200, refreshToken: 'refresh-1' });

    expect(expiresAt).toBe(1_700_007_020);
    expect(backend.snapshot('sid-1')).toEqual({
      wx_access_token: 'access-1',
      wx_access_token_expires_at: '1700007020',
      wx_refresh_token: 'refresh-1'
    });
  });

  it('reads back what it wrote', async () => {
    const backend = new InMemorySessionBackend();
    const store = new TokenStore(await backend.open('sid-1'), clockAt(NOW_MS));
    await store.setIdentityId('openid-1');
    await store.setTokens({ accessToken: 'access-1', expiresIn: 7200, refreshToken: 'refresh-1' });

    expect(await store.getIdentityId()).toBe('openid-1');
    expect(await store.getTokens()).toEqual({
      accessToken: 'access-1',
      accessTokenExpiresAt: 1_700_007_020,
      refreshToken: 'refresh-1'
    });
  });

  it('returns null when the session holds no tokens', async () => {
    const store = new TokenStore(await new InMemorySessionBackend().open('empty'));

    expect(await store.getTokens()).toBeNull();
    expect(await store.getIdentityId()).toBeNull();
  });

  it('treats a token as expired from the stored instant onward', async () => {
    const session = await new InMemorySessionBackend().open('sid-1');
    const expiresAt = 1_700_007_020;

    expect(new TokenStore(session, clockAt(expiresAt * 1000 - 1)).isExpired({ accessTokenExpiresAt: expiresAt })).toBe(false);
    expect(new TokenStore(session, clockAt(expiresAt * 1000)).isExpired({ accessTokenExpiresAt: expiresAt })).toBe(true);
  });

  it('counts a lifetime shorter than the margin as already expired', async () => {
    const store = new TokenStore(await new InMemorySessionBackend().open('sid-1'), clockAt(NOW_MS));
    const expiresAt = await store.setTokens({ accessToken: 'a', expiresIn: 100, refreshToken: 'r' });

    expect(expiresAt).toBe(1_699_999_920);
    expect(store.isExpired({ accessTokenExpiresAt: expiresAt })).toBe(true);
  });

  it('treats an unreadable expiry as expired', async () => {
    const backend = new InMemorySessionBackend();
    const session = await backend.open('sid-1');
    await session.set('wx_access_token', 'access-1');
    await session.set('wx_access_token_expires_at', 'soon');
    const store = new TokenStore(session, clockAt(NOW_MS));

    const tokens = await store.getTokens();

    expect(tokens?.accessTokenExpiresAt).toBe(0);
    expect(tokens?.refreshToken).toBe('');
    expect(store.isExpired({ accessTokenExpiresAt: 0 })).toBe(true);
  });

  it('clears every login field', async () => {
    const backend = new InMemorySessionBackend();
    const session = await backend.open('sid-1');
    await session.set('cart', 'kept');
    const store = new TokenStore(session, clockAt(NOW_MS));
    await store.setIdentityId('openid-1');
    await store.setTokens({ accessToken: 'a', expiresIn: 7200, refreshToken: 'r' });

    await store.clear();

    expect(backend.snapshot('sid-1')).toEqual({ cart: 'kept' });
  });
});
