import { describe, expect, it } from 'vitest';
import { newSessionId, readSessionId, sessionCookie } from '../src/session.js';

const SESSION_ID = 'abcdefghijklmnopqrstuvwxyz012345';

describe('session cookie helpers', () => {
  it('reads the session id among other cookies', () => {
    expect(readSessionId(`theme=dark; wxg_sid=${SESSION_ID}; lang=en`)).toBe(SESSION_ID);
  });

  it('ignores missing and malformed ids', () => {
    expect(readSessionId(undefined)).toBeNull();
    expect(readSessionId('theme=dark')).toBeNull();
    expect(readSessionId('wxg_sid=short')).toBeNull();
    expect(readSessionId(`wxg_sid=${SESSION_ID.slice(0, 31)}!`)).toBeNull();
  });

  it('issues ids the reader accepts', () => {
    const sessionId = newSessionId();

    expect(sessionId).toHaveLength(32);
    expect(readSessionId(`wxg_sid=${sessionId}`)).toBe(sessionId);
  });

  it('formats the cookie attributes', () => {
    expect(sessionCookie(SESSION_ID, 3600, false)).toBe(
      `wxg_sid=${SESSION_ID}; Path=/; HttpOnly; SameSite=Lax; Max-Age=3600`
    );
    expect(sessionCookie('', 0, true)).toBe('wxg_sid=; Path=/; HttpOnly; SameSite=Lax; Max-Age=0; Secure');
  });
});
