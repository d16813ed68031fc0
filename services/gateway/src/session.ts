import type { SessionBackend, SessionStore } from '@wxgate/session';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { randomBytes } from 'node:crypto';

export const SESSION_COOKIE = 'wxg_sid';

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{32,128}$/;

export function readSessionId(cookieHeader: string | undefined): string | null {
  if (!cookieHeader) {
    return null;
  }

  for (const part of cookieHeader.split(';')) {
    const separator = part.indexOf('=');
    if (separator === -1) continue;
    if (part.slice(0, separator).trim() !== SESSION_COOKIE) continue;

    const value = part.slice(separator + 1).trim();
    return SESSION_ID_PATTERN.test(value) ? value : null;
  }
  return null;
}

export function newSessionId(): string {
  return randomBytes(24).toString('base64url');
}

export function sessionCookie(sessionId: string, maxAgeSeconds: number, secure: boolean): string {
  const attributes = [`${SESSION_COOKIE}=${sessionId}`, 'Path=/', 'HttpOnly', 'SameSite=Lax', `Max-Age=${maxAgeSeconds}`];
  if (secure) {
    attributes.push('Secure');
  }
  return attributes.join('; ');
}

export interface RequestSessionsOptions {
  ttlSeconds: number;
  secureCookie: boolean;
}

/**
 * Opens the caller's session once per request, issuing a fresh session
 * cookie when the request carries none (or an unusable one).
 */
export class RequestSessions {
  private readonly opened = new WeakMap<FastifyRequest, Promise<SessionStore>>();

  constructor(
    private readonly backend: SessionBackend,
    private readonly options: RequestSessionsOptions
  ) {}

  open(request: FastifyRequest, reply: FastifyReply): Promise<SessionStore> {
    let session = this.opened.get(request);
    if (!session) {
      let sessionId = readSessionId(request.headers.cookie);
      if (!sessionId) {
        sessionId = newSessionId();
        reply.header('set-cookie', sessionCookie(sessionId, this.options.ttlSeconds, this.options.secureCookie));
      }
      session = this.backend.open(sessionId);
      this.opened.set(request, session);
    }
    return session;
  }

  async destroy(request: FastifyRequest, reply: FastifyReply): Promise<void> {
    const sessionId = readSessionId(request.headers.cookie);
    if (sessionId) {
      await this.backend.destroy(sessionId);
    }
    reply.header('set-cookie', sessionCookie('', 0, this.options.secureCookie));
  }
}
