import { AuthorizationRequiredError } from '@wxgate/domain';
import type { FastifyReply, FastifyRequest } from 'fastify';
import type { RequestSessions } from '../../session.js';
import type { AuthFlow } from './service.js';
import type { AuthenticatedUser } from './types.js';

const authenticated = new WeakMap<FastifyRequest, AuthenticatedUser>();

/** The user the auth pre-handler attached to this request. */
export function authenticatedUser(request: FastifyRequest): AuthenticatedUser {
  const context = authenticated.get(request);
  if (!context) {
    throw new AuthorizationRequiredError('Route is not guarded by the auth pre-handler.');
  }
  return context;
}

function queryCode(query: unknown): string | undefined {
  if (typeof query !== 'object' || query === null || !('code' in query)) {
    return undefined;
  }
  return typeof query.code === 'string' && query.code.length > 0 ? query.code : undefined;
}

export interface AuthPreHandlerOptions {
  flow: AuthFlow;
  sessions: RequestSessions;
  /** Public origin used to rebuild the current URL; defaults to the request's own host. */
  publicUrl?: string;
}

export function currentUrlOf(request: FastifyRequest, publicUrl?: string): string {
  const base = publicUrl ?? `${request.protocol}://${request.hostname}`;
  return new URL(request.url, base).toString();
}

export type AuthPreHandler = (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | undefined>;

/** Guards a route: either attaches the signed-in user or answers with a redirect to consent. */
export function createAuthPreHandler(options: AuthPreHandlerOptions): AuthPreHandler {
  return async function authPreHandler(request, reply) {
    const session = await options.sessions.open(request, reply);
    const code = queryCode(request.query);
    const outcome = await options.flow.authenticate({
      ...(code ? { code } : {}),
      currentUrl: currentUrlOf(request, options.publicUrl),
      session
    });

    if (outcome.kind === 'redirect') {
      return reply.redirect(outcome.location);
    }

    authenticated.set(request, { identityId: outcome.identityId, user: outcome.user });
    return undefined;
  };
}
