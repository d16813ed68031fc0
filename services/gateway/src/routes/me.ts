import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { authenticatedUser, type AuthPreHandler } from '../modules/auth-flow/index.js';
import type { RequestSessions } from '../session.js';

const remarkSchema = z.object({ remark: z.string().max(30) });

const groupSchema = z.object({
  group: z.union([z.number().int().nonnegative(), z.string().min(1)])
});

export function registerMeRoutes(
  app: FastifyInstance,
  deps: {
    guard: AuthPreHandler;
    sessions: RequestSessions;
  }
): void {
  const { guard, sessions } = deps;

  app.get('/me', { preHandler: guard }, async (request) => {
    const { identityId, user } = authenticatedUser(request);
    return { identityId, profile: user.baseFields() };
  });

  app.get('/me/extended', { preHandler: guard }, async (request) => {
    const { identityId, user } = authenticatedUser(request);
    await user.upgrade();
    return { identityId, profile: user.toJSON() };
  });

  app.put('/me/remark', { preHandler: guard }, async (request) => {
    const { remark } = remarkSchema.parse(request.body);
    const { user } = authenticatedUser(request);
    await user.setRemark(remark);
    return { remark: await user.remark() };
  });

  app.get('/me/group', { preHandler: guard }, async (request) => {
    const { user } = authenticatedUser(request);
    return { group: await user.group() };
  });

  app.put('/me/group', { preHandler: guard }, async (request) => {
    const { group } = groupSchema.parse(request.body);
    const { user } = authenticatedUser(request);
    return { groupId: await user.setGroup(group) };
  });

  app.post('/logout', async (request, reply) => {
    await sessions.destroy(request, reply);
    return reply.status(204).send();
  });
}
