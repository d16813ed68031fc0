import { ApiError, ERRORS } from '@wxgate/domain';
import type { ServiceLogger } from '@wxgate/observability';
import { verifyPushSignature } from '@wxgate/signing';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { PushMessage } from '../modules/push/index.js';

const pushQuerySchema = z.object({
  signature: z.string().min(1),
  timestamp: z.string().min(1),
  nonce: z.string().min(1),
  echostr: z.string().optional()
});

/** Returns the passive reply XML, or null to answer with a bare `success`. */
export type PushHandler = (message: PushMessage) => Promise<string | null> | string | null;

export function registerPushRoutes(
  app: FastifyInstance,
  deps: {
    pushToken: string | undefined;
    logger: ServiceLogger;
    clock: () => Date;
    onPush?: PushHandler;
  }
): void {
  const { pushToken, logger } = deps;

  const verify = (request: FastifyRequest): z.infer<typeof pushQuerySchema> => {
    if (!pushToken) {
      throw new ApiError(ERRORS.NOT_FOUND);
    }
    const query = pushQuerySchema.safeParse(request.query);
    const valid =
      query.success &&
      verifyPushSignature({
        token: pushToken,
        timestamp: query.data.timestamp,
        nonce: query.data.nonce,
        signature: query.data.signature
      });
    if (!query.success || !valid) {
      throw new ApiError(ERRORS.PUSH_SIGNATURE_INVALID);
    }
    return query.data;
  };

  // Endpoint verification handshake.
  app.get('/push', async (request, reply) => {
    const query = verify(request);
    return reply.type('text/plain').send(query.echostr ?? '');
  });

  app.post('/push', async (request, reply) => {
    verify(request);
    const message = PushMessage.parse(typeof request.body === 'string' ? request.body : '', deps.clock);

    logger.debug('push received', { type: message.type, fromUser: message.fromUser });

    const answer = deps.onPush ? await deps.onPush(message) : null;
    if (answer === null) {
      return reply.type('text/plain').send('success');
    }
    return reply.type('application/xml').send(answer);
  });
}
