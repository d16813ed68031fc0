import type { PayFields } from '@wxgate/adapters';
import { ApiError, ERRORS } from '@wxgate/domain';
import type { ServiceLogger } from '@wxgate/observability';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { authenticatedUser, type AuthPreHandler } from '../modules/auth-flow/index.js';
import type { PaymentService } from '../modules/payments/index.js';

const createOrderSchema = z.object({
  out_trade_no: z.string().min(1).max(32),
  body: z.string().min(1).max(128),
  total_fee: z.number().int().positive(),
  attach: z.string().max(127).optional(),
  detail: z.string().optional(),
  product_id: z.string().max(32).optional()
});

const orderParamsSchema = z.object({ outTradeNo: z.string().min(1).max(32) });

export type PaymentNotificationHook = (fields: PayFields) => Promise<void> | void;

function requirePayments(payments: PaymentService | null): PaymentService {
  if (!payments) {
    throw new ApiError(ERRORS.PAYMENTS_DISABLED);
  }
  return payments;
}

export function registerOrderRoutes(
  app: FastifyInstance,
  deps: {
    guard: AuthPreHandler;
    payments: PaymentService | null;
    logger: ServiceLogger;
    onPaymentNotification?: PaymentNotificationHook;
  }
): void {
  const { guard, payments, logger } = deps;

  app.post('/v1/orders', { preHandler: guard }, async (request, reply) => {
    const service = requirePayments(payments);
    const body = createOrderSchema.parse(request.body);
    const { identityId } = authenticatedUser(request);

    const payload = await service.createOrder({
      ...body,
      openid: identityId,
      spbill_create_ip: request.ip
    });
    return reply.status(201).send(payload);
  });

  app.get('/v1/orders/:outTradeNo', { preHandler: guard }, async (request) => {
    const service = requirePayments(payments);
    const { outTradeNo } = orderParamsSchema.parse(request.params);
    return service.queryOrder({ out_trade_no: outTradeNo });
  });

  app.post('/v1/orders/:outTradeNo/close', { preHandler: guard }, async (request) => {
    const service = requirePayments(payments);
    const { outTradeNo } = orderParamsSchema.parse(request.params);
    return service.closeOrder({ out_trade_no: outTradeNo });
  });

  app.post('/pay/notify', async (request, reply) => {
    const service = requirePayments(payments);
    const xml = typeof request.body === 'string' ? request.body : '';

    let fields: PayFields;
    try {
      fields = service.parseNotification(xml);
    } catch (error) {
      logger.warn('payment notification rejected', {
        requestId: request.id,
        reason: error instanceof Error ? error.message : String(error)
      });
      return reply.status(400).type('application/xml').send(service.notificationAck(false, 'Invalid notification'));
    }

    await deps.onPaymentNotification?.(fields);
    logger.info('payment notification accepted', {
      outTradeNo: fields.out_trade_no,
      resultCode: fields.result_code
    });
    return reply.type('application/xml').send(service.notificationAck(true));
  });
}
