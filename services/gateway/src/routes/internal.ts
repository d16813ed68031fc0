import type { ProviderClient } from '@wxgate/adapters';
import { ApiError, ERRORS } from '@wxgate/domain';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import { timingSafeEqual } from 'node:crypto';
import { z } from 'zod';
import type { AccountTools } from '../modules/account/index.js';
import type { PaymentService } from '../modules/payments/index.js';
import { GroupDirectory, type GroupRef } from '../modules/users/index.js';

const groupNameSchema = z.object({ name: z.string().min(1).max(30) });
const groupParamsSchema = z.object({ group: z.string().min(1) });

const qrcodeSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('temporary'),
    sceneId: z.number().int().positive(),
    expireSeconds: z.number().int().positive().max(2_592_000)
  }),
  z.object({ kind: z.literal('permanent'), sceneId: z.number().int().min(1).max(100_000) }),
  z.object({ kind: z.literal('permanent_str'), sceneStr: z.string().min(1).max(64) })
]);

const shortUrlSchema = z.object({ longUrl: z.string().url() });

const refundSchema = z
  .object({
    out_refund_no: z.string().min(1).max(64),
    total_fee: z.number().int().positive(),
    refund_fee: z.number().int().positive(),
    out_trade_no: z.string().min(1).optional(),
    transaction_id: z.string().min(1).optional(),
    op_user_id: z.string().min(1).optional()
  })
  .refine((value) => value.refund_fee <= value.total_fee, {
    message: 'refund_fee must not exceed total_fee.',
    path: ['refund_fee']
  });

const refundQuerySchema = z.object({
  transaction_id: z.string().min(1).optional(),
  out_trade_no: z.string().min(1).optional(),
  out_refund_no: z.string().min(1).optional(),
  refund_id: z.string().min(1).optional()
});

const billQuerySchema = z.object({
  bill_date: z.string().regex(/^\d{8}$/),
  bill_type: z.enum(['ALL', 'SUCCESS', 'REFUND']).default('ALL')
});

const reportSchema = z.object({
  interface_url: z.string().url(),
  execute_time: z.number().int().nonnegative(),
  return_code: z.string().min(1),
  result_code: z.string().min(1),
  user_ip: z.string().min(1),
  return_msg: z.string().optional(),
  err_code: z.string().optional(),
  err_code_des: z.string().optional(),
  out_trade_no: z.string().optional()
});

/** Path segments that are all digits address a group by id; anything else by name. */
export function toGroupRef(segment: string): GroupRef {
  return /^\d+$/.test(segment) ? Number(segment) : segment;
}

function bearerMatches(request: FastifyRequest, expected: string): boolean {
  const header = request.headers.authorization;
  if (!header?.startsWith('Bearer ')) {
    return false;
  }
  const provided = Buffer.from(header.slice('Bearer '.length), 'utf8');
  const wanted = Buffer.from(expected, 'utf8');
  return provided.length === wanted.length && timingSafeEqual(provided, wanted);
}

function requirePayments(payments: PaymentService | null): PaymentService {
  if (!payments) {
    throw new ApiError(ERRORS.PAYMENTS_DISABLED);
  }
  return payments;
}

/** Operator endpoints; every route needs the internal bearer token. */
export function registerInternalRoutes(
  app: FastifyInstance,
  deps: {
    apiToken: string;
    provider: ProviderClient;
    account: AccountTools;
    payments: PaymentService | null;
  }
): void {
  const { account, payments } = deps;
  const groups = (): GroupDirectory => new GroupDirectory(deps.provider);

  void app.register(async (internal) => {
    internal.addHook('onRequest', async (request) => {
      if (!bearerMatches(request, deps.apiToken)) {
        throw new ApiError(ERRORS.UNAUTHORIZED, 'Internal API token required.');
      }
    });

    internal.get('/groups', async () => ({ groups: await groups().list() }));

    internal.post('/groups', async (request, reply) => {
      const { name } = groupNameSchema.parse(request.body);
      return reply.status(201).send(await groups().create(name));
    });

    internal.put('/groups/:group', async (request) => {
      const { group } = groupParamsSchema.parse(request.params);
      const { name } = groupNameSchema.parse(request.body);
      return { id: await groups().rename(toGroupRef(group), name), name };
    });

    internal.delete('/groups/:group', async (request, reply) => {
      const { group } = groupParamsSchema.parse(request.params);
      await groups().remove(toGroupRef(group));
      return reply.status(204).send();
    });

    internal.post('/qrcodes', async (request, reply) => {
      const scene = qrcodeSchema.parse(request.body);
      return reply.status(201).send(await account.createQrcode(scene));
    });

    internal.post('/short-urls', async (request, reply) => {
      const { longUrl } = shortUrlSchema.parse(request.body);
      return reply.status(201).send({ shortUrl: await account.shortenUrl(longUrl) });
    });

    internal.post('/refunds', async (request, reply) => {
      const service = requirePayments(payments);
      const body = refundSchema.parse(request.body);
      return reply.status(201).send(await service.refund(body));
    });

    internal.get('/refunds', async (request) => {
      const service = requirePayments(payments);
      return service.queryRefund(refundQuerySchema.parse(request.query));
    });

    internal.get('/bills', async (request, reply) => {
      const service = requirePayments(payments);
      const bill = await service.downloadBill(billQuerySchema.parse(request.query));
      return reply.type('text/plain; charset=utf-8').send(bill);
    });

    internal.post('/reports', async (request) => {
      const service = requirePayments(payments);
      return service.report(reportSchema.parse(request.body));
    });
  }, { prefix: '/internal' });
}
