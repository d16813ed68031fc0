import { createProviderClient, type ProviderClient } from '@wxgate/adapters';
import { loadGatewayConfig, paymentSettingsFrom, type GatewayConfig } from '@wxgate/config';
import { dbHealthcheck } from '@wxgate/db';
import { ERRORS } from '@wxgate/domain';
import { errorEnvelope, registerServiceMetrics } from '@wxgate/http';
import { createServiceLogger, createServiceMetrics } from '@wxgate/observability';
import { StaticKeyProvider } from '@wxgate/security';
import { InMemorySessionBackend, PostgresSessionBackend, systemClock, type Clock, type SessionBackend } from '@wxgate/session';
import Fastify, { type FastifyInstance } from 'fastify';
import { frameworkStatusOf, toGatewayError } from './errors.js';
import { AccountTools } from './modules/account/index.js';
import { AuthFlow, createAuthPreHandler } from './modules/auth-flow/index.js';
import { PaymentService } from './modules/payments/index.js';
import { registerHealthRoutes, type ReadinessCheck } from './routes/health.js';
import { registerInternalRoutes } from './routes/internal.js';
import { registerMeRoutes } from './routes/me.js';
import { registerOrderRoutes, type PaymentNotificationHook } from './routes/orders.js';
import { registerPushRoutes, type PushHandler } from './routes/push.js';
import { RequestSessions } from './session.js';

const SERVICE_NAME = 'gateway';

export interface GatewayAppOptions {
  config?: GatewayConfig;
  /** Overrides the client chosen by WX_PROVIDER. */
  provider?: ProviderClient;
  /** Overrides the backend chosen by SESSION_STORE. */
  sessions?: SessionBackend;
  clock?: Clock;
  nonce?: () => string;
  onPush?: PushHandler;
  onPaymentNotification?: PaymentNotificationHook;
  /** Overrides the dependency checks behind /readyz. */
  readinessChecks?: Record<string, ReadinessCheck>;
}

export function createSessionBackend(config: GatewayConfig, clock: Clock): SessionBackend {
  if (config.SESSION_STORE === 'memory') {
    return new InMemorySessionBackend();
  }

  return new PostgresSessionBackend({
    keys: new StaticKeyProvider({
      keyVersion: 'v1',
      ...(config.SESSION_KEY_B64 ? { base64Key: config.SESSION_KEY_B64 } : {})
    }),
    ttlSeconds: config.SESSION_TTL_SECONDS,
    clock,
    logger: createServiceLogger({ service: SERVICE_NAME }).child({ component: 'session-store' })
  });
}

export async function buildGatewayApp(options: GatewayAppOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? loadGatewayConfig();
  const clock = options.clock ?? systemClock;
  const logger = createServiceLogger({ service: SERVICE_NAME });

  const app = Fastify({ logger: false, trustProxy: config.GATEWAY_TRUST_PROXY });
  const metrics = registerServiceMetrics(app, createServiceMetrics(SERVICE_NAME));

  // Push and payment notifications arrive as XML documents.
  app.addContentTypeParser(['text/xml', 'application/xml'], { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  const provider =
    options.provider ??
    createProviderClient({
      provider: config.WX_PROVIDER,
      appId: config.WX_APP_ID,
      appSecret: config.WX_APP_SECRET,
      scope: config.WX_OAUTH_SCOPE,
      logger: logger.child({ component: 'provider' }),
      metrics
    });

  const sessions = new RequestSessions(options.sessions ?? createSessionBackend(config, clock), {
    ttlSeconds: config.SESSION_TTL_SECONDS,
    secureCookie: config.NODE_ENV === 'production'
  });
  const flow = new AuthFlow({
    provider,
    scope: config.WX_OAUTH_SCOPE,
    profileTtlSeconds: config.WX_USERINFO_TTL_SECONDS,
    clock,
    logger: logger.child({ component: 'auth-flow' })
  });
  const guard = createAuthPreHandler({
    flow,
    sessions,
    ...(config.GATEWAY_PUBLIC_URL ? { publicUrl: config.GATEWAY_PUBLIC_URL } : {})
  });

  const paymentSettings = paymentSettingsFrom(config);
  const payments = paymentSettings
    ? new PaymentService(provider, paymentSettings, {
        clock,
        logger: logger.child({ component: 'payments' }),
        ...(options.nonce ? { nonce: options.nonce } : {})
      })
    : null;

  registerHealthRoutes(app, {
    service: SERVICE_NAME,
    metrics,
    logger,
    ...(options.readinessChecks
      ? { checks: options.readinessChecks }
      : config.SESSION_STORE === 'postgres'
        ? { checks: { database: dbHealthcheck } }
        : {})
  });
  registerMeRoutes(app, { guard, sessions });
  registerOrderRoutes(app, {
    guard,
    payments,
    logger,
    ...(options.onPaymentNotification ? { onPaymentNotification: options.onPaymentNotification } : {})
  });
  registerPushRoutes(app, {
    pushToken: config.WX_PUSH_TOKEN,
    logger,
    clock,
    ...(options.onPush ? { onPush: options.onPush } : {})
  });

  if (config.INTERNAL_API_TOKEN) {
    registerInternalRoutes(app, {
      apiToken: config.INTERNAL_API_TOKEN,
      provider,
      account: new AccountTools(provider),
      payments
    });
  }

  app.setNotFoundHandler((request, reply) => {
    reply.status(404).send(errorEnvelope(request, ERRORS.NOT_FOUND.code, ERRORS.NOT_FOUND.message));
  });

  app.setErrorHandler((error, request, reply) => {
    const frameworkStatus = frameworkStatusOf(error);
    if (frameworkStatus !== undefined) {
      return reply.status(frameworkStatus).send(errorEnvelope(request, ERRORS.INVALID_PAYLOAD.code, error.message));
    }

    const apiError = toGatewayError(error);
    if (apiError.status >= 500) {
      logger.error('gateway request failed', {
        requestId: request.id,
        code: apiError.code,
        message: error.message,
        stack: error.stack
      });
    }
    return reply.status(apiError.status).send(errorEnvelope(request, apiError.code, apiError.message, apiError.details));
  });

  return app;
}
