import { z } from 'zod';

function emptyStringToUndefined(value: unknown): unknown {
  if (typeof value === 'string' && value.length === 0) {
    return undefined;
  }
  return value;
}

const optionalNonEmptyString = z.preprocess(emptyStringToUndefined, z.string().min(1).optional());
const optionalUrl = z.preprocess(emptyStringToUndefined, z.string().url().optional());

const boolFromString = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    WX_APP_ID: z.string().min(1),
    WX_APP_SECRET: z.string().min(1),
    WX_OAUTH_SCOPE: z.enum(['snsapi_userinfo', 'snsapi_base']).default('snsapi_userinfo'),
    WX_MCH_ID: optionalNonEmptyString,
    WX_MCH_SECRET: optionalNonEmptyString,
    WX_PAY_NOTIFY_URL: optionalUrl,
    WX_FORCE_MINIMAL_FEE: boolFromString,
    WX_USERINFO_TTL_SECONDS: z.coerce.number().int().min(0).default(0),
    WX_PUSH_TOKEN: optionalNonEmptyString,
    WX_PROVIDER: z.enum(['wechat', 'mock']).default('wechat'),
    GATEWAY_HOST: z.string().min(1).default('0.0.0.0'),
    GATEWAY_PORT: z.coerce.number().int().min(1).max(65_535).default(3000),
    GATEWAY_PUBLIC_URL: optionalUrl,
    GATEWAY_TRUST_PROXY: boolFromString,
    INTERNAL_API_TOKEN: optionalNonEmptyString,
    SESSION_STORE: z.enum(['memory', 'postgres']).default('memory'),
    SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 3600),
    SESSION_KEY_B64: optionalNonEmptyString,
    SESSION_CLEANUP_BATCH_SIZE: z.coerce.number().int().positive().default(5000),
    DATABASE_URL: optionalUrl
  })
  .superRefine((value, context) => {
    if (value.SESSION_STORE === 'postgres' && !value.DATABASE_URL) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when SESSION_STORE=postgres.'
      });
    }

    const merchantFields = ['WX_MCH_ID', 'WX_MCH_SECRET', 'WX_PAY_NOTIFY_URL'] as const;
    const configured = merchantFields.filter((field) => value[field] !== undefined);
    if (configured.length > 0 && configured.length < merchantFields.length) {
      for (const field of merchantFields) {
        if (value[field] === undefined) {
          context.addIssue({
            code: z.ZodIssueCode.custom,
            path: [field],
            message: `${field} is required once any of ${merchantFields.join(', ')} is set.`
          });
        }
      }
    }
  });

export type GatewayConfig = z.infer<typeof envSchema>;

export interface PaymentSettingsConfig {
  appId: string;
  mchId: string;
  mchSecret: string;
  notifyUrl: string;
  forceMinimalFee: boolean;
}

export function loadGatewayConfig(input: NodeJS.ProcessEnv = process.env): GatewayConfig {
  return envSchema.parse(input);
}

/** Merchant settings, or null when the deployment has no merchant account. */
export function paymentSettingsFrom(config: GatewayConfig): PaymentSettingsConfig | null {
  if (!config.WX_MCH_ID || !config.WX_MCH_SECRET || !config.WX_PAY_NOTIFY_URL) {
    return null;
  }

  return {
    appId: config.WX_APP_ID,
    mchId: config.WX_MCH_ID,
    mchSecret: config.WX_MCH_SECRET,
    notifyUrl: config.WX_PAY_NOTIFY_URL,
    forceMinimalFee: config.WX_FORCE_MINIMAL_FEE
  };
}
