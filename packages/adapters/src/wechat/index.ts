export { AUTHORIZE_ENDPOINT, buildAuthorizeUrl, type AuthorizeUrlParams } from './authorize-url.js';
export { ProviderTransportError } from './errors.js';
export { fetchTransport, HttpProviderClient, type HttpProviderClientOptions } from './http-client.js';
export { MockProviderClient, type MockProviderClientOptions, type ProviderCall } from './mock.js';
export {
    extendedUserInfoSchema,
    groupSchema,
    oauthGrantSchema,
    userProfileSchema,
    type ExtendedUserInfo,
    type Group,
    type OAuthGrant,
    type QrcodeTicket,
    type RefreshedGrant,
    type UserProfile
} from './schemas.js';
export type {
    HttpRequest,
    HttpResponse,
    HttpTransport,
    OAuthScope,
    PayFields,
    PayOperation,
    ProviderClient,
    QrcodeScene
} from './types.js';
export { parseXmlFields, toXml, XmlDecodeError, type XmlValue } from './xml.js';

import type { ServiceLogger, ServiceMetrics } from '@wxgate/observability';
import { HttpProviderClient } from './http-client.js';
import { MockProviderClient } from './mock.js';
import type { OAuthScope, ProviderClient } from './types.js';

export interface ProviderClientConfig {
    provider: 'wechat' | 'mock';
    appId: string;
    appSecret: string;
    scope: OAuthScope;
    logger?: ServiceLogger;
    metrics?: Pick<ServiceMetrics, 'providerCallCount'>;
}

export function createProviderClient(config: ProviderClientConfig): ProviderClient {
    switch (config.provider) {
        case 'wechat':
            return new HttpProviderClient({
                appId: config.appId,
                appSecret: config.appSecret,
                scope: config.scope,
                ...(config.logger ? { logger: config.logger } : {}),
                ...(config.metrics ? { metrics: config.metrics } : {})
            });
        case 'mock':
            return new MockProviderClient({ appId: config.appId, scope: config.scope });
        default:
            throw new Error(`Unknown provider: ${String(config.provider)}`);
    }
}
