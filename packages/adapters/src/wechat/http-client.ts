import { ProviderProtocolError, RemoteProviderError } from '@wxgate/domain';
import type { ServiceLogger, ServiceMetrics } from '@wxgate/observability';
import type { z } from 'zod';
import { buildAuthorizeUrl } from './authorize-url.js';
import { ProviderTransportError } from './errors.js';
import {
    apiStatusSchema,
    clientCredentialSchema,
    createdGroupSchema,
    extendedUserInfoSchema,
    groupListSchema,
    oauthGrantSchema,
    qrcodeTicketSchema,
    refreshedGrantSchema,
    shortUrlSchema,
    userProfileSchema,
    type ExtendedUserInfo,
    type Group,
    type OAuthGrant,
    type QrcodeTicket,
    type RefreshedGrant,
    type UserProfile
} from './schemas.js';
import type {
    HttpRequest,
    HttpResponse,
    HttpTransport,
    OAuthScope,
    PayFields,
    PayOperation,
    ProviderClient,
    QrcodeScene
} from './types.js';
import { parseXmlFields, toXml } from './xml.js';

const API_BASE = 'https://api.weixin.qq.com';
const PAY_BASE = 'https://api.mch.weixin.qq.com';

const PAY_PATHS: Record<PayOperation, string> = {
    unifiedorder: '/pay/unifiedorder',
    orderquery: '/pay/orderquery',
    closeorder: '/pay/closeorder',
    refund: '/secapi/pay/refund',
    refundquery: '/pay/refundquery',
    report: '/payitil/report'
};

const CREDENTIAL_SAFETY_MARGIN_SECONDS = 180;

// Codes meaning the client credential is no longer accepted.
const STALE_CREDENTIAL_CODES = new Set([40001, 40014, 42001]);

export const fetchTransport: HttpTransport = async (request) => {
    const response = await fetch(request.url, {
        method: request.method,
        ...(request.contentType ? { headers: { 'Content-Type': request.contentType } } : {}),
        ...(request.body !== undefined ? { body: request.body } : {})
    });
    return { status: response.status, text: await response.text() };
};

export interface HttpProviderClientOptions {
    appId: string;
    appSecret: string;
    scope: OAuthScope;
    /**
     * Defaults to global fetch. The refund endpoint requires the merchant's
     * client certificate, so deployments that refund must pass a transport
     * that presents it.
     */
    transport?: HttpTransport;
    clock?: () => Date;
    logger?: ServiceLogger;
    metrics?: Pick<ServiceMetrics, 'providerCallCount'>;
}

interface CachedCredential {
    accessToken: string;
    /** Epoch seconds. */
    expiresAt: number;
}

function firstIssuePath(error: z.ZodError): string {
    const issue = error.issues[0];
    return issue && issue.path.length > 0 ? issue.path.join('.') : 'body';
}

function outcomeOf(error: unknown): string {
    if (error instanceof RemoteProviderError) return 'rejected';
    if (error instanceof ProviderProtocolError) return 'protocol_error';
    return 'transport_error';
}

/**
 * Provider client speaking the public JSON APIs and the merchant XML APIs.
 * Holds one in-process cache: the client-credential access token, refreshed
 * 180 seconds before it lapses, with concurrent callers sharing one fetch.
 */
export class HttpProviderClient implements ProviderClient {
    private readonly transport: HttpTransport;
    private readonly clock: () => Date;
    private credential: CachedCredential | null = null;
    private credentialInFlight: Promise<string> | null = null;

    constructor(private readonly options: HttpProviderClientOptions) {
        this.transport = options.transport ?? fetchTransport;
        this.clock = options.clock ?? (() => new Date());
    }

    authorizeUrl(redirectUri: string, state?: string): string {
        return buildAuthorizeUrl({
            appId: this.options.appId,
            redirectUri,
            scope: this.options.scope,
            ...(state !== undefined ? { state } : {})
        });
    }

    exchangeCode(code: string): Promise<OAuthGrant> {
        return this.observe('exchange_code', () =>
            this.getJson(
                'exchange_code',
                this.apiUrl('/sns/oauth2/access_token', {
                    appid: this.options.appId,
                    secret: this.options.appSecret,
                    code,
                    grant_type: 'authorization_code'
                }),
                oauthGrantSchema
            )
        );
    }

    refreshAccessToken(refreshToken: string): Promise<RefreshedGrant> {
        return this.observe('refresh_token', () =>
            this.getJson(
                'refresh_token',
                this.apiUrl('/sns/oauth2/refresh_token', {
                    appid: this.options.appId,
                    grant_type: 'refresh_token',
                    refresh_token: refreshToken
                }),
                refreshedGrantSchema
            )
        );
    }

    getUserInfoByToken(accessToken: string, identityId: string): Promise<UserProfile> {
        return this.observe('user_profile', () =>
            this.getJson(
                'user_profile',
                this.apiUrl('/sns/userinfo', { access_token: accessToken, openid: identityId, lang: 'zh_CN' }),
                userProfileSchema
            )
        );
    }

    getUserInfo(identityId: string): Promise<ExtendedUserInfo> {
        return this.observe('user_info', async () =>
            this.getJson(
                'user_info',
                this.apiUrl('/cgi-bin/user/info', {
                    access_token: await this.getClientCredential(),
                    openid: identityId,
                    lang: 'zh_CN'
                }),
                extendedUserInfoSchema
            )
        );
    }

    async setUserRemark(identityId: string, remark: string): Promise<void> {
        await this.observe('set_remark', () =>
            this.postCredentialJson('set_remark', '/cgi-bin/user/info/updateremark', { openid: identityId, remark }, apiStatusSchema)
        );
    }

    async listGroups(): Promise<Group[]> {
        const result = await this.observe('list_groups', async () =>
            this.getJson(
                'list_groups',
                this.apiUrl('/cgi-bin/groups/get', { access_token: await this.getClientCredential() }),
                groupListSchema
            )
        );
        return result.groups;
    }

    async createGroup(name: string): Promise<Group> {
        const result = await this.observe('create_group', () =>
            this.postCredentialJson('create_group', '/cgi-bin/groups/create', { group: { name } }, createdGroupSchema)
        );
        return result.group;
    }

    async renameGroup(groupId: number, name: string): Promise<void> {
        await this.observe('rename_group', () =>
            this.postCredentialJson('rename_group', '/cgi-bin/groups/update', { group: { id: groupId, name } }, apiStatusSchema)
        );
    }

    async deleteGroup(groupId: number): Promise<void> {
        await this.observe('delete_group', () =>
            this.postCredentialJson('delete_group', '/cgi-bin/groups/delete', { group: { id: groupId } }, apiStatusSchema)
        );
    }

    async moveUserToGroup(identityId: string, groupId: number): Promise<void> {
        await this.observe('move_user', () =>
            this.postCredentialJson(
                'move_user',
                '/cgi-bin/groups/members/update',
                { openid: identityId, to_groupid: groupId },
                apiStatusSchema
            )
        );
    }

    payRequest(operation: PayOperation, fields: PayFields): Promise<PayFields> {
        return this.observe(operation, async () => {
            const text = await this.send(operation, {
                method: 'POST',
                url: `${PAY_BASE}${PAY_PATHS[operation]}`,
                body: toXml(fields),
                contentType: 'text/xml; charset=utf-8'
            });
            return this.decodePayResponse(operation, text);
        });
    }

    downloadBill(fields: PayFields): Promise<string> {
        return this.observe('downloadbill', async () => {
            const text = await this.send('downloadbill', {
                method: 'POST',
                url: `${PAY_BASE}/pay/downloadbill`,
                body: toXml(fields),
                contentType: 'text/xml; charset=utf-8'
            });
            // Bills come back as plain text; failures come back as the usual XML envelope.
            if (text.trimStart().startsWith('<xml>')) {
                this.decodePayResponse('downloadbill', text);
            }
            return text;
        });
    }

    createQrcode(scene: QrcodeScene): Promise<QrcodeTicket> {
        const body =
            scene.kind === 'temporary'
                ? {
                      expire_seconds: scene.expireSeconds,
                      action_name: 'QR_SCENE',
                      action_info: { scene: { scene_id: scene.sceneId } }
                  }
                : scene.kind === 'permanent'
                  ? { action_name: 'QR_LIMIT_SCENE', action_info: { scene: { scene_id: scene.sceneId } } }
                  : { action_name: 'QR_LIMIT_STR_SCENE', action_info: { scene: { scene_str: scene.sceneStr } } };

        return this.observe('create_qrcode', () =>
            this.postCredentialJson('create_qrcode', '/cgi-bin/qrcode/create', body, qrcodeTicketSchema)
        );
    }

    async shortenUrl(longUrl: string): Promise<string> {
        const result = await this.observe('shorten_url', () =>
            this.postCredentialJson('shorten_url', '/cgi-bin/shorturl', { action: 'long2short', long_url: longUrl }, shortUrlSchema)
        );
        return result.short_url;
    }

    /** Client-credential access token for the account-level APIs. */
    async getClientCredential(): Promise<string> {
        if (this.credential && this.nowSeconds() < this.credential.expiresAt) {
            return this.credential.accessToken;
        }

        if (!this.credentialInFlight) {
            this.credentialInFlight = this.fetchClientCredential().finally(() => {
                this.credentialInFlight = null;
            });
        }
        return this.credentialInFlight;
    }

    private async fetchClientCredential(): Promise<string> {
        const result = await this.observe('client_credential', () =>
            this.getJson(
                'client_credential',
                this.apiUrl('/cgi-bin/token', {
                    grant_type: 'client_credential',
                    appid: this.options.appId,
                    secret: this.options.appSecret
                }),
                clientCredentialSchema
            )
        );

        this.credential = {
            accessToken: result.access_token,
            expiresAt: this.nowSeconds() + result.expires_in - CREDENTIAL_SAFETY_MARGIN_SECONDS
        };
        return result.access_token;
    }

    private nowSeconds(): number {
        return this.clock().getTime() / 1000;
    }

    private apiUrl(path: string, params: Record<string, string>): string {
        return `${API_BASE}${path}?${new URLSearchParams(params).toString()}`;
    }

    private async observe<T>(operation: string, run: () => Promise<T>): Promise<T> {
        try {
            const result = await run();
            this.options.metrics?.providerCallCount.labels(operation, 'ok').inc();
            return result;
        } catch (error) {
            const outcome = outcomeOf(error);
            this.options.metrics?.providerCallCount.labels(operation, outcome).inc();
            this.options.logger?.warn('provider call failed', {
                operation,
                outcome,
                error: error instanceof Error ? error.message : String(error)
            });
            throw error;
        }
    }

    private async send(operation: string, request: HttpRequest): Promise<string> {
        let response: HttpResponse;
        try {
            response = await this.transport(request);
        } catch (error) {
            throw new ProviderTransportError(operation, error instanceof Error ? error.message : String(error), {
                cause: error
            });
        }

        if (response.status < 200 || response.status >= 300) {
            throw new ProviderTransportError(operation, `HTTP ${response.status}`);
        }
        return response.text;
    }

    private async getJson<S extends z.ZodTypeAny>(operation: string, url: string, schema: S): Promise<z.output<S>> {
        const text = await this.send(operation, { method: 'GET', url });
        return this.decodeJson(operation, text, schema);
    }

    private async postCredentialJson<S extends z.ZodTypeAny>(
        operation: string,
        path: string,
        body: unknown,
        schema: S
    ): Promise<z.output<S>> {
        const text = await this.send(operation, {
            method: 'POST',
            url: this.apiUrl(path, { access_token: await this.getClientCredential() }),
            body: JSON.stringify(body),
            contentType: 'application/json'
        });
        return this.decodeJson(operation, text, schema);
    }

    private decodeJson<S extends z.ZodTypeAny>(operation: string, text: string, schema: S): z.output<S> {
        let payload: unknown;
        try {
            payload = JSON.parse(text);
        } catch (error) {
            throw new ProviderTransportError(operation, 'response body is not JSON', { cause: error });
        }

        const status = apiStatusSchema.safeParse(payload);
        if (status.success && status.data.errcode !== undefined && status.data.errcode !== 0) {
            if (STALE_CREDENTIAL_CODES.has(status.data.errcode)) {
                this.credential = null;
            }
            throw new RemoteProviderError(operation, String(status.data.errcode), status.data.errmsg ?? '');
        }

        const parsed = schema.safeParse(payload);
        if (!parsed.success) {
            throw new ProviderProtocolError(operation, firstIssuePath(parsed.error));
        }
        return parsed.data;
    }

    private decodePayResponse(operation: string, text: string): PayFields {
        let fields: Record<string, string>;
        try {
            fields = parseXmlFields(text);
        } catch (error) {
            throw new ProviderTransportError(operation, error instanceof Error ? error.message : String(error), {
                cause: error
            });
        }

        if (fields.return_code !== 'SUCCESS') {
            throw new RemoteProviderError(operation, fields.return_code ?? 'FAIL', fields.return_msg ?? '');
        }
        if (fields.result_code !== undefined && fields.result_code !== 'SUCCESS') {
            throw new RemoteProviderError(operation, fields.err_code ?? fields.result_code, fields.err_code_des ?? '');
        }
        return fields;
    }
}
