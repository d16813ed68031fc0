import { RemoteProviderError } from '@wxgate/domain';
import { log } from '@wxgate/observability';
import { buildAuthorizeUrl } from './authorize-url.js';
import type { ExtendedUserInfo, Group, OAuthGrant, QrcodeTicket, RefreshedGrant, UserProfile } from './schemas.js';
import type { OAuthScope, PayFields, PayOperation, ProviderClient, QrcodeScene } from './types.js';

export interface ProviderCall {
    operation: string;
    args: unknown[];
}

export interface MockProviderClientOptions {
    appId?: string;
    scope?: OAuthScope;
}

/**
 * In-memory provider used for local development and tests. Seed the public
 * maps, then assert on `getCalls()`. Unknown codes, tokens and users are
 * rejected the way the real provider rejects them.
 */
export class MockProviderClient implements ProviderClient {
    readonly grantsByCode = new Map<string, OAuthGrant>();
    readonly refreshes = new Map<string, RefreshedGrant>();
    readonly profiles = new Map<string, UserProfile>();
    readonly users = new Map<string, ExtendedUserInfo>();
    readonly payResponses = new Map<PayOperation, PayFields>();
    groups: Group[] = [];
    bill = '';

    private readonly calls: ProviderCall[] = [];
    private readonly failures = new Map<string, Error>();
    private ticketCounter = 0;
    private readonly appId: string;
    private readonly scope: OAuthScope;

    constructor(options: MockProviderClientOptions = {}) {
        this.appId = options.appId ?? 'wx-mock-app';
        this.scope = options.scope ?? 'snsapi_userinfo';
    }

    /** Makes the next call of `operation` reject with `error`. */
    failNext(operation: string, error: Error): void {
        this.failures.set(operation, error);
    }

    /** Get all recorded calls (for test assertions). */
    getCalls(operation?: string): ReadonlyArray<ProviderCall> {
        return operation ? this.calls.filter((call) => call.operation === operation) : this.calls;
    }

    clear(): void {
        this.calls.length = 0;
        this.failures.clear();
    }

    authorizeUrl(redirectUri: string, state?: string): string {
        return buildAuthorizeUrl({
            appId: this.appId,
            redirectUri,
            scope: this.scope,
            ...(state !== undefined ? { state } : {})
        });
    }

    async exchangeCode(code: string): Promise<OAuthGrant> {
        this.record('exchange_code', code);
        const grant = this.grantsByCode.get(code);
        if (!grant) {
            throw new RemoteProviderError('exchange_code', '40029', 'invalid code');
        }
        return grant;
    }

    async refreshAccessToken(refreshToken: string): Promise<RefreshedGrant> {
        this.record('refresh_token', refreshToken);
        const grant = this.refreshes.get(refreshToken);
        if (!grant) {
            throw new RemoteProviderError('refresh_token', '40030', 'invalid refresh_token');
        }
        return grant;
    }

    async getUserInfoByToken(accessToken: string, identityId: string): Promise<UserProfile> {
        this.record('user_profile', accessToken, identityId);
        const profile = this.profiles.get(identityId);
        if (!profile) {
            throw new RemoteProviderError('user_profile', '40003', 'invalid openid');
        }
        return profile;
    }

    async getUserInfo(identityId: string): Promise<ExtendedUserInfo> {
        this.record('user_info', identityId);
        return { ...this.requireUser('user_info', identityId) };
    }

    async setUserRemark(identityId: string, remark: string): Promise<void> {
        this.record('set_remark', identityId, remark);
        const user = this.requireUser('set_remark', identityId);
        this.users.set(identityId, { ...user, remark });
    }

    async listGroups(): Promise<Group[]> {
        this.record('list_groups');
        return this.groups.map((group) => ({ ...group }));
    }

    async createGroup(name: string): Promise<Group> {
        this.record('create_group', name);
        const id = Math.max(99, ...this.groups.map((group) => group.id)) + 1;
        const group = { id, name, count: 0 };
        this.groups.push(group);
        return { ...group };
    }

    async renameGroup(groupId: number, name: string): Promise<void> {
        this.record('rename_group', groupId, name);
        this.groups = this.groups.map((group) => (group.id === groupId ? { ...group, name } : group));
    }

    async deleteGroup(groupId: number): Promise<void> {
        this.record('delete_group', groupId);
        this.groups = this.groups.filter((group) => group.id !== groupId);
    }

    async moveUserToGroup(identityId: string, groupId: number): Promise<void> {
        this.record('move_user', identityId, groupId);
        const user = this.requireUser('move_user', identityId);
        this.users.set(identityId, { ...user, groupid: groupId });
    }

    async payRequest(operation: PayOperation, fields: PayFields): Promise<PayFields> {
        this.record(operation, fields);
        const response: PayFields = this.payResponses.get(operation) ?? { return_code: 'SUCCESS', result_code: 'SUCCESS' };
        if (response.return_code !== 'SUCCESS') {
            throw new RemoteProviderError(operation, response.return_code ?? 'FAIL', response.return_msg ?? '');
        }
        if (response.result_code !== undefined && response.result_code !== 'SUCCESS') {
            throw new RemoteProviderError(operation, response.err_code ?? response.result_code, response.err_code_des ?? '');
        }
        return response;
    }

    async downloadBill(fields: PayFields): Promise<string> {
        this.record('downloadbill', fields);
        return this.bill;
    }

    async createQrcode(scene: QrcodeScene): Promise<QrcodeTicket> {
        this.record('create_qrcode', scene);
        this.ticketCounter++;
        const ticket = `mock-ticket-${this.ticketCounter}`;
        return {
            ticket,
            ...(scene.kind === 'temporary' ? { expire_seconds: scene.expireSeconds } : {}),
            url: `http://weixin.qq.com/q/${ticket}`
        };
    }

    async shortenUrl(longUrl: string): Promise<string> {
        this.record('shorten_url', longUrl);
        return `https://w.url.cn/s/mock${this.getCalls('shorten_url').length}`;
    }

    private record(operation: string, ...args: unknown[]): void {
        this.calls.push({ operation, args });
        log('debug', '[MockProvider] call', { operation });

        const failure = this.failures.get(operation);
        if (failure) {
            this.failures.delete(operation);
            throw failure;
        }
    }

    private requireUser(operation: string, identityId: string): ExtendedUserInfo {
        const user = this.users.get(identityId);
        if (!user) {
            throw new RemoteProviderError(operation, '40003', 'invalid openid');
        }
        return user;
    }
}
