import type { ExtendedUserInfo, Group, OAuthGrant, QrcodeTicket, RefreshedGrant, UserProfile } from './schemas.js';

export type OAuthScope = 'snsapi_userinfo' | 'snsapi_base';

/** Merchant API operations that take a signed XML request. */
export type PayOperation = 'unifiedorder' | 'orderquery' | 'closeorder' | 'refund' | 'refundquery' | 'report';

/** Flat string fields as they travel in the merchant XML envelope. */
export type PayFields = Readonly<Record<string, string>>;

export type QrcodeScene =
    | { kind: 'temporary'; sceneId: number; expireSeconds: number }
    | { kind: 'permanent'; sceneId: number }
    | { kind: 'permanent_str'; sceneStr: string };

export interface ProviderClient {
    authorizeUrl(redirectUri: string, state?: string): string;
    exchangeCode(code: string): Promise<OAuthGrant>;
    refreshAccessToken(refreshToken: string): Promise<RefreshedGrant>;
    getUserInfoByToken(accessToken: string, identityId: string): Promise<UserProfile>;

    getUserInfo(identityId: string): Promise<ExtendedUserInfo>;
    setUserRemark(identityId: string, remark: string): Promise<void>;

    listGroups(): Promise<Group[]>;
    createGroup(name: string): Promise<Group>;
    renameGroup(groupId: number, name: string): Promise<void>;
    deleteGroup(groupId: number): Promise<void>;
    moveUserToGroup(identityId: string, groupId: number): Promise<void>;

    /** Sends already-signed fields; resolves with the response fields once both result codes are SUCCESS. */
    payRequest(operation: PayOperation, fields: PayFields): Promise<PayFields>;
    /** Resolves with the raw bill text. */
    downloadBill(fields: PayFields): Promise<string>;

    createQrcode(scene: QrcodeScene): Promise<QrcodeTicket>;
    shortenUrl(longUrl: string): Promise<string>;
}

export interface HttpRequest {
    method: 'GET' | 'POST';
    url: string;
    body?: string;
    contentType?: string;
}

export interface HttpResponse {
    status: number;
    text: string;
}

export type HttpTransport = (request: HttpRequest) => Promise<HttpResponse>;
