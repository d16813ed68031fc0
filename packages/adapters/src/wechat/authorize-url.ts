import type { OAuthScope } from './types.js';

export const AUTHORIZE_ENDPOINT = 'https://open.weixin.qq.com/connect/oauth2/authorize';

export interface AuthorizeUrlParams {
    appId: string;
    redirectUri: string;
    scope: OAuthScope;
    state?: string;
}

/** Builds the consent URL; the provider requires the `#wechat_redirect` fragment. */
export function buildAuthorizeUrl(params: AuthorizeUrlParams): string {
    const query = new URLSearchParams({
        appid: params.appId,
        redirect_uri: params.redirectUri,
        response_type: 'code',
        scope: params.scope,
        state: params.state ?? 'STATE'
    });
    return `${AUTHORIZE_ENDPOINT}?${query.toString()}#wechat_redirect`;
}
