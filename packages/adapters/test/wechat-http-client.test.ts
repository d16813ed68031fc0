import { ProviderProtocolError, RemoteProviderError } from '@wxgate/domain';
import { createServiceMetrics } from '@wxgate/observability';
import { describe, expect, it, vi } from 'vitest';
import { ProviderTransportError } from '../src/wechat/errors.js';
import { HttpProviderClient } from '../src/wechat/http-client.js';
import type { HttpRequest, HttpResponse } from '../src/wechat/types.js';
import { parseXmlFields } from '../src/wechat/xml.js';

function json(body: unknown): HttpResponse {
    return { status: 200, text: JSON.stringify(body) };
}

function createClient(respond: (request: HttpRequest) => HttpResponse, clock?: () => Date) {
    const transport = vi.fn(async (request: HttpRequest) => respond(request));
    const metrics = createServiceMetrics('wechat-client-test');
    const client = new HttpProviderClient({
        appId: 'wx-test-app',
        appSecret: 'test-secret',
        scope: 'snsapi_userinfo',
        transport,
        metrics,
        ...(clock ? { clock } : {})
    });
    return { client, transport, metrics };
}

/** Answers the client-credential endpoint and delegates everything else. */
function withCredential(respond: (request: HttpRequest) => HttpResponse) {
    return (request: HttpRequest): HttpResponse =>
        request.url.includes('/cgi-bin/token?')
            ? json({ access_token: 'global-token', expires_in: 7200 })
            : respond(request);
}

describe('HttpProviderClient', () => {
    it('builds the consent URL with the wechat_redirect fragment', () => {
        const { client } = createClient(() => json({}));

        expect(client.authorizeUrl('https://shop.example.test/orders?id=7')).toBe(
            'https://open.weixin.qq.com/connect/oauth2/authorize?appid=wx-test-app' +
                '&redirect_uri=https%3A%2F%2Fshop.example.test%2Forders%3Fid%3D7' +
                '&response_type=code&scope=snsapi_userinfo&state=STATE#wechat_redirect'
        );
    });

    it('exchanges a code for a grant', async () => {
        const { client, transport } = createClient(() =>
            json({
                openid: 'openid-1',
                access_token: 'access-1',
                expires_in: 7200,
                refresh_token: 'refresh-1',
                scope: 'snsapi_userinfo'
            })
        );

        const grant = await client.exchangeCode('code-1');

        expect(grant.openid).toBe('openid-1');
        expect(grant.refresh_token).toBe('refresh-1');
        expect(transport).toHaveBeenCalledWith({
            method: 'GET',
            url:
                'https://api.weixin.qq.com/sns/oauth2/access_token?appid=wx-test-app&secret=test-secret' +
                '&code=code-1&grant_type=authorization_code'
        });
    });

    it('raises the provider error code and message unchanged', async () => {
        const { client, metrics } = createClient(() => json({ errcode: 40029, errmsg: 'invalid code' }));

        const error = await client.exchangeCode('stale').catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(RemoteProviderError);
        expect(error).toMatchObject({ providerCode: '40029', providerMessage: 'invalid code' });

        const counter = await metrics.providerCallCount.get();
        expect(counter.values).toContainEqual(
            expect.objectContaining({ labels: { operation: 'exchange_code', outcome: 'rejected' }, value: 1 })
        );
    });

    it('reports a grant without a refresh token as a protocol error', async () => {
        const { client } = createClient(() => json({ openid: 'openid-1', access_token: 'access-1', expires_in: 7200 }));

        const error = await client.exchangeCode('code-1').catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(ProviderProtocolError);
        expect(error).toMatchObject({ missingField: 'refresh_token' });
    });

    it('fetches the client credential once for concurrent callers', async () => {
        const { client, transport } = createClient(
            withCredential(() => json({ groups: [{ id: 0, name: 'default', count: 3 }] }))
        );

        const [first, second] = await Promise.all([client.listGroups(), client.listGroups()]);

        expect(first).toEqual([{ id: 0, name: 'default', count: 3 }]);
        expect(second).toEqual(first);
        const tokenCalls = transport.mock.calls.filter(([request]) => request.url.includes('/cgi-bin/token?'));
        expect(tokenCalls).toHaveLength(1);
        expect(transport.mock.calls[1]?.[0].url).toBe(
            'https://api.weixin.qq.com/cgi-bin/groups/get?access_token=global-token'
        );
    });

    it('refreshes the client credential 180 seconds before it lapses', async () => {
        let nowMs = 1_700_000_000_000;
        const { client, transport } = createClient(
            withCredential(() => json({ groups: [] })),
            () => new Date(nowMs)
        );

        await client.listGroups();
        nowMs = 1_700_007_019_000;
        await client.listGroups();
        nowMs = 1_700_007_020_000;
        await client.listGroups();

        const tokenCalls = transport.mock.calls.filter(([request]) => request.url.includes('/cgi-bin/token?'));
        expect(tokenCalls).toHaveLength(2);
    });

    it('drops a client credential the provider no longer accepts', async () => {
        let groupCalls = 0;
        const { client, transport } = createClient(
            withCredential(() => {
                groupCalls++;
                return groupCalls === 1 ? json({ errcode: 40001, errmsg: 'invalid credential' }) : json({ groups: [] });
            })
        );

        await expect(client.listGroups()).rejects.toBeInstanceOf(RemoteProviderError);
        await client.listGroups();

        const tokenCalls = transport.mock.calls.filter(([request]) => request.url.includes('/cgi-bin/token?'));
        expect(tokenCalls).toHaveLength(2);
    });

    it('posts JSON bodies for account writes', async () => {
        const { client, transport } = createClient(withCredential(() => json({ errcode: 0, errmsg: 'ok' })));

        await client.moveUserToGroup('openid-1', 108);

        expect(transport).toHaveBeenLastCalledWith({
            method: 'POST',
            url: 'https://api.weixin.qq.com/cgi-bin/groups/members/update?access_token=global-token',
            body: '{"openid":"openid-1","to_groupid":108}',
            contentType: 'application/json'
        });
    });

    it('sends the scene type for permanent string QR codes', async () => {
        const { client, transport } = createClient(
            withCredential(() => json({ ticket: 'ticket-1', url: 'http://weixin.qq.com/q/ticket-1' }))
        );

        const ticket = await client.createQrcode({ kind: 'permanent_str', sceneStr: 'spring-promo' });

        expect(ticket).toEqual({ ticket: 'ticket-1', url: 'http://weixin.qq.com/q/ticket-1' });
        expect(transport.mock.lastCall?.[0].body).toBe(
            '{"action_name":"QR_LIMIT_STR_SCENE","action_info":{"scene":{"scene_str":"spring-promo"}}}'
        );
    });

    it('posts merchant requests as XML and returns the response fields', async () => {
        const { client, transport } = createClient(() => ({
            status: 200,
            text:
                '<xml><return_code><![CDATA[SUCCESS]]></return_code>' +
                '<result_code><![CDATA[SUCCESS]]></result_code>' +
                '<prepay_id><![CDATA[wx-prepay-1]]></prepay_id></xml>'
        }));
        const fields = { appid: 'wx-test-app', out_trade_no: 'T1', sign: 'ABC' };

        const response = await client.payRequest('unifiedorder', fields);

        expect(response.prepay_id).toBe('wx-prepay-1');
        const request = transport.mock.lastCall?.[0];
        expect(request?.url).toBe('https://api.mch.weixin.qq.com/pay/unifiedorder');
        expect(parseXmlFields(request?.body ?? '')).toEqual(fields);
    });

    it('routes refunds to the certificate endpoint', async () => {
        const { client, transport } = createClient(() => ({
            status: 200,
            text: '<xml><return_code>SUCCESS</return_code><result_code>SUCCESS</result_code></xml>'
        }));

        await client.payRequest('refund', { out_refund_no: 'R1' });

        expect(transport.mock.lastCall?.[0].url).toBe('https://api.mch.weixin.qq.com/secapi/pay/refund');
    });

    it('raises business failures with the merchant error code', async () => {
        const { client } = createClient(() => ({
            status: 200,
            text:
                '<xml><return_code>SUCCESS</return_code><result_code>FAIL</result_code>' +
                '<err_code>ORDERPAID</err_code><err_code_des>order already paid</err_code_des></xml>'
        }));

        const error = await client.payRequest('closeorder', { out_trade_no: 'T1' }).catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(RemoteProviderError);
        expect(error).toMatchObject({ providerCode: 'ORDERPAID', providerMessage: 'order already paid' });
    });

    it('raises communication failures with the return message', async () => {
        const { client } = createClient(() => ({
            status: 200,
            text: '<xml><return_code>FAIL</return_code><return_msg>appid mismatch</return_msg></xml>'
        }));

        await expect(client.payRequest('orderquery', { out_trade_no: 'T1' })).rejects.toMatchObject({
            providerCode: 'FAIL',
            providerMessage: 'appid mismatch'
        });
    });

    it('returns bill text and raises on an XML failure envelope', async () => {
        const bill = 'trade_time,appid,total_fee\n2024-01-01 10:00:00,wx-test-app,1.00';
        let answer = bill;
        const { client } = createClient(() => ({ status: 200, text: answer }));

        expect(await client.downloadBill({ bill_date: '20240101' })).toBe(bill);

        answer = '<xml><return_code>FAIL</return_code><return_msg>No Bill Exist</return_msg></xml>';
        await expect(client.downloadBill({ bill_date: '20240102' })).rejects.toMatchObject({
            providerCode: 'FAIL',
            providerMessage: 'No Bill Exist'
        });
    });

    it('wraps transport failures and non-2xx answers', async () => {
        const { client } = createClient(() => ({ status: 503, text: 'busy' }));
        await expect(client.exchangeCode('code-1')).rejects.toBeInstanceOf(ProviderTransportError);

        const failing = new HttpProviderClient({
            appId: 'wx-test-app',
            appSecret: 'test-secret',
            scope: 'snsapi_base',
            transport: async () => {
                throw new Error('socket hang up');
            }
        });
        const error = await failing.exchangeCode('code-1').catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(ProviderTransportError);
        expect(error).toMatchObject({ message: 'Provider exchange_code transport failure: socket hang up' });
    });
});
