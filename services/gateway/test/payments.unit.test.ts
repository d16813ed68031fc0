import { MockProviderClient, parseXmlFields, toXml } from '@wxgate/adapters';
import type { PaymentSettingsConfig } from '@wxgate/config';
import { ProviderProtocolError, SignatureMismatchError, ValidationError } from '@wxgate/domain';
import { canonicalString, signFields, verifyCanonicalSignature } from '@wxgate/signing';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { PaymentService } from '../src/modules/payments/index.js';

const NOW_MS = 1_700_000_000_000;
const PREPAY_ID = 'wx20231114221320prepay0001';

const settings: PaymentSettingsConfig = {
  appId: 'wx-test-app',
  mchId: '1900000109',
  mchSecret: 'test-merchant-key',
  notifyUrl: 'https://shop.example.test/pay/notify',
  forceMinimalFee: false
};

const dispatchedSchema = z.record(z.string());

function setup(overrides: Partial<PaymentSettingsConfig> = {}) {
  const provider = new MockProviderClient({ appId: settings.appId });
  provider.payResponses.set('unifiedorder', { return_code: 'SUCCESS', result_code: 'SUCCESS', prepay_id: PREPAY_ID });
  const service = new PaymentService(provider, { ...settings, ...overrides }, {
    nonce: () => 'nonce-1',
    clock: () => new Date(NOW_MS)
  });
  return { provider, service };
}

function dispatched(provider: MockProviderClient, operation: string): Record<string, string> {
  const call = provider.getCalls(operation)[0];
  return dispatchedSchema.parse(call?.args[0]);
}

const order = {
  out_trade_no: 'T1',
  total_fee: 100,
  body: 'widget',
  spbill_create_ip: '1.2.3.4',
  openid: 'openid-1'
};

describe('PaymentService.createOrder', () => {
  it('sends a signed unified order built from merchant defaults and caller fields', async () => {
    const { provider, service } = setup();

    await service.createOrder(order);

    const { sign, ...unsigned } = dispatched(provider, 'unifiedorder');
    expect(canonicalString(unsigned, settings.mchSecret)).toBe(
      'appid=wx-test-app&body=widget&mch_id=1900000109&nonce_str=nonce-1' +
        '&notify_url=https://shop.example.test/pay/notify&openid=openid-1&out_trade_no=T1' +
        '&spbill_create_ip=1.2.3.4&total_fee=100&trade_type=JSAPI&key=test-merchant-key'
    );
    expect(sign).toMatch(/^[0-9A-F]{32}$/);
    expect(verifyCanonicalSignature({ ...unsigned, sign: sign ?? '' }, settings.mchSecret)).toBe(true);
  });

  it('returns a client payload whose paySign verifies', async () => {
    const { service } = setup();

    const { paySign, ...payload } = await service.createOrder(order);

    expect(payload).toEqual({
      appId: 'wx-test-app',
      timeStamp: '1700000000',
      nonceStr: 'nonce-1',
      package: `prepay_id=${PREPAY_ID}`,
      signType: 'MD5'
    });
    expect(verifyCanonicalSignature({ ...payload, sign: paySign }, settings.mchSecret)).toBe(true);
  });

  it('rejects an order without a required field before calling the provider', async () => {
    const { provider, service } = setup();
    const { spbill_create_ip: _ip, ...incomplete } = order;

    await expect(service.createOrder(incomplete)).rejects.toThrow('Missing required parameter "spbill_create_ip".');
    expect(provider.getCalls()).toHaveLength(0);
  });

  it('refuses a caller-supplied sign', async () => {
    const { service } = setup();

    await expect(service.createOrder({ ...order, sign: 'ABC' })).rejects.toThrow(ValidationError);
  });

  it('pins the fee to one cent when forceMinimalFee is on', async () => {
    const { provider, service } = setup({ forceMinimalFee: true });

    await service.createOrder({ ...order, total_fee: 5000 });

    expect(dispatched(provider, 'unifiedorder').total_fee).toBe('1');
  });

  it('treats a success response without prepay_id as a protocol error', async () => {
    const { provider, service } = setup();
    provider.payResponses.set('unifiedorder', { return_code: 'SUCCESS', result_code: 'SUCCESS' });

    await expect(service.createOrder(order)).rejects.toThrow(ProviderProtocolError);
  });
});

describe('PaymentService order and refund operations', () => {
  it('queries an order by exactly one id', async () => {
    const { provider, service } = setup();

    await service.queryOrder({ out_trade_no: 'T1' });
    await expect(service.queryOrder({ out_trade_no: 'T1', transaction_id: '4200000001' })).rejects.toThrow(
      'Parameters "transaction_id|out_trade_no" are mutually exclusive: provide exactly one.'
    );
    await expect(service.queryOrder({})).rejects.toThrow(ValidationError);

    expect(provider.getCalls('orderquery')).toHaveLength(1);
  });

  it('closes an order by merchant order number', async () => {
    const { provider, service } = setup();

    await service.closeOrder({ out_trade_no: 'T1' });

    expect(dispatched(provider, 'closeorder')).toMatchObject({ out_trade_no: 'T1', appid: 'wx-test-app' });
  });

  it('defaults the refund operator to the merchant id', async () => {
    const { provider, service } = setup({ forceMinimalFee: true });

    await service.refund({ out_trade_no: 'T1', out_refund_no: 'R1', total_fee: 100, refund_fee: 100 });

    expect(dispatched(provider, 'refund')).toMatchObject({
      op_user_id: '1900000109',
      total_fee: '1',
      refund_fee: '100'
    });
  });

  it('rejects a refund query without any id and sends nothing', async () => {
    const { provider, service } = setup();

    await expect(service.queryRefund({})).rejects.toThrow(
      'Missing required parameters "transaction_id|out_trade_no|out_refund_no|refund_id": provide at least one.'
    );
    expect(provider.getCalls()).toHaveLength(0);
  });

  it('returns the bill text', async () => {
    const { provider, service } = setup();
    provider.bill = 'Trade time,Total\n`2023-11-14 22:13:20,`1.00\n';

    await expect(service.downloadBill({ bill_date: '20231114', bill_type: 'ALL' })).resolves.toBe(provider.bill);
  });

  it('requires every report field', async () => {
    const { service } = setup();

    await expect(
      service.report({ interface_url: 'https://api.mch.weixin.qq.com/pay/unifiedorder', execute_time: 120 })
    ).rejects.toThrow('Missing required parameter "return_code".');
  });
});

describe('PaymentService notifications', () => {
  const notification = signFields(
    {
      appid: 'wx-test-app',
      mch_id: '1900000109',
      nonce_str: 'nonce-2',
      out_trade_no: 'T1',
      result_code: 'SUCCESS',
      return_code: 'SUCCESS',
      total_fee: '100',
      transaction_id: '4200000001'
    },
    settings.mchSecret
  );

  it('accepts a correctly signed notification', () => {
    const { service } = setup();

    expect(service.parseNotification(toXml(notification))).toEqual(notification);
  });

  it('rejects a tampered notification', () => {
    const { service } = setup();

    expect(() => service.parseNotification(toXml({ ...notification, total_fee: '1' }))).toThrow(SignatureMismatchError);
  });

  it('builds the acknowledgement document', () => {
    const { service } = setup();

    expect(parseXmlFields(service.notificationAck(true))).toEqual({ return_code: 'SUCCESS', return_msg: 'OK' });
    expect(parseXmlFields(service.notificationAck(false, 'bad sign'))).toEqual({
      return_code: 'FAIL',
      return_msg: 'bad sign'
    });
  });
});
