import { parseXmlFields, toXml, type PayFields, type PayOperation, type ProviderClient } from '@wxgate/adapters';
import type { PaymentSettingsConfig } from '@wxgate/config';
import { ProviderProtocolError, SignatureMismatchError, ValidationError } from '@wxgate/domain';
import type { ServiceLogger } from '@wxgate/observability';
import {
  createCanonicalSignature,
  generateNonce,
  requireAnyParam,
  requireExactlyOneParam,
  requireParams,
  signFields,
  toSignableFields,
  verifyCanonicalSignature,
  type FieldValue
} from '@wxgate/signing';
import type { ClientPayPayload, PaymentFields } from './types.js';

const BASE_REQUIRED = ['appid', 'mch_id', 'nonce_str'] as const;

const CREATE_ORDER_REQUIRED = [
  ...BASE_REQUIRED,
  'body',
  'out_trade_no',
  'total_fee',
  'spbill_create_ip',
  'notify_url',
  'trade_type'
] as const;

const REFUND_REQUIRED = [...BASE_REQUIRED, 'out_refund_no', 'total_fee', 'refund_fee', 'op_user_id'] as const;

const DOWNLOAD_BILL_REQUIRED = [...BASE_REQUIRED, 'bill_date', 'bill_type'] as const;

const REPORT_REQUIRED = [
  ...BASE_REQUIRED,
  'interface_url',
  'execute_time',
  'return_code',
  'result_code',
  'user_ip'
] as const;

const ORDER_IDS = ['transaction_id', 'out_trade_no'] as const;
const REFUND_ORDER_IDS = ['out_trade_no', 'transaction_id'] as const;
const REFUND_QUERY_IDS = ['transaction_id', 'out_trade_no', 'out_refund_no', 'refund_id'] as const;

type MerchantOperation = PayOperation | 'downloadbill';

// Operations whose fee is pinned to one cent under forceMinimalFee.
const MINIMAL_FEE_OPERATIONS: ReadonlySet<MerchantOperation> = new Set(['unifiedorder', 'refund']);

interface PreparedRequest {
  fields: PayFields;
  nonceStr: string;
}

export interface PaymentServiceOptions {
  nonce?: () => string;
  clock?: () => Date;
  logger?: ServiceLogger;
}

/**
 * Builds, validates and signs merchant API requests. Every request starts
 * from the merchant defaults (`appid`, `mch_id`, a fresh `nonce_str`) plus the
 * operation's own defaults; caller fields override both. Validation runs
 * before anything is sent.
 */
export class PaymentService {
  private readonly nonce: () => string;
  private readonly clock: () => Date;

  constructor(
    private readonly provider: ProviderClient,
    private readonly settings: PaymentSettingsConfig,
    private readonly options: PaymentServiceOptions = {}
  ) {
    this.nonce = options.nonce ?? (() => generateNonce());
    this.clock = options.clock ?? (() => new Date());
  }

  /** Places a unified order and returns the signed payload for the client-side payment call. */
  async createOrder(fields: PaymentFields): Promise<ClientPayPayload> {
    const request = this.prepare(
      'unifiedorder',
      { notify_url: this.settings.notifyUrl, trade_type: 'JSAPI' },
      fields,
      (merged) => requireParams(merged, CREATE_ORDER_REQUIRED)
    );

    const response = await this.provider.payRequest('unifiedorder', request.fields);
    const prepayId = response.prepay_id;
    if (!prepayId) {
      throw new ProviderProtocolError('unifiedorder', 'prepay_id');
    }

    const payload = {
      appId: response.appid ?? this.settings.appId,
      timeStamp: String(Math.floor(this.clock().getTime() / 1000)),
      nonceStr: response.nonce_str ?? request.nonceStr,
      package: `prepay_id=${prepayId}`,
      signType: 'MD5' as const
    };

    this.options.logger?.info('order created', { outTradeNo: request.fields.out_trade_no });
    return { ...payload, paySign: createCanonicalSignature(payload, this.settings.mchSecret) };
  }

  async queryOrder(fields: PaymentFields): Promise<PayFields> {
    const request = this.prepare('orderquery', {}, fields, (merged) => {
      requireParams(merged, BASE_REQUIRED);
      requireExactlyOneParam(merged, ORDER_IDS);
    });
    return this.provider.payRequest('orderquery', request.fields);
  }

  async closeOrder(fields: PaymentFields): Promise<PayFields> {
    const request = this.prepare('closeorder', {}, fields, (merged) =>
      requireParams(merged, [...BASE_REQUIRED, 'out_trade_no'])
    );
    return this.provider.payRequest('closeorder', request.fields);
  }

  async refund(fields: PaymentFields): Promise<PayFields> {
    const request = this.prepare('refund', { op_user_id: this.settings.mchId }, fields, (merged) => {
      requireParams(merged, REFUND_REQUIRED);
      requireAnyParam(merged, REFUND_ORDER_IDS);
    });
    return this.provider.payRequest('refund', request.fields);
  }

  async queryRefund(fields: PaymentFields): Promise<PayFields> {
    const request = this.prepare('refundquery', {}, fields, (merged) => {
      requireParams(merged, BASE_REQUIRED);
      requireAnyParam(merged, REFUND_QUERY_IDS);
    });
    return this.provider.payRequest('refundquery', request.fields);
  }

  /** Resolves with the bill as the provider's plain-text table. */
  async downloadBill(fields: PaymentFields): Promise<string> {
    const request = this.prepare('downloadbill', {}, fields, (merged) => requireParams(merged, DOWNLOAD_BILL_REQUIRED));
    return this.provider.downloadBill(request.fields);
  }

  async report(fields: PaymentFields): Promise<PayFields> {
    const request = this.prepare('report', {}, fields, (merged) => requireParams(merged, REPORT_REQUIRED));
    return this.provider.payRequest('report', request.fields);
  }

  /** Decodes a payment result notification and checks its signature. */
  parseNotification(xml: string): PayFields {
    const fields = parseXmlFields(xml);
    if (!verifyCanonicalSignature(fields, this.settings.mchSecret)) {
      throw new SignatureMismatchError('Payment notification signature does not match.');
    }
    return fields;
  }

  /** Acknowledgement the provider expects in reply to a notification. */
  notificationAck(accepted: boolean, message = accepted ? 'OK' : 'FAIL'): string {
    return toXml({ return_code: accepted ? 'SUCCESS' : 'FAIL', return_msg: message });
  }

  private prepare(
    operation: MerchantOperation,
    defaults: PaymentFields,
    fields: PaymentFields,
    validate: (merged: PaymentFields) => void
  ): PreparedRequest {
    if (Object.hasOwn(fields, 'sign')) {
      throw new ValidationError('sign', 'The "sign" field is computed and must not be supplied.');
    }

    const merged: Record<string, FieldValue> = {
      appid: this.settings.appId,
      mch_id: this.settings.mchId,
      nonce_str: this.nonce(),
      ...defaults,
      ...fields
    };
    if (this.settings.forceMinimalFee && MINIMAL_FEE_OPERATIONS.has(operation)) {
      merged.total_fee = '1';
    }

    validate(merged);

    return {
      fields: signFields(toSignableFields(merged), this.settings.mchSecret),
      nonceStr: String(merged.nonce_str)
    };
  }
}
