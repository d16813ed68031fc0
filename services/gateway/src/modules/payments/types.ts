import type { RawFields } from '@wxgate/signing';

/** Caller-supplied merchant fields; numbers are rendered as decimal strings. */
export type PaymentFields = RawFields;

/** What the client page hands to the in-app payment bridge. */
export interface ClientPayPayload {
  appId: string;
  timeStamp: string;
  nonceStr: string;
  package: string;
  signType: 'MD5';
  paySign: string;
}
