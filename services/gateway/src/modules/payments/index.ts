export { PaymentService, type PaymentServiceOptions } from './service.js';
export type { ClientPayPayload, PaymentFields } from './types.js';
