export { loadGatewayConfig, paymentSettingsFrom, type GatewayConfig, type PaymentSettingsConfig } from './env.js';
