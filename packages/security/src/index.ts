export { openSealed, seal, type SealedPayload } from './encryption.js';
export { StaticKeyProvider, type KeyMaterial, type KeyProvider } from './key-provider.js';
