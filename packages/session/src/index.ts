export { InMemorySessionBackend } from './memory-backend.js';
export { PostgresSessionBackend, type PostgresSessionBackendOptions } from './postgres-backend.js';
export { ProfileCache, type ProfileCacheOptions } from './profile-cache.js';
export {
  ACCESS_TOKEN_SAFETY_MARGIN_SECONDS,
  TokenStore,
  type StoredTokens,
  type TokenGrant
} from './token-store.js';
export {
  epochSeconds,
  SESSION_FIELDS,
  systemClock,
  type Clock,
  type SessionBackend,
  type SessionField,
  type SessionStore
} from './types.js';
