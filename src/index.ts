export { NoopAuditLogger, PinoAuditLogger } from './audit.js';
export type { AuditEvent, AuditLogger, AuditOutcome } from './audit.js';
export { createAuthHook, requireIdentity } from './auth-hook.js';
export { AuthClient } from './client/auth-client.js';
export type { AuthClientOptions } from './client/auth-client.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export { ConfigError, IssuanceError, TokenVerificationError } from './errors.js';
export type { VerificationErrorCode } from './errors.js';
export { normalizePassword, StaticIdentityDirectory } from './identity.js';
export type { Credentials, IdentityDirectory, StaticAccount } from './identity.js';
export { TokenIssuer } from './issuer.js';
export type { IssuedToken, TokenIssuerOptions } from './issuer.js';
export { ConsumptionLimiter } from './limiter.js';
export type { ConsumptionLimiterOptions } from './limiter.js';
export { createLogger, loggerOptions } from './logging.js';
export { buildServer } from './server.js';
export type { ServerOptions } from './server.js';
export { createSigningKey, HMAC_ALGORITHMS } from './signing.js';
export type { HmacAlgorithm, SigningKey } from './signing.js';
export { createTokenStore, InMemoryTokenStore, RedisTokenStore } from './stores/index.js';
export type { StoreHandle } from './stores/index.js';
export type { InMemoryTokenStoreOptions } from './stores/memory-store.js';
export type { RedisCommands, RedisTokenStoreOptions } from './stores/redis-store.js';
export { SubjectSchema, TokenStoreError } from './token-store.js';
export type {
  ConsumeResult,
  Subject,
  SubjectInput,
  TokenRecord,
  TokenStore,
  TokenStoreErrorCode,
} from './token-store.js';
export { extractCredential, TokenVerifier } from './verifier.js';
export type { HeaderBag, VerifiedIdentity, VerifierOptions } from './verifier.js';
