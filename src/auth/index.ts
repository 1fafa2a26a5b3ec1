export {
    PasswordGrantFlow,
    coerceExpiresIn,
    type PasswordGrantConfig,
    type GrantClient,
    type GrantResult,
    type TokenTransport,
} from './PasswordGrantFlow.js';
export {
    TokenManager,
    type TokenManagerConfig,
    type TokenManagerOptions,
    type TokenResult,
    type CredentialState,
    type TraceStep,
    type AuthStatus,
} from './TokenManager.js';
export { FileStore } from './FileStore.js';
export { MemoryStore } from './MemoryStore.js';
export { EnvStore, DEFAULT_TOKEN_ENV_VAR } from './EnvStore.js';
export {
    SAFETY_MARGIN_SECONDS,
    isUsable,
    expiryInstant,
    toStoredRecord,
    fromStoredRecord,
    type CredentialSet,
    type TokenStore,
    type StoredCredential,
} from './TokenStore.js';
