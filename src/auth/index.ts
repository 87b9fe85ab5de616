export { OAuthFlow, refreshCredential, revokeCredential, type OAuthConfig } from './OAuthFlow.js';
export {
    CredentialManager,
    type CredentialManagerConfig,
    type CredentialSource,
    type AuthStatus,
} from './CredentialManager.js';
export { TokenExchange, EXPIRY_SKEW_MS, type TokenExchangeConfig, type ScopedToken } from './TokenExchange.js';
export { FileStore } from './FileStore.js';
export { loadClientSecrets, type ClientSecrets } from './ClientSecrets.js';
export type { CredentialStore, PrimaryCredential, Outcome } from './CredentialStore.js';
