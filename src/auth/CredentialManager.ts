/**
 * Credential Manager
 * Google credential lifecycle: stored → refreshed → interactive consent
 */

import open from 'open';
import { attempt, fail, succeed, type CredentialStore, type Outcome, type PrimaryCredential } from './CredentialStore.js';
import { loadClientSecrets } from './ClientSecrets.js';
import {
    OAuthFlow,
    GOOGLE_REVOKE_URI,
    createPkcePair,
    createState,
    refreshCredential,
    revokeCredential,
} from './OAuthFlow.js';
import { logger } from '../utils/logger.js';

// Refresh this long before the issuer's expiry
const EXPIRY_BUFFER_MS = 5 * 60 * 1000;

export interface CredentialManagerConfig {
    store: CredentialStore;
    clientSecretPath: string;
    redirectPort: number;
    scopes?: string[];
    /** Whether getCredentials() may fall back to the browser flow by default */
    interactive?: boolean;
    callbackTimeoutMs?: number;
    revokeUri?: string;
    /** Opens the consent page; defaults to the system browser */
    openUrl?: (url: string) => Promise<void>;
    now?: () => number;
}

export interface GetCredentialsOptions {
    interactive?: boolean;
}

export interface AuthStatus {
    authenticated: boolean;
    expiresAt?: Date;
    isExpired?: boolean;
    canRefresh?: boolean;
    hasIdToken?: boolean;
}

/** Anything that can hand out the current Google credential */
export interface CredentialSource {
    getCredentials(options?: GetCredentialsOptions): Promise<PrimaryCredential | null>;
}

async function openInBrowser(url: string): Promise<void> {
    await open(url);
}

export class CredentialManager implements CredentialSource {
    private readonly config: CredentialManagerConfig;
    private readonly store: CredentialStore;
    private readonly now: () => number;
    private credential: PrimaryCredential | null = null;
    private pending: Promise<PrimaryCredential | null> | null = null;

    constructor(config: CredentialManagerConfig) {
        this.config = config;
        this.store = config.store;
        this.now = config.now ?? Date.now;
    }

    /**
     * Get a valid Google credential, or null when none can be obtained.
     * Concurrent callers share one acquisition so the redirect port is bound at most once.
     */
    async getCredentials(options: GetCredentialsOptions = {}): Promise<PrimaryCredential | null> {
        if (this.credential && !this.isExpired(this.credential)) {
            return this.credential;
        }

        if (!this.pending) {
            const interactive = options.interactive ?? this.config.interactive ?? true;
            this.pending = this.acquire(interactive).finally(() => {
                this.pending = null;
            });
        }
        return this.pending;
    }

    async getStatus(): Promise<AuthStatus> {
        const credential = this.credential ?? (await this.store.load());

        if (!credential) {
            return { authenticated: false };
        }

        const isExpired = this.isExpired(credential);
        const canRefresh = !!credential.refreshToken;

        return {
            authenticated: !isExpired || canRefresh,
            expiresAt: credential.expiresAt === null ? undefined : new Date(credential.expiresAt),
            isExpired,
            canRefresh,
            hasIdToken: !!credential.idToken,
        };
    }

    /**
     * Best-effort revocation with the issuer, then forget the credential locally
     */
    async revoke(): Promise<void> {
        const credential = this.credential ?? (await this.store.load());

        if (credential) {
            const revoked = await attempt(() => revokeCredential(credential, this.config.revokeUri ?? GOOGLE_REVOKE_URI));
            if (!revoked.ok) {
                logger.warn(`Error revoking Google credentials: ${revoked.error.message}`);
            }
        }

        await this.store.delete();
        this.credential = null;
    }

    isExpired(credential: PrimaryCredential): boolean {
        return credential.expiresAt !== null && credential.expiresAt - EXPIRY_BUFFER_MS <= this.now();
    }

    private async acquire(interactive: boolean): Promise<PrimaryCredential | null> {
        let credential = this.credential ?? (await this.store.load());

        if (credential && this.isExpired(credential)) {
            const refreshed = await this.refresh(credential);
            if (refreshed.ok) {
                credential = refreshed.value;
            } else {
                logger.warn(`Stored Google credentials are unusable: ${refreshed.error.message}`);
                credential = null;
            }
        }

        if (!credential && interactive) {
            const authorized = await this.authorize();
            if (authorized.ok) {
                credential = authorized.value;
            } else {
                logger.error(`Google sign-in failed: ${authorized.error.message}`);
            }
        }

        this.credential = credential;
        return credential;
    }

    private async refresh(credential: PrimaryCredential): Promise<Outcome<PrimaryCredential>> {
        if (!credential.refreshToken) {
            return fail(new Error('credentials expired and no refresh token is stored'));
        }

        logger.info('Refreshing expired Google credentials');
        const refreshed = await attempt(() => refreshCredential(credential));
        if (!refreshed.ok) {
            return refreshed;
        }

        const saved = await attempt(() => this.store.save(refreshed.value));
        if (!saved.ok) {
            // The refreshed token still works for this process
            logger.warn(`Could not persist refreshed credentials: ${saved.error.message}`);
        }
        return refreshed;
    }

    /**
     * Interactive consent: blocks until the browser redirects back or the wait times out
     */
    private async authorize(): Promise<Outcome<PrimaryCredential>> {
        const secrets = loadClientSecrets(this.config.clientSecretPath);
        if (!secrets.ok) {
            return secrets;
        }

        const redirectUri = `http://localhost:${this.config.redirectPort}/`;
        const flow = new OAuthFlow({ ...secrets.value, redirectUri, scopes: this.config.scopes });
        const state = createState();
        const pkce = createPkcePair();

        const authorized = await attempt(async () => {
            // Listen before the browser can possibly redirect back
            const callback = flow.waitForCallback(this.config.redirectPort, '/', this.config.callbackTimeoutMs, state);
            const url = flow.getAuthorizeUrl(state, pkce.challenge);

            logger.warn(`Google sign-in required; waiting for consent at ${redirectUri}`);
            logger.info(`If no browser opens, visit: ${url}`);

            const [{ code }] = await Promise.all([callback, this.openConsentPage(url)]);
            return flow.exchangeCode(code, pkce.verifier);
        });
        if (!authorized.ok) {
            return authorized;
        }

        const saved = await attempt(() => this.store.save(authorized.value));
        if (!saved.ok) {
            logger.warn(`Could not persist Google credentials: ${saved.error.message}`);
        }

        logger.info('Google sign-in complete');
        return succeed(authorized.value);
    }

    private async openConsentPage(url: string): Promise<void> {
        const opened = await attempt(() => (this.config.openUrl ?? openInBrowser)(url));
        if (!opened.ok) {
            logger.warn(`Could not open a browser: ${opened.error.message}`);
        }
    }
}
