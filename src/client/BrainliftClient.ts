/**
 * BrainLift Client
 * Main facade: owns the credential manager, the Supabase token cache and the data source
 */

import { CredentialManager, type AuthStatus } from '../auth/CredentialManager.js';
import { TokenExchange } from '../auth/TokenExchange.js';
import { FileStore } from '../auth/FileStore.js';
import { HttpClient } from './HttpClient.js';
import { BrainliftApi, type BrainliftSource } from '../api/BrainliftApi.js';
import { DEMO_USER_ID, DemoBrainlifts } from '../api/DemoBrainlifts.js';
import { AuthenticationUnavailableError } from '../utils/errors.js';
import type { Config } from '../utils/config.js';

export type BrainliftClientConfig = Pick<
    Config,
    'demoMode' | 'supabaseUrl' | 'supabaseAnonKey' | 'apiUrl' | 'clientSecretPath' | 'tokenPath' | 'redirectPort' | 'ownership'
> & {
    /** Allow tool calls to fall back to browser consent (the MCP server does) */
    interactive?: boolean;
    openUrl?: (url: string) => Promise<void>;
    revokeUri?: string;
};

export interface Identity {
    userId: string;
    demo: boolean;
}

export class BrainliftClient {
    readonly credentials: CredentialManager;
    readonly tokens: TokenExchange;
    readonly brainlifts: BrainliftSource;
    readonly demoMode: boolean;

    constructor(config: BrainliftClientConfig) {
        this.demoMode = config.demoMode;

        this.credentials = new CredentialManager({
            store: new FileStore(config.tokenPath),
            clientSecretPath: config.clientSecretPath,
            redirectPort: config.redirectPort,
            interactive: config.interactive,
            openUrl: config.openUrl,
            revokeUri: config.revokeUri,
        });

        this.tokens = new TokenExchange({
            supabaseUrl: config.supabaseUrl,
            anonKey: config.supabaseAnonKey,
            credentials: this.credentials,
        });

        // Demo mode never touches credentials or the network
        this.brainlifts = config.demoMode
            ? new DemoBrainlifts()
            : new BrainliftApi(new HttpClient({ baseUrl: config.apiUrl, auth: this.tokens }), this.tokens, config.ownership);
    }

    // ── Auth ──────────────────────────────────────────

    async getAuthStatus(): Promise<AuthStatus> {
        return this.credentials.getStatus();
    }

    /**
     * Ensure a Google credential exists, running browser consent if needed
     */
    async login(): Promise<void> {
        const credential = await this.credentials.getCredentials({ interactive: true });
        if (!credential) {
            throw new AuthenticationUnavailableError('sign-in did not complete');
        }
        this.tokens.invalidate();
    }

    async logout(): Promise<void> {
        await this.credentials.revoke();
        this.tokens.invalidate();
    }

    // ── Convenience ───────────────────────────────────

    async whoami(): Promise<Identity> {
        if (this.demoMode) {
            return { userId: DEMO_USER_ID, demo: true };
        }
        return { userId: await this.tokens.getUserId(), demo: false };
    }
}
