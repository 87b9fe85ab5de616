/**
 * Token Exchange
 * Trades the Google identity token for a Supabase session token and caches it
 * (with its user id) until shortly before it expires.
 */

import axios, { AxiosError, type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { CredentialSource } from './CredentialManager.js';
import {
    AuthenticationUnavailableError,
    ExchangeFailedError,
    MissingIdentityError,
    errorMessage,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/** Cached tokens are dropped this long before Supabase says they expire */
export const EXPIRY_SKEW_MS = 60 * 1000;

const DEFAULT_TIMEOUT_MS = 30_000;

export interface ScopedToken {
    accessToken: string;
    /** Unix timestamp ms with the skew already applied; null never expires */
    expiresAt: number | null;
    userId: string | null;
}

export interface TokenExchangeConfig {
    supabaseUrl: string;
    anonKey: string;
    credentials: CredentialSource;
    provider?: string;
    timeoutMs?: number;
    now?: () => number;
}

const exchangeResponseSchema = z.object({
    access_token: z.string().min(1),
    expires_in: z.number().finite().optional().catch(undefined),
    user: z
        .object({ id: z.string().min(1).optional().catch(undefined) })
        .nullish()
        .catch(undefined),
});

export class TokenExchange {
    private readonly http: AxiosInstance;
    private readonly credentials: CredentialSource;
    private readonly anonKey: string;
    private readonly provider: string;
    private readonly now: () => number;
    private cached: ScopedToken | null = null;
    private pending: Promise<ScopedToken> | null = null;
    // Bumped by invalidate() so an exchange already in flight is not cached
    private generation = 0;

    constructor(config: TokenExchangeConfig) {
        this.credentials = config.credentials;
        this.anonKey = config.anonKey;
        this.provider = config.provider ?? 'google';
        this.now = config.now ?? Date.now;
        this.http = axios.create({
            baseURL: config.supabaseUrl.replace(/\/+$/, ''),
            timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        });
    }

    /**
     * Get a Supabase access token, exchanging only when the cache is empty or stale
     */
    async getToken(): Promise<string> {
        const token = await this.getScopedToken();
        return token.accessToken;
    }

    /**
     * Supabase user id of the signed-in user
     */
    async getUserId(): Promise<string> {
        if (this.cached?.userId) {
            return this.cached.userId;
        }

        const token = await this.getScopedToken();
        if (!token.userId) {
            throw new MissingIdentityError();
        }
        return token.userId;
    }

    async getAuthHeaders(): Promise<Record<string, string>> {
        const token = await this.getToken();
        return {
            Authorization: `Bearer ${token}`,
            apikey: this.anonKey,
        };
    }

    invalidate(): void {
        logger.debug('Invalidating cached Supabase access token');
        this.cached = null;
        this.pending = null;
        this.generation++;
    }

    private isFresh(token: ScopedToken): boolean {
        return token.expiresAt === null || this.now() < token.expiresAt;
    }

    private async getScopedToken(): Promise<ScopedToken> {
        if (this.cached && this.isFresh(this.cached)) {
            logger.debug(`Using cached Supabase access token (expiresAt=${this.cached.expiresAt})`);
            return this.cached;
        }

        this.cached = null;
        if (!this.pending) {
            const generation = this.generation;
            const pending = this.exchange()
                .then((token) => {
                    if (generation === this.generation) {
                        this.cached = token;
                    }
                    return token;
                })
                .finally(() => {
                    if (this.pending === pending) {
                        this.pending = null;
                    }
                });
            this.pending = pending;
        }
        return this.pending;
    }

    private async exchange(): Promise<ScopedToken> {
        const credential = await this.credentials.getCredentials();
        if (!credential) {
            throw new AuthenticationUnavailableError('no Google credentials for the Supabase token exchange');
        }

        let assertion = credential.idToken;
        if (!assertion) {
            logger.warn('Google credentials did not include an id_token; falling back to the access token for the Supabase exchange');
            assertion = credential.accessToken;
        }

        logger.info('Fetching new Supabase access token using Google credentials');

        let data: unknown;
        try {
            const response = await this.http.post(
                '/auth/v1/token',
                { id_token: assertion, provider: this.provider },
                {
                    params: { grant_type: 'id_token' },
                    headers: { apikey: this.anonKey, 'Content-Type': 'application/json' },
                },
            );
            data = response.data;
        } catch (error) {
            const status = error instanceof AxiosError ? error.response?.status : undefined;
            logger.error(`Error exchanging Google token for Supabase token: ${errorMessage(error)}`);
            throw new ExchangeFailedError(errorMessage(error), status);
        }

        const parsed = exchangeResponseSchema.safeParse(data);
        if (!parsed.success) {
            logger.error('Supabase auth response missing access_token');
            throw new ExchangeFailedError('response is missing access_token');
        }

        const { access_token, expires_in, user } = parsed.data;
        const expiresAt = expires_in === undefined ? null : this.now() + expires_in * 1000 - EXPIRY_SKEW_MS;

        logger.debug(`Obtained new Supabase access token; expiresAt=${expiresAt} userId=${user?.id ?? 'none'}`);

        return { accessToken: access_token, expiresAt, userId: user?.id ?? null };
    }
}
