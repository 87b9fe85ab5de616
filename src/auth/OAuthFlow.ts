/**
 * OAuth Flow
 * Browser-based Google OAuth2 authorization code flow (PKCE), refresh and revocation
 */

import * as http from 'http';
import * as crypto from 'crypto';
import { z } from 'zod';
import type { PrimaryCredential } from './CredentialStore.js';
import type { ClientSecrets } from './ClientSecrets.js';

const tokenResponseSchema = z.object({
    access_token: z.string().min(1),
    refresh_token: z.string().optional(),
    id_token: z.string().optional(),
    token_type: z.string().optional(),
    expires_in: z.number().optional(),
    scope: z.string().optional(),
});

type TokenResponse = z.infer<typeof tokenResponseSchema>;

export const GOOGLE_REVOKE_URI = 'https://oauth2.googleapis.com/revoke';

export const DEFAULT_SCOPES = [
    'openid',
    'https://www.googleapis.com/auth/userinfo.email',
    'https://www.googleapis.com/auth/userinfo.profile',
];

const REQUEST_TIMEOUT_MS = 30_000;

export interface OAuthConfig extends ClientSecrets {
    redirectUri: string;
    scopes?: string[];
}

export interface PkcePair {
    verifier: string;
    challenge: string;
}

export function createPkcePair(): PkcePair {
    const verifier = crypto.randomBytes(32).toString('base64url');
    const challenge = crypto.createHash('sha256').update(verifier).digest('base64url');
    return { verifier, challenge };
}

export function createState(): string {
    return crypto.randomBytes(16).toString('hex');
}

function escapeHtml(text: string): string {
    return text.replace(/[&<>"']/g, (c) => `&#${c.charCodeAt(0)};`);
}

function page(title: string, message: string): string {
    return `<html>
  <head><meta charset="utf-8"><title>BrainLift MCP</title></head>
  <body style="font-family: system-ui; padding: 40px; text-align: center;">
    <h1>${title}</h1>
    <p>${escapeHtml(message)}</p>
  </body>
</html>`;
}

async function postForm(url: string, body: URLSearchParams): Promise<Response> {
    return fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: body.toString(),
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
}

async function readTokenResponse(response: Response, failure: string): Promise<TokenResponse> {
    if (!response.ok) {
        const error = await response.text();
        throw new Error(`${failure}: ${error}`);
    }

    const parsed = tokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
        throw new Error(`${failure}: token response did not include an access_token`);
    }
    return parsed.data;
}

function toCredential(
    data: TokenResponse,
    client: { clientId: string; clientSecret: string; tokenUri: string },
    previous?: PrimaryCredential,
): PrimaryCredential {
    return {
        accessToken: data.access_token,
        refreshToken: data.refresh_token ?? previous?.refreshToken ?? null,
        idToken: data.id_token ?? previous?.idToken ?? null,
        tokenUri: client.tokenUri,
        clientId: client.clientId,
        clientSecret: client.clientSecret,
        scopes: data.scope ? data.scope.split(' ').filter(Boolean) : previous?.scopes ?? [],
        expiresAt: typeof data.expires_in === 'number' ? Date.now() + data.expires_in * 1000 : null,
    };
}

export class OAuthFlow {
    private readonly config: OAuthConfig;
    private readonly scopes: string[];

    constructor(config: OAuthConfig) {
        this.config = config;
        this.scopes = config.scopes ?? DEFAULT_SCOPES;
    }

    /**
     * Get the authorization URL to open in browser
     */
    getAuthorizeUrl(state: string, codeChallenge: string): string {
        const params = new URLSearchParams({
            client_id: this.config.clientId,
            redirect_uri: this.config.redirectUri,
            response_type: 'code',
            scope: this.scopes.join(' '),
            access_type: 'offline',
            prompt: 'consent',
            code_challenge: codeChallenge,
            code_challenge_method: 'S256',
            state,
        });

        return `${this.config.authUri}?${params.toString()}`;
    }

    /**
     * Start local callback server and wait for authorization code.
     * Accepts exactly one callback; the listener closes once it settles.
     */
    async waitForCallback(
        port: number,
        callbackPath: string = '/',
        timeoutMs: number = 180_000,
        expectedState?: string,
    ): Promise<{ code: string; state: string }> {
        return new Promise((resolve, reject) => {
            let timeout: NodeJS.Timeout | undefined;

            const finish = () => {
                clearTimeout(timeout);
                server.close();
            };

            const server = http.createServer((req, res) => {
                const parsedUrl = new URL(req.url || '', `http://localhost:${port}`);

                if (parsedUrl.pathname !== callbackPath) {
                    res.writeHead(404, { 'Content-Type': 'text/plain' });
                    res.end('Not found');
                    return;
                }

                const code = parsedUrl.searchParams.get('code');
                const state = parsedUrl.searchParams.get('state');
                const error = parsedUrl.searchParams.get('error');
                const errorDescription = parsedUrl.searchParams.get('error_description');

                if (error) {
                    res.writeHead(400, { 'Content-Type': 'text/html; charset=utf-8', Connection: 'close' });
                    res.end(page('Authentication Failed', `${errorDescription || error}. You can close this window.`));
                    finish();
                    reject(new Error(`OAuth error: ${errorDescription || error}`));
                    return;
                }

                if (!code || !state) {
                    res.writeHead(400, { 'Content-Type': 'text/plain' });
                    res.end('Missing code or state');
                    return;
                }

                if (expectedState !== undefined && state !== expectedState) {
                    res.writeHead(400, { 'Content-Type': 'text/html; charset=utf-8', Connection: 'close' });
                    res.end(page('Authentication Failed', 'State mismatch. You can close this window.'));
                    finish();
                    reject(new Error('OAuth state mismatch; the callback did not come from this login attempt'));
                    return;
                }

                res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8', Connection: 'close' });
                res.end(page('Authentication Successful', 'You can close this window and return to your agent.'));
                finish();
                resolve({ code, state });
            });

            server.on('error', (err) => {
                clearTimeout(timeout);
                reject(err);
            });

            server.listen(port, () => {
                timeout = setTimeout(() => {
                    server.close();
                    reject(new Error(`Authentication timed out (${Math.round(timeoutMs / 1000)} seconds)`));
                }, timeoutMs);
            });
        });
    }

    /**
     * Exchange authorization code for tokens
     */
    async exchangeCode(code: string, codeVerifier: string): Promise<PrimaryCredential> {
        const body = new URLSearchParams({
            grant_type: 'authorization_code',
            client_id: this.config.clientId,
            client_secret: this.config.clientSecret,
            redirect_uri: this.config.redirectUri,
            code,
            code_verifier: codeVerifier,
        });

        const response = await postForm(this.config.tokenUri, body);
        const data = await readTokenResponse(response, 'Token exchange failed');
        return toCredential(data, this.config);
    }
}

/**
 * Refresh an expired credential against the token endpoint that issued it
 */
export async function refreshCredential(credential: PrimaryCredential): Promise<PrimaryCredential> {
    if (!credential.refreshToken) {
        throw new Error('No refresh token available');
    }

    const body = new URLSearchParams({
        grant_type: 'refresh_token',
        client_id: credential.clientId,
        client_secret: credential.clientSecret,
        refresh_token: credential.refreshToken,
    });

    const response = await postForm(credential.tokenUri, body);
    const data = await readTokenResponse(response, 'Token refresh failed');
    return toCredential(data, credential, credential);
}

/**
 * Revoke the grant behind a credential (refresh token preferred)
 */
export async function revokeCredential(credential: PrimaryCredential, revokeUri: string = GOOGLE_REVOKE_URI): Promise<void> {
    const body = new URLSearchParams({ token: credential.refreshToken ?? credential.accessToken });
    const response = await postForm(revokeUri, body);

    if (!response.ok) {
        const error = await response.text();
        throw new Error(`Token revocation failed: ${error}`);
    }
}
