/**
 * Tests for CredentialManager (stored → refreshed → interactive consent)
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CredentialManager, type CredentialManagerConfig } from '../../src/auth/CredentialManager.js';
import type { CredentialStore, PrimaryCredential } from '../../src/auth/CredentialStore.js';
import { fetchWhenListening, freePort, startServer, type StubServer } from '../helpers.js';

class MemoryStore implements CredentialStore {
    loads = 0;
    saved: PrimaryCredential[] = [];

    constructor(public credential: PrimaryCredential | null = null) {}

    async save(credential: PrimaryCredential): Promise<void> {
        this.saved.push(credential);
        this.credential = credential;
    }

    async load(): Promise<PrimaryCredential | null> {
        this.loads++;
        return this.credential;
    }

    async delete(): Promise<void> {
        this.credential = null;
    }

    async exists(): Promise<boolean> {
        return this.credential !== null;
    }
}

const NOW = Date.parse('2026-01-01T00:00:00Z');

function credential(overrides: Partial<PrimaryCredential> = {}): PrimaryCredential {
    return {
        accessToken: 'stored-access',
        refreshToken: 'stored-refresh',
        idToken: 'stored-id',
        tokenUri: 'http://127.0.0.1:9/token',
        clientId: 'test-client-id',
        clientSecret: 'test-secret',
        scopes: ['openid'],
        expiresAt: NOW + 60 * 60 * 1000,
        ...overrides,
    };
}

describe('CredentialManager', () => {
    let tmpDir: string;
    let stub: StubServer | undefined;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'brainlift-creds-'));
    });

    afterEach(async () => {
        await stub?.close();
        stub = undefined;
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    function manager(store: CredentialStore, overrides: Partial<CredentialManagerConfig> = {}): CredentialManager {
        return new CredentialManager({
            store,
            clientSecretPath: path.join(tmpDir, 'client-secrets.json'),
            redirectPort: 1,
            interactive: false,
            now: () => NOW,
            ...overrides,
        });
    }

    describe('getCredentials', () => {
        it('should return a valid stored credential and keep it in memory', async () => {
            const store = new MemoryStore(credential());
            const credentials = manager(store);

            expect(await credentials.getCredentials()).toEqual(credential());
            expect(await credentials.getCredentials()).toEqual(credential());
            expect(store.loads).toBe(1);
        });

        it('should refresh a credential inside the expiry buffer and save it', async () => {
            stub = await startServer(() => ({ body: { access_token: 'fresh-access', expires_in: 3600 } }));
            const store = new MemoryStore(credential({ tokenUri: `${stub.url}/token`, expiresAt: NOW + 60_000 }));

            const result = await manager(store).getCredentials();

            expect(result?.accessToken).toBe('fresh-access');
            expect(result?.refreshToken).toBe('stored-refresh');
            expect(result?.idToken).toBe('stored-id');
            expect(store.saved).toHaveLength(1);
            expect(store.saved[0].accessToken).toBe('fresh-access');
        });

        it('should return null when the refresh fails and consent is not allowed', async () => {
            stub = await startServer(() => ({ status: 400, body: 'invalid_grant' }));
            const store = new MemoryStore(credential({ tokenUri: `${stub.url}/token`, expiresAt: NOW - 1 }));

            expect(await manager(store).getCredentials()).toBeNull();
            expect(store.saved).toHaveLength(0);
        });

        it('should return null for an expired credential without a refresh token', async () => {
            const store = new MemoryStore(credential({ refreshToken: null, expiresAt: NOW - 1 }));
            expect(await manager(store).getCredentials()).toBeNull();
        });

        it('should return null when nothing is stored and consent is not allowed', async () => {
            expect(await manager(new MemoryStore()).getCredentials()).toBeNull();
        });

        it('should return null when consent is allowed but client secrets are missing', async () => {
            const opened: string[] = [];
            const credentials = manager(new MemoryStore(), {
                openUrl: async (url) => {
                    opened.push(url);
                },
            });

            expect(await credentials.getCredentials({ interactive: true })).toBeNull();
            expect(opened).toEqual([]);
        });

        it('should run browser consent and save the resulting credential', async () => {
            stub = await startServer(() => ({
                body: { access_token: 'consent-access', refresh_token: 'consent-refresh', id_token: 'consent-id', expires_in: 3600 },
            }));
            fs.writeFileSync(
                path.join(tmpDir, 'client-secrets.json'),
                JSON.stringify({
                    installed: { client_id: 'test-client-id', client_secret: 'test-secret', token_uri: `${stub.url}/token` },
                }),
            );
            const port = await freePort();
            const store = new MemoryStore();

            const credentials = manager(store, {
                redirectPort: port,
                callbackTimeoutMs: 5000,
                openUrl: async (url) => {
                    const state = new URL(url).searchParams.get('state') ?? '';
                    await fetchWhenListening(`http://127.0.0.1:${port}/?code=consent-code&state=${state}`);
                },
            });

            const result = await credentials.getCredentials({ interactive: true });

            expect(result?.accessToken).toBe('consent-access');
            expect(result?.idToken).toBe('consent-id');
            expect(store.saved.map((c) => c.accessToken)).toEqual(['consent-access']);

            const form = new URLSearchParams(stub.requests[0].body);
            expect(form.get('code')).toBe('consent-code');
            expect(form.get('redirect_uri')).toBe(`http://localhost:${port}/`);
        });

        it('should fall through to browser consent when the refresh is rejected', async () => {
            stub = await startServer((req) =>
                new URLSearchParams(req.body).get('grant_type') === 'refresh_token'
                    ? { status: 400, body: 'invalid_grant' }
                    : { body: { access_token: 'consent-access', refresh_token: 'consent-refresh', expires_in: 3600 } },
            );
            fs.writeFileSync(
                path.join(tmpDir, 'client-secrets.json'),
                JSON.stringify({
                    installed: { client_id: 'test-client-id', client_secret: 'test-secret', token_uri: `${stub.url}/token` },
                }),
            );
            const port = await freePort();
            const store = new MemoryStore(credential({ tokenUri: `${stub.url}/token`, expiresAt: NOW - 1 }));

            const credentials = manager(store, {
                redirectPort: port,
                callbackTimeoutMs: 5000,
                openUrl: async (url) => {
                    const state = new URL(url).searchParams.get('state') ?? '';
                    await fetchWhenListening(`http://127.0.0.1:${port}/?code=consent-code&state=${state}`);
                },
            });

            const result = await credentials.getCredentials({ interactive: true });

            expect(result?.accessToken).toBe('consent-access');
            expect(result?.refreshToken).toBe('consent-refresh');
            expect(store.saved.map((c) => c.accessToken)).toEqual(['consent-access']);
            expect(stub.requests.map((r) => new URLSearchParams(r.body).get('grant_type'))).toEqual([
                'refresh_token',
                'authorization_code',
            ]);
        });

        it('should share one refresh between concurrent callers', async () => {
            stub = await startServer(() => ({ body: { access_token: 'fresh-access', expires_in: 3600 }, delayMs: 50 }));
            const store = new MemoryStore(credential({ tokenUri: `${stub.url}/token`, expiresAt: NOW - 1 }));
            const credentials = manager(store);

            const results = await Promise.all([
                credentials.getCredentials(),
                credentials.getCredentials(),
                credentials.getCredentials(),
            ]);

            expect(results.map((c) => c?.accessToken)).toEqual(['fresh-access', 'fresh-access', 'fresh-access']);
            expect(stub.requests).toHaveLength(1);
        });
    });

    describe('getStatus', () => {
        it('should report no credential', async () => {
            expect(await manager(new MemoryStore()).getStatus()).toEqual({ authenticated: false });
        });

        it('should report an expired but refreshable credential as authenticated', async () => {
            const status = await manager(new MemoryStore(credential({ expiresAt: NOW - 1, idToken: null }))).getStatus();

            expect(status).toEqual({
                authenticated: true,
                expiresAt: new Date(NOW - 1),
                isExpired: true,
                canRefresh: true,
                hasIdToken: false,
            });
        });
    });

    describe('revoke', () => {
        it('should delete local credentials even when revocation fails', async () => {
            stub = await startServer(() => ({ status: 500, body: 'boom' }));
            const store = new MemoryStore(credential());
            const credentials = manager(store, { revokeUri: `${stub.url}/revoke` });

            await credentials.getCredentials();
            await credentials.revoke();

            expect(new URLSearchParams(stub.requests[0].body).get('token')).toBe('stored-refresh');
            expect(await store.exists()).toBe(false);
            expect(await credentials.getCredentials()).toBeNull();
        });
    });
});
