/**
 * Tests for FileStore (Google authorized_user credential file)
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FileStore, parseExpiry, toRecord } from '../../src/auth/FileStore.js';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { PrimaryCredential } from '../../src/auth/CredentialStore.js';

describe('FileStore', () => {
    let tmpDir: string;
    let tokenPath: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'brainlift-store-'));
        tokenPath = path.join(tmpDir, 'nested', 'google-token.json');
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    const sample: PrimaryCredential = {
        accessToken: 'access-token-123',
        refreshToken: 'refresh-token-456',
        idToken: 'id-token-789',
        tokenUri: 'https://oauth2.googleapis.com/token',
        clientId: 'test-client-id',
        clientSecret: 'test-secret',
        scopes: ['openid', 'https://www.googleapis.com/auth/userinfo.email'],
        expiresAt: Date.parse('2030-01-01T10:00:00.000Z'),
    };

    function writeRaw(value: unknown): void {
        fs.mkdirSync(path.dirname(tokenPath), { recursive: true });
        fs.writeFileSync(tokenPath, typeof value === 'string' ? value : JSON.stringify(value));
    }

    it('should save and load a credential', async () => {
        const store = new FileStore(tokenPath);
        await store.save(sample);

        expect(await store.load()).toEqual(sample);
    });

    it('should write the Google authorized_user layout', async () => {
        const store = new FileStore(tokenPath);
        await store.save({ ...sample, refreshToken: null, idToken: null, expiresAt: null });

        const raw = JSON.parse(fs.readFileSync(tokenPath, 'utf8'));
        expect(raw).toEqual({
            token: 'access-token-123',
            refresh_token: null,
            id_token: null,
            token_uri: 'https://oauth2.googleapis.com/token',
            client_id: 'test-client-id',
            client_secret: 'test-secret',
            scopes: ['openid', 'https://www.googleapis.com/auth/userinfo.email'],
            expiry: null,
            type: 'authorized_user',
        });
    });

    it('should create the file owner-only', async () => {
        const store = new FileStore(tokenPath);
        await store.save(sample);

        const mode = fs.statSync(tokenPath).mode & 0o777;
        expect(mode & 0o077).toBe(0);
    });

    it('should return null when no file exists', async () => {
        const store = new FileStore(tokenPath);
        expect(await store.load()).toBeNull();
        expect(await store.exists()).toBe(false);
    });

    it('should return null for a corrupted file', async () => {
        writeRaw('not json');
        expect(await new FileStore(tokenPath).load()).toBeNull();
    });

    it('should return null when required fields are missing', async () => {
        writeRaw({ token: 'abc', client_id: 'id' });
        expect(await new FileStore(tokenPath).load()).toBeNull();
    });

    it('should accept access_token in place of token', async () => {
        writeRaw({
            access_token: 'legacy-token',
            refresh_token: 'refresh',
            client_id: 'id',
            client_secret: 'test-secret',
        });

        const loaded = await new FileStore(tokenPath).load();
        expect(loaded).toEqual({
            accessToken: 'legacy-token',
            refreshToken: 'refresh',
            idToken: null,
            tokenUri: 'https://oauth2.googleapis.com/token',
            clientId: 'id',
            clientSecret: 'test-secret',
            scopes: [],
            expiresAt: null,
        });
    });

    it('should split a space-separated scope string', async () => {
        writeRaw({
            token: 't',
            refresh_token: null,
            client_id: 'id',
            client_secret: 'test-secret',
            scopes: 'openid email',
        });

        const loaded = await new FileStore(tokenPath).load();
        expect(loaded?.scopes).toEqual(['openid', 'email']);
    });

    it('should treat an unreadable expiry as already expired', async () => {
        writeRaw({
            token: 't',
            refresh_token: 'r',
            client_id: 'id',
            client_secret: 'test-secret',
            expiry: 'sometime soon',
        });

        const loaded = await new FileStore(tokenPath).load();
        expect(loaded?.expiresAt).toBe(0);
    });

    it('should delete the file and tolerate a second delete', async () => {
        const store = new FileStore(tokenPath);
        await store.save(sample);
        expect(await store.exists()).toBe(true);

        await store.delete();
        await store.delete();
        expect(await store.exists()).toBe(false);
    });
});

describe('parseExpiry', () => {
    it('should read naive timestamps as UTC', () => {
        expect(parseExpiry('2025-01-01T10:00:00')).toBe(Date.parse('2025-01-01T10:00:00Z'));
    });

    it('should truncate microseconds to milliseconds', () => {
        expect(parseExpiry('2025-01-01T10:00:00.123456')).toBe(Date.parse('2025-01-01T10:00:00.123Z'));
    });

    it('should honour an explicit offset', () => {
        expect(parseExpiry('2025-01-01T10:00:00+02:00')).toBe(Date.parse('2025-01-01T08:00:00Z'));
    });

    it('should round-trip the value written by toRecord', () => {
        const expiresAt = Date.parse('2026-03-04T05:06:07.089Z');
        const record = toRecord({
            accessToken: 'a',
            refreshToken: null,
            idToken: null,
            tokenUri: 'https://oauth2.googleapis.com/token',
            clientId: 'id',
            clientSecret: 'test-secret',
            scopes: [],
            expiresAt,
        });
        expect(record.expiry).toBe('2026-03-04T05:06:07.089Z');
        expect(parseExpiry('2026-03-04T05:06:07.089Z')).toBe(expiresAt);
    });
});
