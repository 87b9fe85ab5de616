/**
 * File Credential Store
 * Google "authorized_user" JSON record at a configurable path (chmod 600)
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { CredentialStore, PrimaryCredential } from './CredentialStore.js';
import { logger } from '../utils/logger.js';

export const GOOGLE_TOKEN_URI = 'https://oauth2.googleapis.com/token';

/**
 * On-disk shape. `refresh_token` and `id_token` are always written, null when
 * absent; readers written against Google's format require the keys to exist.
 */
export interface StoredCredentialRecord {
    token: string;
    refresh_token: string | null;
    id_token: string | null;
    token_uri: string;
    client_id: string;
    client_secret: string;
    scopes: string[];
    expiry: string | null;
    type: 'authorized_user';
}

const storedRecordSchema = z
    .object({
        token: z.string().min(1).optional(),
        access_token: z.string().min(1).optional(),
        refresh_token: z.string().nullable(),
        id_token: z.string().nullable().optional(),
        token_uri: z.string().optional(),
        client_id: z.string(),
        client_secret: z.string(),
        scopes: z.union([z.array(z.string()), z.string()]).nullable().optional(),
        expiry: z.string().nullable().optional(),
        type: z.literal('authorized_user').optional(),
    })
    .refine((record) => !!(record.token ?? record.access_token), {
        message: 'token or access_token is required',
        path: ['token'],
    });

type ParsedRecord = z.infer<typeof storedRecordSchema>;

/**
 * Google writes expiry as a naive UTC timestamp with microseconds
 * ("2025-01-01T10:00:00.123456" or with a trailing Z).
 */
export function parseExpiry(expiry: string): number {
    const match = expiry.match(/^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(\.\d+)?(Z|[+-]\d{2}:?\d{2})?$/);
    if (!match) return Date.parse(expiry);
    const millis = match[2] ? match[2].slice(0, 4).padEnd(4, '0') : '';
    return Date.parse(`${match[1]}${millis}${match[3] ?? 'Z'}`);
}

function fromRecord(record: ParsedRecord): PrimaryCredential {
    let expiresAt: number | null = null;
    if (record.expiry) {
        const parsed = parseExpiry(record.expiry);
        // Unreadable expiry: treat as expired so the next use refreshes
        expiresAt = Number.isNaN(parsed) ? 0 : parsed;
    }

    const scopes = typeof record.scopes === 'string' ? record.scopes.split(/\s+/).filter(Boolean) : record.scopes ?? [];

    return {
        accessToken: record.token ?? record.access_token ?? '',
        refreshToken: record.refresh_token,
        idToken: record.id_token ?? null,
        tokenUri: record.token_uri || GOOGLE_TOKEN_URI,
        clientId: record.client_id,
        clientSecret: record.client_secret,
        scopes,
        expiresAt,
    };
}

export function toRecord(credential: PrimaryCredential): StoredCredentialRecord {
    return {
        token: credential.accessToken,
        refresh_token: credential.refreshToken,
        id_token: credential.idToken,
        token_uri: credential.tokenUri,
        client_id: credential.clientId,
        client_secret: credential.clientSecret,
        scopes: credential.scopes,
        expiry: credential.expiresAt === null ? null : new Date(credential.expiresAt).toISOString(),
        type: 'authorized_user',
    };
}

export class FileStore implements CredentialStore {
    constructor(private readonly filePath: string) {}

    get path(): string {
        return this.filePath;
    }

    async save(credential: PrimaryCredential): Promise<void> {
        fs.mkdirSync(path.dirname(this.filePath), { recursive: true, mode: 0o700 });
        fs.writeFileSync(this.filePath, JSON.stringify(toRecord(credential), null, 2) + '\n', { mode: 0o600 });
    }

    async load(): Promise<PrimaryCredential | null> {
        if (!fs.existsSync(this.filePath)) {
            return null;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(this.filePath, 'utf8'));
        } catch (error) {
            logger.warn(`Ignoring unreadable credential file ${this.filePath}: ${error instanceof Error ? error.message : error}`);
            return null;
        }

        const parsed = storedRecordSchema.safeParse(raw);
        if (!parsed.success) {
            const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
            logger.warn(`Ignoring malformed credential file ${this.filePath}: ${issues}`);
            return null;
        }

        return fromRecord(parsed.data);
    }

    async delete(): Promise<void> {
        fs.rmSync(this.filePath, { force: true });
    }

    async exists(): Promise<boolean> {
        return fs.existsSync(this.filePath);
    }
}
