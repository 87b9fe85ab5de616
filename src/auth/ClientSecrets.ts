/**
 * Google OAuth client secrets
 * Reads the JSON downloaded from the Google Cloud console ("installed" or "web" client)
 */

import * as fs from 'fs';
import { z } from 'zod';
import { fail, succeed, type Outcome } from './CredentialStore.js';
import { GOOGLE_TOKEN_URI } from './FileStore.js';

export const GOOGLE_AUTH_URI = 'https://accounts.google.com/o/oauth2/auth';

export interface ClientSecrets {
    clientId: string;
    clientSecret: string;
    authUri: string;
    tokenUri: string;
}

const clientSchema = z.object({
    client_id: z.string().min(1),
    client_secret: z.string().min(1),
    auth_uri: z.string().url().optional(),
    token_uri: z.string().url().optional(),
});

const secretsFileSchema = z.union([
    z.object({ installed: clientSchema }).transform((file) => file.installed),
    z.object({ web: clientSchema }).transform((file) => file.web),
]);

export function loadClientSecrets(filePath: string): Outcome<ClientSecrets> {
    if (!fs.existsSync(filePath)) {
        return fail(new Error(`Client secrets file not found: ${filePath}`));
    }

    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
        return fail(new Error(`Client secrets file is not valid JSON: ${filePath}`, { cause: error }));
    }

    const parsed = secretsFileSchema.safeParse(raw);
    if (!parsed.success) {
        return fail(
            new Error(`Client secrets file ${filePath} must contain an "installed" or "web" client with client_id and client_secret`),
        );
    }

    const client = parsed.data;
    return succeed({
        clientId: client.client_id,
        clientSecret: client.client_secret,
        authUri: client.auth_uri ?? GOOGLE_AUTH_URI,
        tokenUri: client.token_uri ?? GOOGLE_TOKEN_URI,
    });
}
