/**
 * Credential Storage Interface
 */

/** Google OAuth token set for the signed-in user */
export interface PrimaryCredential {
    accessToken: string;
    refreshToken: string | null;
    idToken: string | null;
    tokenUri: string;
    clientId: string;
    clientSecret: string;
    scopes: string[];
    expiresAt: number | null; // Unix timestamp ms, null when the issuer gave no expiry
}

export interface CredentialStore {
    save(credential: PrimaryCredential): Promise<void>;
    /** Never throws: a missing or malformed record reads as null */
    load(): Promise<PrimaryCredential | null>;
    delete(): Promise<void>;
    exists(): Promise<boolean>;
}

/** Result of one step in the credential acquisition pipeline */
export type Outcome<T> = { ok: true; value: T } | { ok: false; error: Error };

export function succeed<T>(value: T): Outcome<T> {
    return { ok: true, value };
}

export function fail<T>(error: unknown): Outcome<T> {
    return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
}

/** Run an async step, capturing a rejection as a failed outcome */
export async function attempt<T>(step: () => Promise<T>): Promise<Outcome<T>> {
    try {
        return succeed(await step());
    } catch (error) {
        return fail(error);
    }
}
