/**
 * Error utilities
 * Domain error taxonomy plus shared formatting for CLI and MCP error handling
 */

import { AxiosError } from 'axios';

export type BrainliftErrorCode =
    | 'AUTHENTICATION_UNAVAILABLE'
    | 'EXCHANGE_FAILED'
    | 'MISSING_IDENTITY'
    | 'NOT_FOUND'
    | 'FORBIDDEN'
    | 'REQUEST_FAILED'
    | 'UNREACHABLE'
    | 'TIMED_OUT';

export abstract class BrainliftError extends Error {
    abstract readonly code: BrainliftErrorCode;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** No usable Google credential could be obtained (config missing, consent declined, ...) */
export class AuthenticationUnavailableError extends BrainliftError {
    readonly code = 'AUTHENTICATION_UNAVAILABLE';

    constructor(detail?: string) {
        super(
            `Google authentication is unavailable${detail ? ` (${detail})` : ''}. Run: brainlift auth login`,
        );
    }
}

/** Supabase rejected the identity assertion or answered with something unusable */
export class ExchangeFailedError extends BrainliftError {
    readonly code = 'EXCHANGE_FAILED';

    constructor(
        readonly detail: string,
        readonly status?: number,
    ) {
        super(`Supabase token exchange failed${status ? ` (HTTP ${status})` : ''}: ${detail}`);
    }
}

export class MissingIdentityError extends BrainliftError {
    readonly code = 'MISSING_IDENTITY';

    constructor() {
        super('Supabase token exchange did not return a user id');
    }
}

export class NotFoundError extends BrainliftError {
    readonly code = 'NOT_FOUND';

    constructor(readonly resourceId: string) {
        super(`BrainLift with ID '${resourceId}' not found`);
    }
}

/** The record exists but the ownership check failed */
export class ForbiddenError extends BrainliftError {
    readonly code = 'FORBIDDEN';

    constructor(readonly resourceId: string) {
        super(`Access to BrainLift '${resourceId}' is forbidden for the signed-in user`);
    }
}

export class RequestFailedError extends BrainliftError {
    readonly code = 'REQUEST_FAILED';

    constructor(
        readonly status: number | null,
        readonly detail: string,
    ) {
        super(status === null ? `Request failed: ${detail}` : `Request failed with HTTP ${status}: ${detail}`);
    }
}

export class UnreachableError extends BrainliftError {
    readonly code = 'UNREACHABLE';

    constructor(readonly baseUrl: string) {
        super(`Failed to connect to BrainLift API at ${baseUrl}`);
    }
}

export class TimedOutError extends BrainliftError {
    readonly code = 'TIMED_OUT';

    constructor(readonly timeoutMs: number) {
        super(`Request timed out after ${Math.round(timeoutMs / 1000)} seconds`);
    }
}

/**
 * Extracts a human-readable message from an unknown error value.
 * For AxiosErrors, prefers the API response body (which often contains
 * a more descriptive message than the generic HTTP status).
 */
export function errorMessage(error: unknown): string {
    if (error instanceof AxiosError && error.response) {
        const data: unknown = error.response.data;
        if (typeof data === 'string' && data.length > 0) return data;
        if (isRecord(data)) {
            for (const key of ['message', 'msg', 'error_description', 'error']) {
                const value = data[key];
                if (typeof value === 'string' && value.length > 0) return value;
            }
        }
        return `HTTP ${error.response.status || 'unknown'}`;
    }
    return error instanceof Error ? error.message : String(error);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
