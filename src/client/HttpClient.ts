/**
 * HTTP Client
 * Axios wrapper with Supabase authentication and domain error mapping
 */

import axios, { AxiosError, type AxiosInstance, type AxiosResponse } from 'axios';
import {
    BrainliftError,
    ForbiddenError,
    NotFoundError,
    RequestFailedError,
    TimedOutError,
    UnreachableError,
    errorMessage,
    isRecord,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_TIMEOUT_MS = 30_000;

const CONNECTION_ERROR_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'ECONNRESET', 'EHOSTUNREACH']);
const TIMEOUT_ERROR_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/** Supplies request headers and drops them when the server rejects them */
export interface AuthHeaderSource {
    getAuthHeaders(): Promise<Record<string, string>>;
    invalidate(): void;
}

export interface HttpClientConfig {
    baseUrl: string;
    auth: AuthHeaderSource;
    timeout?: number;
}

export interface RequestOptions {
    params?: Record<string, string>;
    /** Record addressed by the request; without one, 404 and 403 stay RequestFailed */
    resourceId?: string;
}

/**
 * Socket error code, looking through the cause when Node reports an
 * AggregateError for a dual-stack connect
 */
function transportErrorCode(error: AxiosError): string | undefined {
    if (error.code) return error.code;
    const cause: unknown = error.cause;
    if (isRecord(cause)) {
        if (typeof cause.code === 'string') return cause.code;
        const first: unknown = Array.isArray(cause.errors) ? cause.errors[0] : undefined;
        if (isRecord(first) && typeof first.code === 'string') return first.code;
    }
    return undefined;
}

export class HttpClient {
    private readonly client: AxiosInstance;
    private readonly auth: AuthHeaderSource;
    readonly baseUrl: string;
    readonly timeout: number;

    constructor(config: HttpClientConfig) {
        this.auth = config.auth;
        this.baseUrl = config.baseUrl.replace(/\/+$/, '');
        this.timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;

        this.client = axios.create({
            baseURL: this.baseUrl,
            timeout: this.timeout,
            headers: {
                Accept: 'application/json',
            },
        });

        // Add auth interceptor
        this.client.interceptors.request.use(async (requestConfig) => {
            const headers = await this.auth.getAuthHeaders();
            for (const [name, value] of Object.entries(headers)) {
                requestConfig.headers.set(name, value);
            }
            return requestConfig;
        });
    }

    async get<T = unknown>(url: string, options: RequestOptions = {}): Promise<T> {
        try {
            const response: AxiosResponse<T> = await this.client.get(url, { params: options.params });
            return response.data;
        } catch (error) {
            throw this.toDomainError(error, options.resourceId);
        }
    }

    private toDomainError(error: unknown, resourceId: string | undefined): Error {
        // Raised while acquiring headers (authentication, exchange, identity)
        if (error instanceof BrainliftError) {
            return error;
        }

        if (!(error instanceof AxiosError)) {
            return new RequestFailedError(null, errorMessage(error));
        }

        const status = error.response?.status;
        if (status !== undefined) {
            switch (status) {
                case 404:
                    return resourceId === undefined
                        ? new RequestFailedError(status, errorMessage(error))
                        : new NotFoundError(resourceId);
                case 403:
                    return resourceId === undefined
                        ? new RequestFailedError(status, errorMessage(error))
                        : new ForbiddenError(resourceId);
                case 401:
                    logger.warn('BrainLift API rejected the Supabase token; it will be exchanged again on the next call');
                    this.auth.invalidate();
                    return new RequestFailedError(status, errorMessage(error));
                default:
                    return new RequestFailedError(status, errorMessage(error));
            }
        }

        const code = transportErrorCode(error);
        if (code && TIMEOUT_ERROR_CODES.has(code)) {
            return new TimedOutError(this.timeout);
        }
        if (code && CONNECTION_ERROR_CODES.has(code)) {
            return new UnreachableError(this.baseUrl);
        }
        return new RequestFailedError(null, errorMessage(error));
    }
}
