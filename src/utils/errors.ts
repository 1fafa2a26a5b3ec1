/**
 * Error utilities
 * Error classes shared by the token lifecycle, the API clients and the CLI
 */

import { AxiosError } from 'axios';

export type TokenErrorKind =
    | 'ConfigurationMissing'
    | 'TransportError'
    | 'ProtocolError'
    | 'ApplicationError'
    | 'PersistenceError'
    | 'InvalidStoredRecord'
    | 'UnexpectedError';

/**
 * Failure raised while acquiring, refreshing or persisting a credential.
 * The token manager returns these as values; they never cross its boundary
 * as exceptions.
 */
export class TokenError extends Error {
    readonly kind: TokenErrorKind;

    constructor(kind: TokenErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'TokenError';
        this.kind = kind;
    }
}

/**
 * Envelope-level failure from the energy API (`code !== 0`) or an
 * unexpected HTTP/transport failure while calling it.
 */
export class ApiError extends Error {
    readonly code?: number;
    readonly status?: number;

    constructor(message: string, details: { code?: number; status?: number; cause?: unknown } = {}) {
        super(message, { cause: details.cause });
        this.name = 'ApiError';
        this.code = details.code;
        this.status = details.status;
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Extracts a human-readable message from an unknown error value.
 * For AxiosErrors, prefers the API response body (which often carries
 * `msg` or `message`) over the generic HTTP status.
 */
export function errorMessage(error: unknown): string {
    if (error instanceof AxiosError && error.response) {
        const data: unknown = error.response.data;
        if (typeof data === 'string' && data.length > 0) return data;
        if (data && typeof data === 'object') {
            if ('msg' in data && typeof data.msg === 'string') return data.msg;
            if ('message' in data && typeof data.message === 'string') return data.message;
        }
        return `HTTP ${error.response.status || 'unknown'}`;
    }
    return error instanceof Error ? error.message : String(error);
}

export class SinkError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SinkError';
    }
}
