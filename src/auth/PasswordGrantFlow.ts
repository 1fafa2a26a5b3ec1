/**
 * Password Grant Flow
 * Password and refresh grants against the monitoring portal's token endpoint
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { z } from 'zod';
import type { CredentialSet } from './TokenStore.js';
import { TokenError, type TokenErrorKind, errorMessage } from '../utils/errors.js';
import { log, maskToken } from '../utils/logger.js';

export const DEFAULT_USER_AGENT = 'solar-collector/0.1';
const DEFAULT_TIMEOUT_MS = 15000;

export interface PasswordGrantConfig {
    tokenUrl: string;
    /** Base64 `client:secret` for the Basic authorization header */
    clientAuth: string;
    userAgent?: string;
    timeoutMs?: number;
}

export type GrantResult = { ok: true; credentials: CredentialSet } | { ok: false; error: TokenError };

export interface GrantClient {
    authenticate(username: string | undefined, secret: string | undefined): Promise<GrantResult>;
    refresh(refreshToken: string): Promise<GrantResult>;
}

/** The slice of axios the flow needs; tests hand in a fake. */
export type TokenTransport = Pick<AxiosInstance, 'post'>;

const TokenEnvelopeSchema = z.object({
    code: z.number(),
    msg: z.string().nullish(),
    data: z
        .object({
            access_token: z.string().nullish(),
            refresh_token: z.string().nullish(),
            expires_in: z.unknown(),
        })
        .nullish(),
});

type TokenEnvelope = z.infer<typeof TokenEnvelopeSchema>;

/**
 * Coerces the issuer's `expires_in` to whole seconds; anything non-numeric becomes 0.
 */
export function coerceExpiresIn(value: unknown): number {
    const seconds = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    return typeof seconds === 'number' && Number.isFinite(seconds) ? Math.trunc(seconds) : 0;
}

export class PasswordGrantFlow implements GrantClient {
    private readonly config: PasswordGrantConfig;
    private readonly http: TokenTransport;

    constructor(config: PasswordGrantConfig, transport?: TokenTransport) {
        this.config = config;
        this.http = transport ?? axios;
    }

    /**
     * Exchange username and pre-encoded secret for a new credential set
     */
    async authenticate(username: string | undefined, secret: string | undefined): Promise<GrantResult> {
        if (!username || !secret) {
            return failure(
                'ConfigurationMissing',
                'Username and encoded password are required (set SIGEN_USERNAME and SIGEN_PASSWORD_ENCODED)',
            );
        }

        log.debug(`Requesting token for ${username} (password grant)`);
        return this.requestToken('Authentication', {
            username,
            password: secret,
            scope: 'server',
            grant_type: 'password',
            userDeviceId: String(Date.now()),
        });
    }

    /**
     * Exchange a refresh token for a new credential set. When the issuer sends
     * no new refresh token, the one used for the request is kept.
     */
    async refresh(refreshToken: string): Promise<GrantResult> {
        if (!refreshToken) {
            return failure('ConfigurationMissing', 'No refresh token provided');
        }

        log.debug(`Refreshing token ${maskToken(refreshToken)}`);
        const result = await this.requestToken('Refresh', {
            grant_type: 'refresh_token',
            refresh_token: refreshToken,
            userDeviceId: String(Date.now()),
        });

        if (result.ok && !result.credentials.refreshToken) {
            return { ok: true, credentials: { ...result.credentials, refreshToken } };
        }
        return result;
    }

    private async requestToken(label: string, params: Record<string, string>): Promise<GrantResult> {
        let response: AxiosResponse<unknown>;
        try {
            response = await this.http.post(this.config.tokenUrl, new URLSearchParams(params).toString(), {
                headers: {
                    'Content-Type': 'application/x-www-form-urlencoded',
                    Authorization: `Basic ${this.config.clientAuth}`,
                    'User-Agent': this.config.userAgent || DEFAULT_USER_AGENT,
                },
                timeout: this.config.timeoutMs || DEFAULT_TIMEOUT_MS,
                responseType: 'text',
                validateStatus: () => true,
            });
        } catch (error) {
            return failure('TransportError', `${label} request failed: ${errorMessage(error)}`, error);
        }

        const envelope = parseEnvelope(response.data);

        if (response.status !== 200) {
            const detail = envelope.ok && envelope.value.msg ? ` (${envelope.value.msg})` : '';
            return failure('ProtocolError', `${label} failed: HTTP ${response.status}${detail}`);
        }
        if (!envelope.ok) {
            return failure('ProtocolError', `${label} failed: ${envelope.reason}`, envelope.cause);
        }

        const { code, msg, data } = envelope.value;
        if (code !== 0) {
            return failure('ApplicationError', `${label} rejected by issuer: code ${code}, ${msg || 'no message'}`);
        }
        if (!data?.access_token) {
            return failure('ProtocolError', `${label} failed: response has no access_token`);
        }

        return {
            ok: true,
            credentials: {
                accessToken: data.access_token,
                ...(data.refresh_token ? { refreshToken: data.refresh_token } : {}),
                expiresIn: coerceExpiresIn(data.expires_in),
                retrievedAt: Math.floor(Date.now() / 1000),
            },
        };
    }
}

function failure(kind: TokenErrorKind, message: string, cause?: unknown): GrantResult {
    return { ok: false, error: new TokenError(kind, message, cause === undefined ? undefined : { cause }) };
}

function parseEnvelope(
    body: unknown,
): { ok: true; value: TokenEnvelope } | { ok: false; reason: string; cause?: unknown } {
    let raw: unknown = body;
    if (typeof body === 'string') {
        try {
            raw = JSON.parse(body);
        } catch (error) {
            return { ok: false, reason: 'response body is not valid JSON', cause: error };
        }
    }

    const parsed = TokenEnvelopeSchema.safeParse(raw);
    if (!parsed.success) {
        return { ok: false, reason: 'unexpected response shape', cause: parsed.error };
    }
    return { ok: true, value: parsed.data };
}
