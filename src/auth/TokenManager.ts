/**
 * Token Manager
 * Manages token lifecycle: storage, validation, refresh, re-authentication
 *
 * States and transitions:
 *
 *   load ──► Usable ─────────────────────────────────────► token
 *        ├─► Expired ── refresh ──ok──────► persist ─────► token
 *        │              (no token | failed)
 *        │                   ▼
 *        └─► NoCredential ── authenticate ──ok──► persist ► token
 *                              └─failed──────────────────► failure
 */

import {
    SAFETY_MARGIN_SECONDS,
    expiryInstant,
    isUsable,
    type CredentialSet,
    type TokenStore,
} from './TokenStore.js';
import { PasswordGrantFlow, type GrantClient, type GrantResult, type TokenTransport } from './PasswordGrantFlow.js';
import { TokenError, errorMessage } from '../utils/errors.js';
import { log, maskToken } from '../utils/logger.js';

export interface TokenManagerConfig {
    tokenUrl: string;
    clientAuth: string;
    username?: string;
    encodedPassword?: string;
    userAgent?: string;
    timeoutMs?: number;
}

export interface TokenManagerOptions {
    store: TokenStore;
    /** Overrides the password/refresh grant client */
    grants?: GrantClient;
    /** HTTP transport for the default grant client */
    transport?: TokenTransport;
}

export type TokenResult = { ok: true; token: string } | { ok: false; error: TokenError };

export type CredentialState =
    | { state: 'NoCredential'; reason?: TokenError }
    | { state: 'Usable'; credentials: CredentialSet }
    | { state: 'Expired'; credentials: CredentialSet };

export type Transition = 'load' | 'refresh' | 'authenticate' | 'persist';

export interface TraceStep {
    transition: Transition;
    outcome: 'ok' | 'failed' | 'skipped';
    detail?: string;
}

export interface AuthStatus {
    state: CredentialState['state'];
    stored: boolean;
    expiresAt?: Date;
    renewAfter?: Date;
    canRefresh?: boolean;
    problem?: string;
}

export class TokenManager {
    private readonly config: TokenManagerConfig;
    private readonly store: TokenStore;
    private readonly grants: GrantClient;
    private trace: TraceStep[] = [];

    constructor(config: TokenManagerConfig, options: TokenManagerOptions) {
        this.config = config;
        this.store = options.store;
        this.grants =
            options.grants ??
            new PasswordGrantFlow(
                {
                    tokenUrl: config.tokenUrl,
                    clientAuth: config.clientAuth,
                    userAgent: config.userAgent,
                    timeoutMs: config.timeoutMs,
                },
                options.transport,
            );
    }

    /**
     * Transitions taken by the most recent getActiveAccessToken() or login() call
     */
    get lastTrace(): readonly TraceStep[] {
        return this.trace;
    }

    /**
     * Get a usable access token, refreshing or re-authenticating when needed.
     * Never throws: every failure comes back as `{ ok: false }`.
     */
    async getActiveAccessToken(): Promise<TokenResult> {
        this.trace = [];
        try {
            const current = await this.loadState();

            if (current.state === 'Usable') {
                log.debug(`Using stored access token ${maskToken(current.credentials.accessToken)}`);
                return { ok: true, token: current.credentials.accessToken };
            }

            const failures: TokenError[] = [];
            let issued: CredentialSet | null = null;

            if (current.state === 'Expired') {
                const refreshToken = current.credentials.refreshToken;
                if (refreshToken) {
                    log.debug('Stored access token expired or near expiry; refreshing');
                    const refreshed = await this.attempt('refresh', () => this.grants.refresh(refreshToken));
                    if (refreshed.ok) issued = refreshed.credentials;
                    else failures.push(refreshed.error);
                } else {
                    this.record('refresh', 'skipped', 'no refresh token stored');
                }
            }

            if (!issued) {
                const authenticated = await this.attempt('authenticate', () =>
                    this.grants.authenticate(this.config.username, this.config.encodedPassword),
                );
                if (authenticated.ok) issued = authenticated.credentials;
                else failures.push(authenticated.error);
            }

            if (!issued) {
                return { ok: false, error: combine(failures) };
            }

            await this.persist(issued);
            return { ok: true, token: issued.accessToken };
        } catch (error) {
            // Stores and grant clients report failures as values; anything here is unexpected.
            log.error(`Token lifecycle failed unexpectedly: ${errorMessage(error)}`);
            const kind = error instanceof TokenError ? error.kind : 'UnexpectedError';
            return {
                ok: false,
                error: new TokenError(kind, `Unexpected failure: ${errorMessage(error)}`, { cause: error }),
            };
        }
    }

    /**
     * Force a password-grant authentication and store the result
     */
    async login(): Promise<TokenResult> {
        this.trace = [];
        const authenticated = await this.attempt('authenticate', () =>
            this.grants.authenticate(this.config.username, this.config.encodedPassword),
        );
        if (!authenticated.ok) {
            return { ok: false, error: authenticated.error };
        }
        await this.persist(authenticated.credentials);
        return { ok: true, token: authenticated.credentials.accessToken };
    }

    async logout(): Promise<void> {
        await this.store.clear();
    }

    async getStatus(): Promise<AuthStatus> {
        const current = await this.inspect();
        if (current.state === 'NoCredential') {
            return {
                state: current.state,
                stored: await this.store.exists(),
                ...(current.reason ? { problem: current.reason.message } : {}),
            };
        }

        const expiry = expiryInstant(current.credentials);
        return {
            state: current.state,
            stored: true,
            expiresAt: new Date(expiry * 1000),
            renewAfter: new Date((expiry - SAFETY_MARGIN_SECONDS) * 1000),
            canRefresh: Boolean(current.credentials.refreshToken),
        };
    }

    private async loadState(): Promise<CredentialState> {
        const current = await this.inspect();
        if (current.state === 'NoCredential' && current.reason) {
            log.warn(`Ignoring stored credential: ${current.reason.message}`);
            this.record('load', 'failed', current.reason.kind);
        } else {
            this.record('load', 'ok', current.state);
        }
        return current;
    }

    private async inspect(): Promise<CredentialState> {
        let credentials: CredentialSet | null;
        try {
            credentials = await this.store.load();
        } catch (error) {
            const reason =
                error instanceof TokenError
                    ? error
                    : new TokenError('PersistenceError', errorMessage(error), { cause: error });
            return { state: 'NoCredential', reason };
        }

        if (!credentials) return { state: 'NoCredential' };
        return isUsable(credentials)
            ? { state: 'Usable', credentials }
            : { state: 'Expired', credentials };
    }

    private async attempt(transition: 'refresh' | 'authenticate', grant: () => Promise<GrantResult>): Promise<GrantResult> {
        const result = await grant();
        if (result.ok) {
            this.record(transition, 'ok');
        } else {
            log.warn(`Token ${transition} failed: ${result.error.message}`);
            this.record(transition, 'failed', result.error.kind);
        }
        return result;
    }

    private async persist(credentials: CredentialSet): Promise<void> {
        try {
            await this.store.save(credentials);
            this.record('persist', 'ok');
        } catch (error) {
            // The token is still good for this run even if it cannot be kept for the next.
            log.warn(`Could not persist credential: ${errorMessage(error)}`);
            this.record('persist', 'failed', 'PersistenceError');
        }
    }

    private record(transition: Transition, outcome: TraceStep['outcome'], detail?: string): void {
        this.trace.push(detail === undefined ? { transition, outcome } : { transition, outcome, detail });
    }
}

function combine(failures: TokenError[]): TokenError {
    const last = failures[failures.length - 1];
    if (!last) {
        return new TokenError('ProtocolError', 'No token could be obtained');
    }
    if (failures.length === 1) {
        return last;
    }
    return new TokenError(last.kind, failures.map((failure) => failure.message).join('; '), { cause: last });
}
