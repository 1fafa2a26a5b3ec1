/**
 * Environment Token Store
 * Read-only record supplied through an environment variable (e.g. by a secrets manager)
 */

import { StoredCredentialSchema, fromStoredRecord, type CredentialSet, type TokenStore } from './TokenStore.js';
import { TokenError } from '../utils/errors.js';
import { log } from '../utils/logger.js';

export const DEFAULT_TOKEN_ENV_VAR = 'SIGEN_TOKEN_JSON';

export class EnvStore implements TokenStore {
    constructor(
        private readonly variable: string = DEFAULT_TOKEN_ENV_VAR,
        private readonly env: Record<string, string | undefined> = process.env,
    ) {}

    // Renewed credentials live for this run only; the secret source owns the record.
    async save(_credentials: CredentialSet): Promise<void> {
        log.debug(`${this.variable} is read-only; renewed credential not persisted`);
    }

    async load(): Promise<CredentialSet | null> {
        const value = this.env[this.variable];
        if (!value || !value.trim()) {
            return null;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(value);
        } catch (error) {
            throw new TokenError('InvalidStoredRecord', `${this.variable} is not valid JSON`, { cause: error });
        }

        const parsed = StoredCredentialSchema.safeParse(raw);
        if (!parsed.success) {
            throw new TokenError('InvalidStoredRecord', `${this.variable} does not hold a complete credential record`);
        }
        return fromStoredRecord(parsed.data);
    }

    async clear(): Promise<void> {
        log.debug(`${this.variable} is read-only; nothing to clear`);
    }

    async exists(): Promise<boolean> {
        return Boolean(this.env[this.variable]?.trim());
    }
}
