/**
 * Token Storage Interface
 */

import { z } from 'zod';

export const SAFETY_MARGIN_SECONDS = 300;

export interface CredentialSet {
    accessToken: string;
    refreshToken?: string;
    expiresIn: number; // seconds, as declared by the issuer
    retrievedAt: number; // Unix timestamp, seconds
}

export interface TokenStore {
    save(credentials: CredentialSet): Promise<void>;
    load(): Promise<CredentialSet | null>;
    clear(): Promise<void>;
    exists(): Promise<boolean>;
}

/**
 * On-disk layout of a credential record.
 */
export const StoredCredentialSchema = z.object({
    access_token: z.string().min(1),
    refresh_token: z.string().nullish(),
    expires_in: z.number().finite(),
    retrieved_at: z.number().finite(),
});

export type StoredCredential = z.infer<typeof StoredCredentialSchema>;

export function toStoredRecord(credentials: CredentialSet): StoredCredential {
    return {
        access_token: credentials.accessToken,
        refresh_token: credentials.refreshToken ?? null,
        expires_in: credentials.expiresIn,
        retrieved_at: credentials.retrievedAt,
    };
}

export function fromStoredRecord(record: StoredCredential): CredentialSet {
    return {
        accessToken: record.access_token,
        ...(record.refresh_token ? { refreshToken: record.refresh_token } : {}),
        expiresIn: record.expires_in,
        retrievedAt: record.retrieved_at,
    };
}

export function expiryInstant(credentials: CredentialSet): number {
    return credentials.retrievedAt + credentials.expiresIn;
}

/**
 * A credential is usable while more than the safety margin of its lifetime remains.
 */
export function isUsable(credentials: CredentialSet, nowSeconds: number = Date.now() / 1000): boolean {
    return nowSeconds < expiryInstant(credentials) - SAFETY_MARGIN_SECONDS;
}
