/**
 * Tests for the credential record helpers
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import {
    SAFETY_MARGIN_SECONDS,
    StoredCredentialSchema,
    expiryInstant,
    fromStoredRecord,
    isUsable,
    toStoredRecord,
} from '../../src/auth/TokenStore.js';

describe('TokenStore helpers', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    const credentials = { accessToken: 'a', expiresIn: 3600, retrievedAt: 1000 };

    describe('isUsable', () => {
        it('should be usable strictly before the renewal point', () => {
            const renewal = 1000 + 3600 - SAFETY_MARGIN_SECONDS;

            expect(isUsable(credentials, renewal - 1)).toBe(true);
            expect(isUsable(credentials, renewal)).toBe(false);
            expect(isUsable(credentials, renewal + 1)).toBe(false);
        });

        it('should never be usable with a lifetime inside the safety margin', () => {
            expect(isUsable({ ...credentials, expiresIn: 0 }, 1000)).toBe(false);
            expect(isUsable({ ...credentials, expiresIn: SAFETY_MARGIN_SECONDS }, 1000)).toBe(false);
        });

        it('should default to the current time', () => {
            vi.useFakeTimers({ toFake: ['Date'] });
            vi.setSystemTime(4000 * 1000);
            expect(isUsable(credentials)).toBe(true);

            vi.setSystemTime(4300 * 1000);
            expect(isUsable(credentials)).toBe(false);
        });
    });

    describe('expiryInstant', () => {
        it('should add the lifetime to the retrieval time', () => {
            expect(expiryInstant(credentials)).toBe(4600);
        });
    });

    describe('toStoredRecord', () => {
        it('should store an absent refresh token as null', () => {
            expect(toStoredRecord(credentials)).toEqual({
                access_token: 'a',
                refresh_token: null,
                expires_in: 3600,
                retrieved_at: 1000,
            });
        });
    });

    describe('fromStoredRecord', () => {
        it('should map the snake_case record back', () => {
            expect(
                fromStoredRecord({ access_token: 'a', refresh_token: 'r', expires_in: 3600, retrieved_at: 1000 }),
            ).toEqual({ ...credentials, refreshToken: 'r' });
        });

        it('should leave out a null refresh token', () => {
            expect(
                fromStoredRecord({ access_token: 'a', refresh_token: null, expires_in: 3600, retrieved_at: 1000 }),
            ).toEqual(credentials);
        });
    });

    describe('StoredCredentialSchema', () => {
        it('should require a non-empty access token and numeric times', () => {
            expect(StoredCredentialSchema.safeParse({ access_token: '', expires_in: 1, retrieved_at: 1 }).success).toBe(
                false,
            );
            expect(StoredCredentialSchema.safeParse({ access_token: 'a', expires_in: '1', retrieved_at: 1 }).success).toBe(
                false,
            );
            expect(StoredCredentialSchema.safeParse({ access_token: 'a', expires_in: 1, retrieved_at: 1 }).success).toBe(
                true,
            );
        });
    });
});
