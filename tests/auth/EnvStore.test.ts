/**
 * Tests for EnvStore
 */
import { describe, it, expect } from 'vitest';
import { EnvStore } from '../../src/auth/EnvStore.js';

describe('EnvStore', () => {
    const record = JSON.stringify({
        access_token: 'env-token',
        refresh_token: 'env-refresh',
        expires_in: 3600,
        retrieved_at: 1000,
    });

    it('should load the record from the named variable', async () => {
        const store = new EnvStore('TOKEN_JSON', { TOKEN_JSON: record });

        expect(await store.load()).toEqual({
            accessToken: 'env-token',
            refreshToken: 'env-refresh',
            expiresIn: 3600,
            retrievedAt: 1000,
        });
        expect(await store.exists()).toBe(true);
    });

    it('should treat an unset or blank variable as no record', async () => {
        expect(await new EnvStore('TOKEN_JSON', {}).load()).toBeNull();
        expect(await new EnvStore('TOKEN_JSON', { TOKEN_JSON: '  ' }).load()).toBeNull();
        expect(await new EnvStore('TOKEN_JSON', { TOKEN_JSON: '  ' }).exists()).toBe(false);
    });

    it('should reject malformed JSON', async () => {
        const store = new EnvStore('TOKEN_JSON', { TOKEN_JSON: '{"access_token":' });

        await expect(store.load()).rejects.toMatchObject({
            kind: 'InvalidStoredRecord',
            message: 'TOKEN_JSON is not valid JSON',
        });
    });

    it('should reject an incomplete record', async () => {
        const store = new EnvStore('TOKEN_JSON', { TOKEN_JSON: JSON.stringify({ access_token: 'x' }) });

        await expect(store.load()).rejects.toMatchObject({ kind: 'InvalidStoredRecord' });
    });

    it('should leave the variable untouched on save and clear', async () => {
        const env: Record<string, string | undefined> = { TOKEN_JSON: record };
        const store = new EnvStore('TOKEN_JSON', env);

        await store.save({ accessToken: 'renewed', expiresIn: 10, retrievedAt: 2000 });
        await store.clear();

        expect(env.TOKEN_JSON).toBe(record);
    });
});
