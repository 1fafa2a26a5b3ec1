/**
 * Tests for PasswordGrantFlow
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PasswordGrantFlow, coerceExpiresIn, DEFAULT_USER_AGENT } from '../../src/auth/PasswordGrantFlow.js';

const config = {
    tokenUrl: 'https://portal.test/auth/oauth/token',
    clientAuth: 'dGVzdDp0ZXN0',
};

function reply(body: unknown, status = 200) {
    return { status, data: typeof body === 'string' ? body : JSON.stringify(body) };
}

describe('PasswordGrantFlow', () => {
    let post: ReturnType<typeof vi.fn>;
    let flow: PasswordGrantFlow;

    beforeEach(() => {
        vi.useFakeTimers({ toFake: ['Date'] });
        vi.setSystemTime(1_700_000_000_123);
        post = vi.fn();
        flow = new PasswordGrantFlow(config, { post });
    });

    afterEach(() => {
        vi.useRealTimers();
        vi.restoreAllMocks();
    });

    describe('authenticate', () => {
        it('should send a form-encoded password grant with Basic client auth', async () => {
            post.mockResolvedValue(reply({ code: 0, msg: 'success', data: { access_token: 'a1', expires_in: 43199 } }));

            await flow.authenticate('owner+solar@example.com', 'ab/cd+ef==');

            expect(post).toHaveBeenCalledTimes(1);
            const [url, body, requestConfig] = post.mock.calls[0];
            expect(url).toBe('https://portal.test/auth/oauth/token');
            expect(body).toBe(
                'username=owner%2Bsolar%40example.com&password=ab%2Fcd%2Bef%3D%3D&scope=server' +
                    '&grant_type=password&userDeviceId=1700000000123',
            );
            expect(requestConfig.headers).toEqual({
                'Content-Type': 'application/x-www-form-urlencoded',
                Authorization: 'Basic dGVzdDp0ZXN0',
                'User-Agent': DEFAULT_USER_AGENT,
            });
            expect(requestConfig.timeout).toBe(15000);
        });

        it('should build a credential set stamped with the current time', async () => {
            post.mockResolvedValue(
                reply({ code: 0, msg: 'success', data: { access_token: 'a1', refresh_token: 'r1', expires_in: 43199 } }),
            );

            const result = await flow.authenticate('owner@example.com', 'secret');

            expect(result).toEqual({
                ok: true,
                credentials: { accessToken: 'a1', refreshToken: 'r1', expiresIn: 43199, retrievedAt: 1700000000 },
            });
        });

        it('should not call the endpoint when credentials are missing', async () => {
            const result = await flow.authenticate(undefined, 'secret');

            expect(result.ok).toBe(false);
            if (!result.ok) expect(result.error.kind).toBe('ConfigurationMissing');
            expect(post).not.toHaveBeenCalled();
        });

        it('should report a non-200 status as a protocol error', async () => {
            post.mockResolvedValue(reply({ code: 401, msg: 'unauthorized' }, 401));

            const result = await flow.authenticate('owner@example.com', 'secret');

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.kind).toBe('ProtocolError');
                expect(result.error.message).toBe('Authentication failed: HTTP 401 (unauthorized)');
            }
        });

        it('should report an application error code', async () => {
            post.mockResolvedValue(reply({ code: 11001, msg: 'user or password error' }));

            const result = await flow.authenticate('owner@example.com', 'secret');

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.kind).toBe('ApplicationError');
                expect(result.error.message).toBe(
                    'Authentication rejected by issuer: code 11001, user or password error',
                );
            }
        });

        it('should reject a success envelope without an access token', async () => {
            post.mockResolvedValue(reply({ code: 0, msg: 'success', data: { expires_in: 100 } }));

            const result = await flow.authenticate('owner@example.com', 'secret');

            expect(result.ok).toBe(false);
            if (!result.ok) expect(result.error.kind).toBe('ProtocolError');
        });

        it('should report an unparsable body as a protocol error', async () => {
            post.mockResolvedValue(reply('not json'));

            const result = await flow.authenticate('owner@example.com', 'secret');

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.kind).toBe('ProtocolError');
                expect(result.error.message).toBe('Authentication failed: response body is not valid JSON');
            }
        });

        it('should report a rejected request as a transport error', async () => {
            post.mockRejectedValue(new Error('timeout of 15000ms exceeded'));

            const result = await flow.authenticate('owner@example.com', 'secret');

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.kind).toBe('TransportError');
                expect(result.error.message).toBe('Authentication request failed: timeout of 15000ms exceeded');
            }
        });
    });

    describe('refresh', () => {
        it('should send a refresh grant', async () => {
            post.mockResolvedValue(reply({ code: 0, msg: 'success', data: { access_token: 'a2', expires_in: 3600 } }));

            await flow.refresh('r/1+x');

            expect(post.mock.calls[0][1]).toBe('grant_type=refresh_token&refresh_token=r%2F1%2Bx&userDeviceId=1700000000123');
        });

        it('should replace the refresh token when the issuer rotates it', async () => {
            post.mockResolvedValue(
                reply({ code: 0, msg: 'success', data: { access_token: 'a2', refresh_token: 'r2', expires_in: 3600 } }),
            );

            const result = await flow.refresh('r1');

            expect(result.ok && result.credentials.refreshToken).toBe('r2');
        });

        it('should keep the presented refresh token when none is returned', async () => {
            post.mockResolvedValue(reply({ code: 0, msg: 'success', data: { access_token: 'a2', expires_in: 3600 } }));

            const result = await flow.refresh('r1');

            expect(result).toEqual({
                ok: true,
                credentials: { accessToken: 'a2', refreshToken: 'r1', expiresIn: 3600, retrievedAt: 1700000000 },
            });
        });

        it('should not retry on failure', async () => {
            post.mockResolvedValue(reply({ code: 11003, msg: 'refresh token expired' }));

            const result = await flow.refresh('r1');

            expect(result.ok).toBe(false);
            expect(post).toHaveBeenCalledTimes(1);
        });
    });

    describe('coerceExpiresIn', () => {
        it('should keep numeric lifetimes', () => {
            expect(coerceExpiresIn(3600)).toBe(3600);
            expect(coerceExpiresIn('7200')).toBe(7200);
        });

        it('should coerce missing or non-numeric lifetimes to 0', () => {
            expect(coerceExpiresIn(undefined)).toBe(0);
            expect(coerceExpiresIn(null)).toBe(0);
            expect(coerceExpiresIn('soon')).toBe(0);
            expect(coerceExpiresIn('')).toBe(0);
            expect(coerceExpiresIn(Number.NaN)).toBe(0);
        });
    });
});
