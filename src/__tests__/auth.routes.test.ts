import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance, LightMyRequestResponse } from 'fastify';
import { buildApp } from '../app';
import { createAuthMiddleware } from '../middleware/auth.middleware';
import { createAuthorize } from '../middleware/rbac.middleware';
import type { IdentityUser } from '../types/auth';
import { createHarness, type Harness } from './helpers';

const REGISTER_BODY = { email: 'a@x.io', password: 'passw0rd!', name: { 'en-US': 'A' } };

const OUTSIDER: IdentityUser = {
    id: 99,
    public_id: '0d3c4a4e-1f7e-4a55-9a0e-2b7a6c1f5e10',
    login_id: 'outsider',
    email: 'outsider@example.com',
    name: { 'en-US': 'Outsider' },
    password_hash: '',
    is_deleted: false,
};

/** The app under test, plus sample routes guarded the same way as real ones */
async function buildTestApp(h: Harness, appEnv = 'local'): Promise<FastifyInstance> {
    const app = await buildApp({
        config: { appEnv, frontendUrl: undefined },
        store: h.store,
        tokens: h.tokens,
        authService: h.authService,
        permissionTable: h.permissionTable,
    });

    const gate = createAuthMiddleware(h.tokens);
    const authorize = createAuthorize(h.permissionTable);
    app.get('/users', { preHandler: [gate.authenticate, authorize] }, async () => ({ users: [] }));
    app.post('/users', { preHandler: [gate.authenticate, authorize] }, async () => ({ created: true }));
    app.get('/unknown', { preHandler: [gate.optionalAuthenticate, authorize] }, async () => ({ ok: true }));

    await app.ready();
    return app;
}

function refreshCookie(res: LightMyRequestResponse) {
    return res.cookies.find((c) => c.name === 'refresh_token');
}

function refreshValue(res: LightMyRequestResponse): string {
    const cookie = refreshCookie(res);
    if (!cookie) throw new Error('response set no refresh_token cookie');
    return cookie.value;
}

describe('auth routes', () => {
    let h: Harness;
    let app: FastifyInstance;

    const register = (body: Record<string, unknown> = REGISTER_BODY) =>
        app.inject({ method: 'POST', url: '/auth/register', payload: body });
    const refresh = (token: string) =>
        app.inject({ method: 'POST', url: '/auth/refresh', cookies: { refresh_token: token } });
    const asRoles = (roles: string[]) => ({ authorization: `Bearer ${h.tokens.issueAccessToken(OUTSIDER, roles)}` });

    beforeEach(async () => {
        h = createHarness();
        h.store.assignRoleToGroup('public', 'member');
        app = await buildTestApp(h);
    });

    afterEach(async () => {
        await app.close();
    });

    describe('POST /auth/register', () => {
        it('registers, then serves /auth/me with the public group roles', async () => {
            const res = await register();
            expect(res.statusCode).toBe(201);

            const body = res.json();
            expect(body.message).toBe('User registered successfully');
            expect(body.user).toMatchObject({ login_id: 'a@x.io', email: 'a@x.io', name: { 'en-US': 'A' } });
            expect(body.user).not.toHaveProperty('password_hash');
            expect(body.tokens).toMatchObject({ token_type: 'Bearer', expires_in: 900 });

            const cookie = refreshCookie(res);
            expect(cookie).toMatchObject({ path: '/api/auth', httpOnly: true, sameSite: 'Strict', maxAge: 604800 });
            expect(cookie?.secure).toBeUndefined();

            const me = await app.inject({
                method: 'GET',
                url: '/auth/me',
                headers: { authorization: `Bearer ${body.tokens.access_token}` },
            });
            expect(me.statusCode).toBe(200);
            expect(me.json()).toEqual({ user: body.user, roles: ['member'] });
        });

        it('marks the cookie Secure outside local environments', async () => {
            const secureApp = await buildTestApp(h, 'production');
            try {
                const res = await secureApp.inject({ method: 'POST', url: '/auth/register', payload: REGISTER_BODY });
                expect(refreshCookie(res)?.secure).toBe(true);
            } finally {
                await secureApp.close();
            }
        });

        it('answers a duplicate email with 409', async () => {
            await register();
            const res = await register();
            expect(res.statusCode).toBe(409);
            expect(res.json()).toEqual({ error: 'Conflict', message: 'Email already exists', code: 'EMAIL_EXISTS' });
        });

        it('answers field validation failures with 400', async () => {
            const res = await register({ ...REGISTER_BODY, email: 'not-an-email' });
            expect(res.statusCode).toBe(400);
            expect(res.json()).toEqual({ error: 'Bad Request', message: 'Invalid email format', code: 'INVALID_EMAIL' });
        });

        it('answers malformed JSON with 400', async () => {
            const res = await app.inject({
                method: 'POST',
                url: '/auth/register',
                headers: { 'content-type': 'application/json' },
                payload: '{"email": ',
            });
            expect(res.statusCode).toBe(400);
            expect(res.json()).toEqual({ error: 'Bad Request', message: 'Invalid request body' });
        });

        it('answers a body of the wrong shape with 400', async () => {
            const res = await register({ email: 42, password: 'passw0rd!', name: { 'en-US': 'A' } });
            expect(res.statusCode).toBe(400);
            expect(res.json()).toEqual({ error: 'Bad Request', message: 'Invalid request body' });
        });
    });

    describe('POST /auth/login', () => {
        it('logs in and sets a fresh cookie', async () => {
            const registered = await register();
            const res = await app.inject({
                method: 'POST',
                url: '/auth/login',
                payload: { login_id: 'a@x.io', password: 'passw0rd!' },
            });
            expect(res.statusCode).toBe(200);
            expect(res.json().user.email).toBe('a@x.io');
            expect(refreshValue(res)).not.toBe(refreshValue(registered));
        });

        it('gives the same answer for a wrong password and an unknown user', async () => {
            await register();
            const wrong = await app.inject({
                method: 'POST',
                url: '/auth/login',
                payload: { login_id: 'a@x.io', password: 'not-the-password' },
            });
            const unknown = await app.inject({
                method: 'POST',
                url: '/auth/login',
                payload: { login_id: 'b@x.io', password: 'passw0rd!' },
            });

            const expected = { error: 'Unauthorized', message: 'Invalid credentials', code: 'INVALID_CREDENTIALS' };
            expect(wrong.statusCode).toBe(401);
            expect(wrong.json()).toEqual(expected);
            expect(unknown.statusCode).toBe(401);
            expect(unknown.json()).toEqual(expected);
        });
    });

    describe('POST /auth/refresh', () => {
        it('rotates the cookie, and a replayed cookie revokes the whole lineage', async () => {
            const c0 = refreshValue(await register());

            const first = await refresh(c0);
            expect(first.statusCode).toBe(200);
            expect(first.json()).toMatchObject({ token_type: 'Bearer', expires_in: 900 });
            const c1 = refreshValue(first);
            expect(c1).not.toBe(c0);

            const replay = await refresh(c0);
            expect(replay.statusCode).toBe(401);
            expect(replay.json()).toEqual({
                error: 'Unauthorized',
                message: 'Token has been revoked. Please login again.',
                code: 'TOKEN_REVOKED',
            });
            expect(refreshValue(replay)).toBe('');

            const successor = await refresh(c1);
            expect(successor.statusCode).toBe(401);
            expect(successor.json().code).toBe('TOKEN_REVOKED');
        });

        it('requires the cookie', async () => {
            const res = await app.inject({ method: 'POST', url: '/auth/refresh' });
            expect(res.statusCode).toBe(401);
            expect(res.json()).toEqual({ error: 'Unauthorized', message: 'Refresh token not found' });
        });

        it('clears an unknown cookie', async () => {
            const res = await refresh('forged-value');
            expect(res.statusCode).toBe(401);
            expect(res.json().code).toBe('INVALID_TOKEN');
            expect(refreshValue(res)).toBe('');
        });

        it('reports an expired cookie', async () => {
            const c0 = refreshValue(await register());
            h.clock.advance(7 * 24 * 60 * 60 + 1);

            const res = await refresh(c0);
            expect(res.statusCode).toBe(401);
            expect(res.json()).toEqual({
                error: 'Unauthorized',
                message: 'Refresh token has expired. Please login again.',
                code: 'TOKEN_EXPIRED',
            });
        });
    });

    describe('logout', () => {
        it('revokes the presented cookie and clears it', async () => {
            const c0 = refreshValue(await register());

            const res = await app.inject({ method: 'POST', url: '/auth/logout', cookies: { refresh_token: c0 } });
            expect(res.statusCode).toBe(200);
            expect(res.json()).toEqual({ message: 'Logged out successfully' });
            expect(refreshValue(res)).toBe('');

            expect((await refresh(c0)).json().code).toBe('TOKEN_REVOKED');
        });

        it('succeeds without a cookie', async () => {
            const res = await app.inject({ method: 'POST', url: '/auth/logout' });
            expect(res.statusCode).toBe(200);
            expect(res.json()).toEqual({ message: 'Logged out successfully' });
        });

        it('succeeds when revocation fails', async () => {
            const c0 = refreshValue(await register());
            vi.spyOn(h.store, 'revokeToken').mockRejectedValue(new Error('store offline'));

            const res = await app.inject({ method: 'POST', url: '/auth/logout', cookies: { refresh_token: c0 } });
            expect(res.statusCode).toBe(200);
        });

        it('logout-all revokes every session of the caller', async () => {
            const registered = await register();
            const c0 = refreshValue(registered);
            const login = await app.inject({
                method: 'POST',
                url: '/auth/login',
                payload: { login_id: 'a@x.io', password: 'passw0rd!' },
            });
            const c1 = refreshValue(login);

            const res = await app.inject({
                method: 'POST',
                url: '/auth/logout-all',
                headers: { authorization: `Bearer ${registered.json().tokens.access_token}` },
            });
            expect(res.statusCode).toBe(200);
            expect(res.json()).toEqual({ message: 'Logged out from all devices successfully' });

            expect((await refresh(c0)).statusCode).toBe(401);
            expect((await refresh(c1)).statusCode).toBe(401);
        });

        it('logout-all requires authentication', async () => {
            const res = await app.inject({ method: 'POST', url: '/auth/logout-all' });
            expect(res.statusCode).toBe(401);
        });
    });

    describe('GET /auth/me', () => {
        it('answers 404 for a user deleted after the token was issued', async () => {
            const registered = await register();
            const user = await h.store.findUserByEmail('a@x.io');
            h.store.softDeleteUser(user?.id ?? 0);

            const res = await app.inject({
                method: 'GET',
                url: '/auth/me',
                headers: { authorization: `Bearer ${registered.json().tokens.access_token}` },
            });
            expect(res.statusCode).toBe(404);
            expect(res.json()).toEqual({ error: 'Not Found', message: 'User not found', code: 'USER_NOT_FOUND' });
        });
    });

    describe('authorization', () => {
        it('enforces the permission table on guarded routes', async () => {
            h.store.addPermissionRule('GET', '/users', ['admin', 'user']);
            h.store.addPermissionRule('POST', '/users', ['admin']);
            await h.permissionTable.load();

            expect((await app.inject({ method: 'GET', url: '/users', headers: asRoles(['user']) })).statusCode).toBe(200);
            expect((await app.inject({ method: 'POST', url: '/users', headers: asRoles(['user']) })).statusCode).toBe(403);
            expect(
                (await app.inject({ method: 'POST', url: '/users', headers: asRoles(['full_access']) })).statusCode
            ).toBe(200);
            expect((await app.inject({ method: 'GET', url: '/unknown' })).statusCode).toBe(200);
        });

        it('picks up new rules after an admin refresh', async () => {
            expect((await app.inject({ method: 'GET', url: '/users', headers: asRoles(['user']) })).statusCode).toBe(200);

            h.store.addPermissionRule('GET', '/users', ['admin']);
            const reload = await app.inject({
                method: 'POST',
                url: '/admin/refresh-permissions',
                headers: asRoles(['full_access']),
            });
            expect(reload.statusCode).toBe(200);
            expect(reload.json()).toEqual({ message: 'Permissions refreshed successfully' });

            const res = await app.inject({ method: 'GET', url: '/users', headers: asRoles(['user']) });
            expect(res.statusCode).toBe(403);
            expect(res.json()).toEqual({ error: 'Forbidden', message: 'Access denied: insufficient permissions' });
        });

        it('keeps the refresh endpoint to full_access holders', async () => {
            const res = await app.inject({ method: 'POST', url: '/admin/refresh-permissions', headers: asRoles(['admin']) });
            expect(res.statusCode).toBe(403);
            expect(res.json()).toEqual({ error: 'Forbidden', message: 'Insufficient permissions' });
        });

        it('hides reload failures behind a generic 500', async () => {
            vi.spyOn(h.store, 'listPermissionRules').mockRejectedValue(new Error('relation "api_permissions" does not exist'));

            const res = await app.inject({
                method: 'POST',
                url: '/admin/refresh-permissions',
                headers: asRoles(['full_access']),
            });
            expect(res.statusCode).toBe(500);
            expect(res.json()).toEqual({ error: 'Internal Server Error', message: 'Failed to refresh permissions' });
        });
    });

    it('reports health', async () => {
        h.store.addPermissionRule('GET', '/users', ['admin']);
        await h.permissionTable.load();

        const res = await app.inject({ method: 'GET', url: '/health' });
        expect(res.statusCode).toBe(200);
        expect(res.json()).toMatchObject({ status: 'ok', identityStore: 'memory', permissionRules: 1 });
    });
});
