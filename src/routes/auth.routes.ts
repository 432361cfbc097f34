import type { FastifyInstance, FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from 'fastify';
import { z } from 'zod';
import type { AuthService } from '../services/auth/auth.service';
import { isAuthError } from '../services/auth/errors';
import { REFRESH_TOKEN_TTL_SECONDS } from '../services/auth/token-authority';
import type { ClientMeta } from '../types/auth';
import { getClientIp } from '../utils/client-ip';
import { respondAuthError, respondError, respondInternalError } from '../utils/http';
import { logger } from '../utils/logger';

// ─── Validation Schemas ───

// Field rules live in AuthService; these only establish the body's shape
const registerSchema = z.object({
    email: z.string().default(''),
    password: z.string().default(''),
    name: z.unknown(),
    login_id: z.string().nullish(),
});

const loginSchema = z.object({
    login_id: z.string().default(''),
    password: z.string().default(''),
});

export const REFRESH_COOKIE = 'refresh_token';
export const REFRESH_COOKIE_PATH = '/api/auth';

export interface AuthRoutesOptions {
    authService: AuthService;
    /** Protected routes run these after the request is authenticated */
    guard: preHandlerAsyncHookHandler[];
    /** Secure attribute on the refresh cookie; off only for local development */
    secureCookies: boolean;
}

function clientMeta(request: FastifyRequest): ClientMeta {
    return {
        clientIp: getClientIp(request.headers, request.socket.remoteAddress),
        userAgent: request.headers['user-agent'] ?? '',
    };
}

export async function authRoutes(fastify: FastifyInstance, opts: AuthRoutesOptions) {
    const { authService, guard, secureCookies } = opts;

    function setRefreshCookie(reply: FastifyReply, token: string) {
        reply.setCookie(REFRESH_COOKIE, token, {
            httpOnly: true,
            secure: secureCookies,
            sameSite: 'strict',
            path: REFRESH_COOKIE_PATH,
            maxAge: REFRESH_TOKEN_TTL_SECONDS,
            expires: new Date(Date.now() + REFRESH_TOKEN_TTL_SECONDS * 1000),
        });
    }

    function clearRefreshCookie(reply: FastifyReply) {
        reply.setCookie(REFRESH_COOKIE, '', {
            httpOnly: true,
            secure: secureCookies,
            sameSite: 'strict',
            path: REFRESH_COOKIE_PATH,
            maxAge: -1,
            expires: new Date(0),
        });
    }

    // ─── POST /auth/register ───
    fastify.post('/auth/register', async (request, reply) => {
        const parsed = registerSchema.safeParse(request.body);
        if (!parsed.success) {
            return respondError(reply, 400, 'Bad Request', 'Invalid request body');
        }

        try {
            const { result, refreshToken } = await authService.register(
                parsed.data,
                clientMeta(request),
                request.abortSignal
            );
            setRefreshCookie(reply, refreshToken);
            return reply.code(201).send(result);
        } catch (err) {
            if (isAuthError(err)) return respondAuthError(request, reply, err);
            return respondInternalError(request, reply, err, 'Failed to register user');
        }
    });

    // ─── POST /auth/login ───
    fastify.post('/auth/login', async (request, reply) => {
        const parsed = loginSchema.safeParse(request.body);
        if (!parsed.success) {
            return respondError(reply, 400, 'Bad Request', 'Invalid request body');
        }

        try {
            const { result, refreshToken } = await authService.login(parsed.data, clientMeta(request), request.abortSignal);
            setRefreshCookie(reply, refreshToken);
            return result;
        } catch (err) {
            if (isAuthError(err, 'INVALID_CREDENTIALS')) return respondAuthError(request, reply, err);
            return respondInternalError(request, reply, err, 'Failed to login');
        }
    });

    // ─── POST /auth/refresh ───
    fastify.post('/auth/refresh', async (request, reply) => {
        const refreshToken = request.cookies[REFRESH_COOKIE];
        if (!refreshToken) {
            return respondError(reply, 401, 'Unauthorized', 'Refresh token not found');
        }

        try {
            const rotated = await authService.refresh(refreshToken, clientMeta(request), request.abortSignal);
            setRefreshCookie(reply, rotated.refreshToken);
            return rotated.result;
        } catch (err) {
            if (isAuthError(err, 'INVALID_TOKEN', 'TOKEN_REVOKED', 'TOKEN_EXPIRED')) {
                // Clear the bad cookie
                clearRefreshCookie(reply);
                return respondAuthError(request, reply, err);
            }
            return respondInternalError(request, reply, err, 'Failed to refresh token');
        }
    });

    // ─── POST /auth/logout ───
    fastify.post('/auth/logout', async (request, reply) => {
        const refreshToken = request.cookies[REFRESH_COOKIE];
        if (refreshToken) {
            try {
                await authService.logout(refreshToken, request.abortSignal);
            } catch (err) {
                // Logging out is best effort; the cookie goes either way
                logger.warn({ err }, 'Failed to revoke refresh token on logout');
            }
        }
        clearRefreshCookie(reply);
        return { message: 'Logged out successfully' };
    });

    // ─── POST /auth/logout-all ───
    fastify.post('/auth/logout-all', { preHandler: guard }, async (request, reply) => {
        const userId = request.authUser?.id;
        if (!userId) {
            return respondError(reply, 401, 'Unauthorized', 'User not authenticated');
        }

        try {
            await authService.logoutAll(userId, request.abortSignal);
        } catch (err) {
            if (isAuthError(err)) return respondAuthError(request, reply, err);
            return respondInternalError(request, reply, err, 'Failed to logout from all devices');
        }
        clearRefreshCookie(reply);
        return { message: 'Logged out from all devices successfully' };
    });

    // ─── GET /auth/me ───
    fastify.get('/auth/me', { preHandler: guard }, async (request, reply) => {
        const userId = request.authUser?.id;
        if (!userId) {
            return respondError(reply, 401, 'Unauthorized', 'User not authenticated');
        }

        try {
            return await authService.getMe(userId, request.abortSignal);
        } catch (err) {
            if (isAuthError(err)) return respondAuthError(request, reply, err);
            return respondInternalError(request, reply, err, 'Failed to retrieve user information');
        }
    });
}
