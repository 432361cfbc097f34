import type { FastifyReply, FastifyRequest } from 'fastify';
import type { TokenAuthority } from '../services/auth/token-authority';
import type { AccessTokenClaims, AuthUser } from '../types/auth';
import { respondError } from '../utils/http';
import { logger } from '../utils/logger';

// Extend Fastify request with auth user and a per-request cancellation signal
declare module 'fastify' {
    interface FastifyRequest {
        authUser?: AuthUser;
        abortSignal?: AbortSignal;
    }
}

type BearerToken = { ok: true; token: string } | { ok: false; reason: 'missing' | 'malformed' };

function readBearer(header: string | undefined): BearerToken {
    if (!header) return { ok: false, reason: 'missing' };
    const space = header.indexOf(' ');
    if (space === -1) return { ok: false, reason: 'malformed' };
    const scheme = header.slice(0, space);
    const token = header.slice(space + 1);
    // an empty token is left to fail validation
    if (scheme.toLowerCase() !== 'bearer') return { ok: false, reason: 'malformed' };
    return { ok: true, token };
}

function bind(request: FastifyRequest, claims: AccessTokenClaims): void {
    request.authUser = {
        id: claims.user_id,
        roles: claims.roles,
        claims,
    };
}

export interface AuthMiddleware {
    authenticate(request: FastifyRequest, reply: FastifyReply): Promise<void>;
    optionalAuthenticate(request: FastifyRequest, reply: FastifyReply): Promise<void>;
}

/**
 * Fastify preHandler hooks verifying the JWT access token in the Authorization header.
 * On success, `request.authUser` carries the user's public id, roles and claims.
 */
export function createAuthMiddleware(tokens: TokenAuthority): AuthMiddleware {
    return {
        async authenticate(request, reply) {
            const bearer = readBearer(request.headers.authorization);
            if (!bearer.ok) {
                const message =
                    bearer.reason === 'missing' ? 'Authorization header required' : 'Invalid authorization header format';
                respondError(reply, 401, 'Unauthorized', message);
                return;
            }

            let claims: AccessTokenClaims;
            try {
                claims = tokens.validateAccessToken(bearer.token);
            } catch (err) {
                logger.debug({ err: err instanceof Error ? err.message : err }, 'JWT verification failed');
                respondError(reply, 401, 'Unauthorized', 'Invalid or expired token');
                return;
            }
            bind(request, claims);
        },

        // Same as authenticate, but anonymous requests pass through untouched
        async optionalAuthenticate(request) {
            const bearer = readBearer(request.headers.authorization);
            if (!bearer.ok) return;
            try {
                bind(request, tokens.validateAccessToken(bearer.token));
            } catch (err) {
                logger.debug({ err: err instanceof Error ? err.message : err }, 'Ignoring invalid optional token');
            }
        },
    };
}

export function getUserRoles(request: FastifyRequest): string[] {
    return request.authUser?.roles ?? [];
}

export function hasRole(request: FastifyRequest, role: string): boolean {
    return getUserRoles(request).includes(role);
}
