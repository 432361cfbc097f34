import type { FastifyReply, FastifyRequest } from 'fastify';
import type { PermissionTable } from '../services/rbac/permission-table';
import { FULL_ACCESS_ROLE } from '../types/auth';
import { respondError } from '../utils/http';
import { getUserRoles, hasRole } from './auth.middleware';

/**
 * Routes without a rule are admitted (open by default). Returning false here
 * turns the gate into deny-by-default.
 */
export function isAdmittedWhenUnlisted(): boolean {
    return true;
}

/**
 * Registered route template in permission-table form: Fastify's `:id`
 * (with any inline regex) becomes `{id}`. Falls back to the raw path when
 * the request matched no route.
 */
export function routePattern(request: FastifyRequest): string {
    const url = request.routeOptions.url ?? request.url.split('?')[0] ?? '/';
    return url.replace(/:([A-Za-z0-9_]+)(\([^)]*\))?/g, '{$1}');
}

/** HEAD is answered by the GET handler, so it is gated by the GET rule */
export function permissionMethod(request: FastifyRequest): string {
    return request.method === 'HEAD' ? 'GET' : request.method;
}

/**
 * Fastify preHandler enforcing the permission table. Must run AFTER
 * `authenticate` (or `optionalAuthenticate`) so `request.authUser` is bound.
 *
 * @example
 *   fastify.get('/users/:id', {
 *     preHandler: [gate.authenticate, authorize],
 *   }, handler);
 */
export function createAuthorize(table: PermissionTable) {
    return async function authorize(request: FastifyRequest, reply: FastifyReply): Promise<void> {
        // System administrators are never gated
        if (hasRole(request, FULL_ACCESS_ROLE)) return;

        const userRoles = getUserRoles(request);
        const requiredRoles = table.getRequiredRoles(permissionMethod(request), routePattern(request));
        if (requiredRoles === undefined) {
            if (!isAdmittedWhenUnlisted()) {
                respondError(reply, 403, 'Forbidden', 'Access denied: route is not listed');
            }
            return;
        }

        if (userRoles.length === 0) {
            respondError(reply, 403, 'Forbidden', 'Access denied: authentication required');
            return;
        }

        if (!requiredRoles.some((role) => userRoles.includes(role))) {
            respondError(reply, 403, 'Forbidden', 'Access denied: insufficient permissions');
        }
    };
}

/**
 * Static filter: the caller needs at least one of `roles`.
 * Must be used AFTER `authenticate`.
 *
 * @example
 *   fastify.post('/admin/refresh-permissions', {
 *     preHandler: [gate.authenticate, requireRoles(['full_access'])],
 *   }, handler);
 */
export function requireRoles(roles: string[]) {
    return async function (request: FastifyRequest, reply: FastifyReply): Promise<void> {
        const userRoles = getUserRoles(request);
        if (userRoles.length === 0) {
            respondError(reply, 403, 'Forbidden', 'Access denied');
            return;
        }
        if (!roles.some((role) => userRoles.includes(role))) {
            respondError(reply, 403, 'Forbidden', 'Insufficient permissions');
        }
    };
}

/** Static filter: the caller needs every one of `roles`. */
export function requireAllRoles(roles: string[]) {
    return async function (request: FastifyRequest, reply: FastifyReply): Promise<void> {
        const userRoles = new Set(getUserRoles(request));
        if (userRoles.size === 0) {
            respondError(reply, 403, 'Forbidden', 'Access denied');
            return;
        }
        if (!roles.every((role) => userRoles.has(role))) {
            respondError(reply, 403, 'Forbidden', 'Insufficient permissions');
        }
    };
}
