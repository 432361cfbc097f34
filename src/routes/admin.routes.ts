import type { FastifyInstance, preHandlerAsyncHookHandler } from 'fastify';
import type { PermissionTable } from '../services/rbac/permission-table';
import { respondInternalError } from '../utils/http';

export interface AdminRoutesOptions {
    permissionTable: PermissionTable;
    /** authenticate + requireRoles(['full_access']) */
    adminGuard: preHandlerAsyncHookHandler[];
}

export async function adminRoutes(fastify: FastifyInstance, opts: AdminRoutesOptions) {
    const { permissionTable, adminGuard } = opts;

    // ─── Reload the permission table from the store ───
    fastify.post('/admin/refresh-permissions', { preHandler: adminGuard }, async (request, reply) => {
        try {
            await permissionTable.load(request.abortSignal);
        } catch (err) {
            return respondInternalError(request, reply, err, 'Failed to refresh permissions');
        }
        return { message: 'Permissions refreshed successfully' };
    });
}
