import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import cookie from '@fastify/cookie';
import type { AppConfig } from './config';
import { createAuthMiddleware } from './middleware/auth.middleware';
import { createAuthorize, requireRoles } from './middleware/rbac.middleware';
import { registerRequestLogging, registerRequestSignal } from './middleware/request-logger';
import { adminRoutes } from './routes/admin.routes';
import { authRoutes } from './routes/auth.routes';
import type { AuthService } from './services/auth/auth.service';
import type { TokenAuthority } from './services/auth/token-authority';
import type { IdentityStore } from './services/identity';
import type { PermissionTable } from './services/rbac/permission-table';
import { FULL_ACCESS_ROLE } from './types/auth';

export interface AppDeps {
    config: Pick<AppConfig, 'appEnv' | 'frontendUrl'>;
    store: IdentityStore;
    tokens: TokenAuthority;
    authService: AuthService;
    permissionTable: PermissionTable;
}

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
    const { config, store, tokens, authService, permissionTable } = deps;

    const app = Fastify({
        logger: false, // We use pino directly
    });

    // ─── Plugins ───
    await app.register(cors, {
        origin: config.frontendUrl
            ? [config.frontendUrl, 'http://localhost:5173'] // production whitelist + local dev
            : true, // dev: allow all origins
        credentials: true,
    });
    await app.register(cookie);

    registerRequestSignal(app);
    registerRequestLogging(app);

    // ─── Gate ───
    const gate = createAuthMiddleware(tokens);
    const authorize = createAuthorize(permissionTable);

    // ─── Register Routes ───
    await app.register(authRoutes, {
        authService,
        guard: [gate.authenticate, authorize],
        secureCookies: config.appEnv !== 'local',
    });
    await app.register(adminRoutes, {
        permissionTable,
        adminGuard: [gate.authenticate, requireRoles([FULL_ACCESS_ROLE])],
    });

    // ─── Health Check ───
    app.get('/health', async () => {
        return {
            status: 'ok',
            timestamp: new Date().toISOString(),
            identityStore: store.name,
            permissionRules: permissionTable.size,
        };
    });

    return app;
}
