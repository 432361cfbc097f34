import { buildApp } from './app';
import { config } from './config';
import { closePool } from './db';
import { AuthService } from './services/auth/auth.service';
import { CredentialVault } from './services/auth/credential-vault';
import { TokenAuthority } from './services/auth/token-authority';
import { createIdentityStore } from './services/identity';
import { PermissionTable } from './services/rbac/permission-table';
import { logger } from './utils/logger';

async function main() {
    // ─── Initialize Services ───
    logger.info({ identityStore: config.identityStore }, 'Initializing services...');

    const store = createIdentityStore(config);
    const vault = new CredentialVault({ concurrency: config.hashConcurrency });
    const tokens = new TokenAuthority(store, vault, { secret: config.jwtSecret });
    const authService = new AuthService(store, vault, tokens);
    const permissionTable = new PermissionTable(store);

    try {
        await permissionTable.load();
    } catch (err) {
        // Serve with an empty table; POST /admin/refresh-permissions can retry
        logger.warn({ err }, 'Failed to load permissions, starting with an empty table');
    }

    const app = await buildApp({ config, store, tokens, authService, permissionTable });

    // ─── Start Server ───
    try {
        await app.listen({ port: config.port, host: config.host });
        logger.info({ port: config.port, env: config.nodeEnv, appEnv: config.appEnv }, 'Server started');
    } catch (err) {
        logger.error({ err }, 'Failed to start server');
        process.exit(1);
    }

    // ─── Graceful Shutdown ───
    const shutdown = async () => {
        logger.info('Shutting down...');
        await app.close();
        await closePool();
        process.exit(0);
    };
    const onSignal = () => {
        shutdown().catch((err) => {
            logger.error({ err }, 'Error during shutdown');
            process.exit(1);
        });
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
}

main().catch((err) => {
    logger.error({ err }, 'Fatal error');
    process.exit(1);
});
