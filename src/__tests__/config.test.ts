import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from '../config';

describe('loadConfig', () => {
    it('applies defaults around the required secret', () => {
        const config = loadConfig({ JWT_SECRET: 'test-secret' });
        expect(config).toMatchObject({
            port: 3000,
            host: '0.0.0.0',
            nodeEnv: 'development',
            appEnv: 'production',
            jwtSecret: 'test-secret',
            identityStore: 'postgres',
            hashConcurrency: 2,
        });
        expect(config.logLevel).toBeUndefined();
        expect(config.frontendUrl).toBeUndefined();
    });

    it('reads every variable', () => {
        const config = loadConfig({
            PORT: '8080',
            HOST: '127.0.0.1',
            NODE_ENV: 'production',
            APP_ENV: 'staging',
            LOG_LEVEL: 'warn',
            JWT_SECRET: 'test-secret',
            IDENTITY_STORE: 'memory',
            DATABASE_URL: 'postgresql://user:pass@db:5432/app',
            FRONTEND_URL: 'https://admin.example.com',
            HASH_CONCURRENCY: '4',
        });
        expect(config).toEqual({
            port: 8080,
            host: '127.0.0.1',
            nodeEnv: 'production',
            appEnv: 'staging',
            logLevel: 'warn',
            jwtSecret: 'test-secret',
            identityStore: 'memory',
            databaseUrl: 'postgresql://user:pass@db:5432/app',
            frontendUrl: 'https://admin.example.com',
            hashConcurrency: 4,
        });
    });

    it('refuses to load without a signing secret', () => {
        expect(() => loadConfig({})).toThrow(ZodError);
        expect(() => loadConfig({ JWT_SECRET: '' })).toThrow(ZodError);
    });

    it('rejects an unknown identity store', () => {
        expect(() => loadConfig({ JWT_SECRET: 'test-secret', IDENTITY_STORE: 'ldap' })).toThrow(ZodError);
    });

    it('treats empty variables as unset', () => {
        const config = loadConfig({ JWT_SECRET: 'test-secret', APP_ENV: '', FRONTEND_URL: '' });
        expect(config.appEnv).toBe('production');
        expect(config.frontendUrl).toBeUndefined();
    });
});
