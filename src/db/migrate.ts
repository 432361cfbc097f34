import 'dotenv/config';
import { readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { closePool, getPool, transaction } from './index';
import { logger } from '../utils/logger';

async function migrate() {
    const pool = getPool();
    const migrationsDir = join(__dirname, 'migrations');
    const files = readdirSync(migrationsDir)
        .filter((f) => f.endsWith('.sql'))
        .sort(); // lexicographic sort ensures 001 < 002 < 003...

    logger.info(`Found ${files.length} migration files`);

    await pool.query(`
        CREATE TABLE IF NOT EXISTS migrations_history (
            id SERIAL PRIMARY KEY,
            filename VARCHAR(255) UNIQUE NOT NULL,
            applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
        );
    `);

    for (const file of files) {
        const sql = readFileSync(join(migrationsDir, file), 'utf-8');

        const { rows } = await pool.query('SELECT id FROM migrations_history WHERE filename = $1', [file]);
        if (rows.length > 0) {
            logger.info(`${file}: already applied, skipping`);
            continue;
        }

        try {
            // The migration and its history row commit together
            await transaction(async (client) => {
                await client.query(sql);
                await client.query('INSERT INTO migrations_history (filename) VALUES ($1)', [file]);
            });
        } catch (err) {
            logger.error({ err, file }, `${file}: failed, transaction rolled back`);
            throw err;
        }

        logger.info(`${file}: applied`);
    }

    logger.info('All migrations complete');
}

migrate()
    .then(() => closePool())
    .catch(async (err) => {
        logger.error({ err }, 'Migration error');
        await closePool();
        process.exit(1);
    });
