import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { Pool } from 'pg';
import chalk from 'chalk';
import config from '@/config.js';
import { withTransaction } from './transaction.js';

export const migrationsDir = fileURLToPath(new URL('../../migrations/', import.meta.url));

// migration files are applied in filename order: 001_*.sql, 002_*.sql, ...
export function listMigrations(dir = migrationsDir): string[] {
    return fs.readdirSync(dir)
        .filter(file => file.endsWith('.sql'))
        .sort();
}

export async function runMigrations(pool: Pool, dir = migrationsDir): Promise<string[]> {
    await pool.query(`
        CREATE TABLE IF NOT EXISTS schema_migrations (
            name        VARCHAR(255) PRIMARY KEY,
            applied_at  TIMESTAMPTZ NOT NULL DEFAULT now()
        )
    `);

    const result = await pool.query<{ name: string }>('SELECT name FROM schema_migrations');
    const applied = new Set(result.rows.map(row => row.name));
    const newlyApplied: string[] = [];

    for (const migration of listMigrations(dir)) {
        if (applied.has(migration)) continue;

        const sql = fs.readFileSync(path.join(dir, migration), 'utf8');
        await withTransaction(pool, async (client) => {
            await client.query(sql);
            await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [migration]);
        });

        console.log(chalk.green('applied migration:'), migration);
        newlyApplied.push(migration);
    }

    return newlyApplied;
}

// run directly: npm run migrate
const isMainModule = process.argv[1] !== undefined
    && fileURLToPath(import.meta.url) === path.resolve(process.argv[1]);

if (isMainModule) {
    const pool = new Pool({ connectionString: config.DATABASE_URL });

    try {
        const names = await runMigrations(pool);
        console.log(chalk.cyan.bold(`migrations complete (${names.length} applied)`));
    } catch (err) {
        console.error(chalk.red.bold('migration failed:'), err);
        process.exitCode = 1;
    } finally {
        await pool.end();
    }
}
