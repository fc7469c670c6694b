import fp from 'fastify-plugin';
import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import { Pool } from 'pg';

type PoolPluginOptions = {
    connectionString: string;
    retries?: number;
};

// wait to connect to postgres
async function waitForDb(pool: Pool, log: FastifyBaseLogger, retries: number) {
    while (retries--) {
        try {
            await pool.query('SELECT 1');
            return;
        } catch (err) {
            log.warn({ err }, `Database not ready yet, retrying... [${retries} attempts left]`);
            await new Promise(r => setTimeout(r, 1000));
        }
    }
    throw new Error('Database not ready');
}

// create pool and add to fastify instance
export default fp<PoolPluginOptions>(async function connectDb(app: FastifyInstance, opts) {
    const pool = new Pool({ connectionString: opts.connectionString });

    await waitForDb(pool, app.log, opts.retries ?? 30);
    app.log.info('connected to database');

    app.decorate('db', pool);

    app.addHook('onClose', async () => {
        await pool.end();
    });
});
