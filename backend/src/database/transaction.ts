import type { Pool, PoolClient } from 'pg';

// run fn inside BEGIN/COMMIT on a dedicated client; rollback on any error
export async function withTransaction<T>(
    pool: Pool,
    fn: (client: PoolClient) => Promise<T>
): Promise<T> {
    const client = await pool.connect();
    try {
        await client.query('BEGIN');
        const result = await fn(client);
        await client.query('COMMIT');
        return result;
    } catch (err) {
        await client.query('ROLLBACK');
        throw err;
    } finally {
        client.release();
    }
}
