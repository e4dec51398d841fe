import { Pool, PoolClient } from 'pg';

/**
 * Runs a callback inside a database transaction.
 * Commits on success, rolls back and re-throws on error.
 */
export class TransactionManager {
    constructor(private pool: Pool) { }

    /**
     * @example
     * await txManager.run(async (client) => {
     *   await client.query('SELECT ... FOR UPDATE', [id]);
     *   await client.query('UPDATE task_records ...');
     * });
     */
    async run<T>(callback: (client: PoolClient) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();

        try {
            await client.query('BEGIN');
            const result = await callback(client);
            await client.query('COMMIT');
            return result;
        } catch (e) {
            await client.query('ROLLBACK');
            throw e;
        } finally {
            client.release();
        }
    }
}
