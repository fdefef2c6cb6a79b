import { Pool } from 'pg';
import type { FastifyBaseLogger } from 'fastify';
import type { Database, QueryParam, Row } from './database.js';

export class PostgresDatabase implements Database {
    readonly dialect = 'postgres';

    constructor(private pool: Pool) {}

    static fromConnectionString(connectionString: string): PostgresDatabase {
        return new PostgresDatabase(new Pool({ connectionString }));
    }

    async query(text: string, params: QueryParam[] = []): Promise<Row[]> {
        const result = await this.pool.query<Row>(text, params);
        return result.rows;
    }

    // wait for postgres to accept connections before serving
    async waitUntilReady(log: FastifyBaseLogger, retries = 30): Promise<void> {
        while (retries--) {
            try {
                await this.pool.query('SELECT 1');
                return;
            } catch (err) {
                log.warn({ err }, `Database not ready yet, retrying... [${retries} attempts left]`);
                await new Promise(resolve => setTimeout(resolve, 1000));
            }
        }
        throw new Error('Database not ready');
    }

    async close(): Promise<void> {
        await this.pool.end();
    }
}
