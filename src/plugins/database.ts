import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { DatabaseConfig } from '../config.js';
import type { Database } from '../db/database.js';
import { PostgresDatabase } from '../db/postgres.js';
import { SqliteDatabase } from '../db/sqlite.js';
import { migrate } from '../db/schema.js';

export interface DatabasePluginOptions {
    database: DatabaseConfig;
}

// open the configured store, create tables, add to fastify instance
export default fp<DatabasePluginOptions>(async function connectDatabase(app: FastifyInstance, { database }) {
    let db: Database;

    if (database.kind === 'postgres') {
        const pg = PostgresDatabase.fromConnectionString(database.connectionString);
        await pg.waitUntilReady(app.log);
        db = pg;
    } else {
        app.log.info(`SQLite fallback enabled (${database.filename})`);
        db = SqliteDatabase.open(database.filename);
    }

    await migrate(db);
    app.log.info({ dialect: db.dialect }, 'connected to database');

    app.decorate('db', db);

    app.addHook('onClose', async (app) => {
        await app.db.close();
    });
});
