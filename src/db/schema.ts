import type { Database, Dialect } from './database.js';

/**========================================================================
 **                              SCHEMA
 *? created on startup if missing; one statement per entry since
 *? sqlite prepares a single statement at a time
 *========================================================================**/

function idColumn(dialect: Dialect): string {
    return dialect === 'postgres'
        ? 'SERIAL PRIMARY KEY'
        : 'INTEGER PRIMARY KEY AUTOINCREMENT';
}

function timestampType(dialect: Dialect): string {
    return dialect === 'postgres' ? 'TIMESTAMPTZ' : 'TEXT';
}

export function schemaStatements(dialect: Dialect): string[] {
    const id = idColumn(dialect);
    const ts = timestampType(dialect);

    return [
        `CREATE TABLE IF NOT EXISTS users (
            id ${id},
            username VARCHAR(80) NOT NULL UNIQUE,
            password VARCHAR(255) NOT NULL,
            role VARCHAR(20) NOT NULL DEFAULT 'consumer',
            created_at ${ts} NOT NULL
        )`,
        `CREATE TABLE IF NOT EXISTS photos (
            id ${id},
            user_id INTEGER NOT NULL REFERENCES users(id),
            file_url TEXT NOT NULL,
            title VARCHAR(200) NOT NULL,
            caption TEXT,
            location VARCHAR(200),
            people_present TEXT,
            auto_tags VARCHAR(200),
            uploaded_at ${ts} NOT NULL
        )`,
        `CREATE INDEX IF NOT EXISTS photos_user_id_idx ON photos (user_id)`,
        `CREATE INDEX IF NOT EXISTS photos_uploaded_at_idx ON photos (uploaded_at)`,
        // one row per (user, photo): the toggle relies on this constraint
        `CREATE TABLE IF NOT EXISTS likes (
            id ${id},
            user_id INTEGER NOT NULL REFERENCES users(id),
            photo_id INTEGER NOT NULL REFERENCES photos(id),
            created_at ${ts} NOT NULL,
            UNIQUE (user_id, photo_id)
        )`,
        `CREATE TABLE IF NOT EXISTS saves (
            id ${id},
            user_id INTEGER NOT NULL REFERENCES users(id),
            photo_id INTEGER NOT NULL REFERENCES photos(id),
            created_at ${ts} NOT NULL,
            UNIQUE (user_id, photo_id)
        )`,
        `CREATE TABLE IF NOT EXISTS comments (
            id ${id},
            text TEXT NOT NULL,
            user_id INTEGER NOT NULL REFERENCES users(id),
            photo_id INTEGER NOT NULL REFERENCES photos(id),
            created_at ${ts} NOT NULL
        )`,
        `CREATE INDEX IF NOT EXISTS comments_photo_id_idx ON comments (photo_id)`,
    ];
}

export async function migrate(db: Database): Promise<void> {
    for (const statement of schemaStatements(db.dialect)) {
        await db.query(statement);
    }
}
