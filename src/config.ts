import path from 'path';

/**========================================================================
 * *                         APPLICATION CONFIG
 *
 *   - resolved once at startup from an env record and passed to buildApp
 *   - nothing below the composition root reads process.env
 *========================================================================**/

export type DatabaseConfig =
    | { kind: 'postgres'; connectionString: string }
    | { kind: 'sqlite'; filename: string };

export type StorageConfig =
    | { kind: 'azure'; connectionString: string; container: string }
    | { kind: 'local'; directory: string };

export interface AppConfig {
    port: number;
    host: string;
    logLevel: string;
    secretKey: string;
    bcryptRounds: number;
    database: DatabaseConfig;
    storage: StorageConfig;
}

type Env = Record<string, string | undefined>;

const DEFAULT_SQLITE_PATH = path.join('instance', 'app.db');
const DEFAULT_UPLOAD_DIR = path.join('static', 'uploads');

// "Server=x;Database=y;Port=5432;User Id=u;Password=p" -> postgresql url
// anything that doesn't carry the expected keys is returned as-is
export function parseAzurePgConnectionString(conn: string): string {
    const parts = new Map<string, string>();
    for (const segment of conn.split(';')) {
        const idx = segment.indexOf('=');
        if (idx === -1) continue;
        parts.set(segment.slice(0, idx).trim(), segment.slice(idx + 1).trim());
    }

    const user = parts.get('User Id');
    const password = parts.get('Password');
    const server = parts.get('Server');
    const database = parts.get('Database');
    if (!user || password === undefined || !server || !database) {
        return conn;
    }

    const port = parts.get('Port') || '5432';
    return `postgresql://${encodeURIComponent(user)}:${encodeURIComponent(password)}`
        + `@${server}:${port}/${database}?sslmode=require`;
}

// explicit url -> azure postgres connection string -> sqlite file
export function resolveDatabase(env: Env): DatabaseConfig {
    const explicit = env.DATABASE_URL?.trim();
    if (explicit) {
        if (explicit.startsWith('sqlite:')) {
            // sqlite:///abs/path, sqlite://rel/path and sqlite::memory: all accepted
            const filename = explicit.replace(/^sqlite:(\/\/)?/, '');
            return { kind: 'sqlite', filename: filename || DEFAULT_SQLITE_PATH };
        }
        return { kind: 'postgres', connectionString: explicit };
    }

    const azure = env.AZURE_POSTGRESQL_CONNECTIONSTRING?.trim();
    if (azure) {
        return { kind: 'postgres', connectionString: parseAzurePgConnectionString(azure) };
    }

    return { kind: 'sqlite', filename: env.SQLITE_PATH || DEFAULT_SQLITE_PATH };
}

export function resolveStorage(env: Env): StorageConfig {
    const connectionString = env.AZURE_STORAGE_CONNECTION_STRING?.trim();
    const container = env.AZURE_CONTAINER_NAME?.trim();
    if (connectionString && container) {
        return { kind: 'azure', connectionString, container };
    }
    return { kind: 'local', directory: path.resolve(env.UPLOAD_DIR || DEFAULT_UPLOAD_DIR) };
}

function parseInteger(value: string | undefined, fallback: number, name: string): number {
    if (value === undefined || value === '') return fallback;
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new Error(`Invalid integer for ${name}: ${value}`);
    }
    return parsed;
}

export function loadConfig(env: Env = process.env): AppConfig {
    return {
        port: parseInteger(env.PORT, 5000, 'PORT'),
        host: env.HOST || '0.0.0.0',
        logLevel: env.LOG_LEVEL || 'info',
        secretKey: env.SECRET_KEY || 'super-secret-key',
        bcryptRounds: parseInteger(env.BCRYPT_ROUNDS, 12, 'BCRYPT_ROUNDS'),
        database: resolveDatabase(env),
        storage: resolveStorage(env),
    };
}
