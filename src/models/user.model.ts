import type { Database, Row } from '../db/database.js';
import { readDate, readNumber, readString } from '../db/rows.js';
import { type Role, type User, type UserRecord, isRole } from '../types/models.js';

const USER_COLUMNS = 'id, username, password, role, created_at';

function toUserRecord(row: Row): UserRecord {
    const role = row.role;
    if (!isRole(role)) {
        throw new Error(`Unknown role on user row: ${String(role)}`);
    }
    return {
        id: readNumber(row, 'id'),
        username: readString(row, 'username'),
        password: readString(row, 'password'),
        role,
        created_at: readDate(row, 'created_at'),
    };
}

// strip the hash before anything leaves the model layer
export function toPublicUser({ password: _password, ...user }: UserRecord): User {
    return user;
}

export class UserModel {
    constructor(private db: Database) {}

    async create(username: string, passwordHash: string, role: Role): Promise<User> {
        const query = `
            INSERT INTO users (username, password, role, created_at)
            VALUES ($1, $2, $3, $4)
            RETURNING ${USER_COLUMNS}
        `;
        const rows = await this.db.query(query, [username, passwordHash, role, new Date().toISOString()]);

        if (rows.length === 0) {
            throw new Error('User INSERT failed');
        }
        return toPublicUser(toUserRecord(rows[0]));
    }

    // includes the hash: only for credential checks
    async findRecordByUsername(username: string): Promise<UserRecord | null> {
        const rows = await this.db.query(
            `SELECT ${USER_COLUMNS} FROM users WHERE username = $1`,
            [username]
        );
        return rows.length > 0 ? toUserRecord(rows[0]) : null;
    }

    async findByUsername(username: string): Promise<User | null> {
        const record = await this.findRecordByUsername(username);
        return record ? toPublicUser(record) : null;
    }

    async findById(id: number): Promise<User | null> {
        const rows = await this.db.query(
            `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
            [id]
        );
        return rows.length > 0 ? toPublicUser(toUserRecord(rows[0])) : null;
    }
}
