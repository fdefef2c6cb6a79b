import type { Database, Row } from '../db/database.js';
import { readDate, readNumber, readString } from '../db/rows.js';
import type { Comment, CommentPayload } from '../types/models.js';

function toComment(row: Row): Comment {
    return {
        id: readNumber(row, 'id'),
        text: readString(row, 'text'),
        user_id: readNumber(row, 'user_id'),
        photo_id: readNumber(row, 'photo_id'),
        created_at: readDate(row, 'created_at'),
    };
}

export class CommentModel {
    constructor(private db: Database) {}

    // callers pass text that already went through the moderator
    async create(user_id: number, photo_id: number, text: string): Promise<Comment> {
        const rows = await this.db.query(
            `INSERT INTO comments (text, user_id, photo_id, created_at)
             VALUES ($1, $2, $3, $4)
             RETURNING id, text, user_id, photo_id, created_at`,
            [text, user_id, photo_id, new Date().toISOString()]
        );

        if (rows.length === 0) {
            throw new Error('Comment INSERT failed');
        }
        return toComment(rows[0]);
    }

    async findByPhoto(photo_id: number): Promise<CommentPayload[]> {
        const rows = await this.db.query(
            `SELECT c.id, c.text, c.user_id, c.photo_id, c.created_at, u.username
             FROM comments c
             JOIN users u ON u.id = c.user_id
             WHERE c.photo_id = $1
             ORDER BY c.created_at ASC, c.id ASC`,
            [photo_id]
        );
        return rows.map(row => ({ ...toComment(row), username: readString(row, 'username') }));
    }
}
