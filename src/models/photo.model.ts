import type { Database, Row } from '../db/database.js';
import { readDate, readNumber, readOptionalString, readString } from '../db/rows.js';
import type { NewPhoto, Photo, PhotoPayload, RelationTable } from '../types/models.js';

// photo columns + owner username + like/comment counters
const PAYLOAD_SELECT = `
    SELECT p.id, p.user_id, p.file_url, p.title, p.caption, p.location,
           p.people_present, p.auto_tags, p.uploaded_at, u.username,
           (SELECT CAST(COUNT(*) AS INTEGER) FROM likes l WHERE l.photo_id = p.id) AS like_count,
           (SELECT CAST(COUNT(*) AS INTEGER) FROM comments c WHERE c.photo_id = p.id) AS comment_count
    FROM photos p
    JOIN users u ON u.id = p.user_id
`;

const NEWEST_FIRST = 'ORDER BY p.uploaded_at DESC, p.id DESC';

function toPhoto(row: Row): Photo {
    return {
        id: readNumber(row, 'id'),
        user_id: readNumber(row, 'user_id'),
        file_url: readString(row, 'file_url'),
        title: readString(row, 'title'),
        caption: readOptionalString(row, 'caption'),
        location: readOptionalString(row, 'location'),
        people_present: readOptionalString(row, 'people_present'),
        auto_tags: readOptionalString(row, 'auto_tags'),
        uploaded_at: readDate(row, 'uploaded_at'),
    };
}

function toPhotoPayload(row: Row): PhotoPayload {
    return {
        ...toPhoto(row),
        username: readString(row, 'username'),
        like_count: readNumber(row, 'like_count'),
        comment_count: readNumber(row, 'comment_count'),
    };
}

// LIKE wildcards typed by the user match literally
export function toContainsPattern(term: string): string {
    const escaped = term.toLowerCase().replace(/[\\%_]/g, match => `\\${match}`);
    return `%${escaped}%`;
}

export class PhotoModel {
    constructor(private db: Database) {}

    async create(photo: NewPhoto): Promise<Photo> {
        const query = `
            INSERT INTO photos
                (user_id, file_url, title, caption, location, people_present, auto_tags, uploaded_at)
            VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
            RETURNING id, user_id, file_url, title, caption, location, people_present, auto_tags, uploaded_at
        `;
        const rows = await this.db.query(query, [
            photo.user_id,
            photo.file_url,
            photo.title,
            photo.caption ?? null,
            photo.location ?? null,
            photo.people_present ?? null,
            photo.auto_tags,
            (photo.uploaded_at ?? new Date()).toISOString(),
        ]);

        if (rows.length === 0) {
            throw new Error('Photo INSERT failed');
        }
        return toPhoto(rows[0]);
    }

    async exists(id: number): Promise<boolean> {
        const rows = await this.db.query('SELECT id FROM photos WHERE id = $1', [id]);
        return rows.length > 0;
    }

    async findById(id: number): Promise<PhotoPayload | null> {
        const rows = await this.db.query(`${PAYLOAD_SELECT} WHERE p.id = $1`, [id]);
        return rows.length > 0 ? toPhotoPayload(rows[0]) : null;
    }

    // feed without a search term
    async findAll(): Promise<PhotoPayload[]> {
        const rows = await this.db.query(`${PAYLOAD_SELECT} ${NEWEST_FIRST}`);
        return rows.map(toPhotoPayload);
    }

    // case-insensitive substring match on title OR caption OR owner username
    async search(term: string): Promise<PhotoPayload[]> {
        const query = `
            ${PAYLOAD_SELECT}
            WHERE LOWER(p.title) LIKE $1 ESCAPE '\\'
               OR LOWER(COALESCE(p.caption, '')) LIKE $1 ESCAPE '\\'
               OR LOWER(u.username) LIKE $1 ESCAPE '\\'
            ${NEWEST_FIRST}
        `;
        const rows = await this.db.query(query, [toContainsPattern(term)]);
        return rows.map(toPhotoPayload);
    }

    async findByOwner(user_id: number): Promise<PhotoPayload[]> {
        const rows = await this.db.query(
            `${PAYLOAD_SELECT} WHERE p.user_id = $1 ${NEWEST_FIRST}`,
            [user_id]
        );
        return rows.map(toPhotoPayload);
    }

    // photos the user has liked or saved, depending on the relation table
    async findByRelation(table: RelationTable, user_id: number): Promise<PhotoPayload[]> {
        const query = `
            ${PAYLOAD_SELECT}
            JOIN ${table} r ON r.photo_id = p.id
            WHERE r.user_id = $1
            ${NEWEST_FIRST}
        `;
        const rows = await this.db.query(query, [user_id]);
        return rows.map(toPhotoPayload);
    }
}
