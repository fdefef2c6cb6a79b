/**========================================================================
 * *                  TYPE DECLARATIONS: DATABASE MODELS
 *========================================================================**/

export const ROLES = ['creator', 'consumer'] as const;

export type Role = typeof ROLES[number];

export function isRole(value: unknown): value is Role {
    return value === 'creator' || value === 'consumer';
}

// never leaves the server: includes the password hash
export interface UserRecord {
    id: number;
    username: string;
    password: string;
    role: Role;
    created_at: Date;
}

export type User = Omit<UserRecord, 'password'>;

export interface Photo {
    id: number;
    user_id: number;
    file_url: string;
    title: string;
    caption: string | null;
    location: string | null;
    people_present: string | null;
    auto_tags: string | null;
    uploaded_at: Date;
}

// photo as returned by the api: owner + counters joined in
export type PhotoPayload = Photo & {
    username: string;
    like_count: number;
    comment_count: number;
};

export interface NewPhoto {
    user_id: number;
    file_url: string;
    title: string;
    caption?: string | null;
    location?: string | null;
    people_present?: string | null;
    auto_tags: string;
    uploaded_at?: Date;
}

export interface Comment {
    id: number;
    text: string;
    user_id: number;
    photo_id: number;
    created_at: Date;
}

export type CommentPayload = Comment & { username: string };

export type RelationTable = 'likes' | 'saves';
