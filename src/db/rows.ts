import type { Row } from './database.js';

// readers for untyped result rows; postgres and sqlite disagree on
// timestamp types, so dates accept both Date and string

export function readNumber(row: Row, key: string): number {
    const value = row[key];
    if (typeof value === 'number') return value;
    if (typeof value === 'string' && /^-?\d+$/.test(value)) return Number(value);
    throw new Error(`Expected numeric column "${key}", got ${typeof value}`);
}

export function readString(row: Row, key: string): string {
    const value = row[key];
    if (typeof value !== 'string') {
        throw new Error(`Expected text column "${key}", got ${typeof value}`);
    }
    return value;
}

export function readOptionalString(row: Row, key: string): string | null {
    const value = row[key];
    if (value === null || value === undefined) return null;
    return readString(row, key);
}

export function readDate(row: Row, key: string): Date {
    const value = row[key];
    if (value instanceof Date) return value;
    if (typeof value === 'string') {
        const date = new Date(value);
        if (!Number.isNaN(date.getTime())) return date;
    }
    throw new Error(`Expected timestamp column "${key}"`);
}
