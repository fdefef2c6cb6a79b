import fs from 'fs';
import path from 'path';
import sqlite3 from 'node-sqlite3-wasm';
import type { Database as WasmDatabase } from 'node-sqlite3-wasm';
import { type Database, type QueryParam, type Row, isRow } from './database.js';

// sqlite binds positionally: rewrite $n to ? and reorder the values to match
export function toSqlitePlaceholders(text: string, params: QueryParam[]) {
    const values: QueryParam[] = [];
    const sql = text.replace(/\$(\d+)/g, (_match, index: string) => {
        const position = Number(index) - 1;
        if (position < 0 || position >= params.length) {
            throw new Error(`No value supplied for placeholder $${index}`);
        }
        values.push(params[position]);
        return '?';
    });
    return { sql, values };
}

// sqlite compiled to wasm: reads and writes the file directly, no native build
export class SqliteDatabase implements Database {
    readonly dialect = 'sqlite';

    constructor(private db: WasmDatabase) {
        this.db.exec('PRAGMA foreign_keys = ON');
    }

    // ':memory:' keeps everything in process (used by the test suite)
    static open(filename: string): SqliteDatabase {
        if (filename !== ':memory:') {
            fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
        }
        return new SqliteDatabase(new sqlite3.Database(filename));
    }

    // statements without a result set (DDL, plain INSERT/DELETE) come back empty
    async query(text: string, params: QueryParam[] = []): Promise<Row[]> {
        const { sql, values } = toSqlitePlaceholders(text, params);
        return this.db.all(sql, values).filter(isRow);
    }

    async close(): Promise<void> {
        this.db.close();
    }
}
