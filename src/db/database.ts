/**========================================================================
 * *                        DATABASE ABSTRACTION
 *
 *   - models write SQL once, with $1..$n placeholders, in the subset
 *     shared by postgres and sqlite
 *   - rows come back untyped; models read them through db/rows.ts
 *========================================================================**/

export type Dialect = 'postgres' | 'sqlite';

export type QueryParam = string | number | null;

export type Row = Record<string, unknown>;

export interface Database {
    readonly dialect: Dialect;
    query(text: string, params?: QueryParam[]): Promise<Row[]>;
    close(): Promise<void>;
}

export function isRow(value: unknown): value is Row {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
