import type { Database } from '../db/database.js';
import { readNumber } from '../db/rows.js';
import type { RelationTable } from '../types/models.js';

/**========================================================================
 **                      TOGGLE RELATIONS (likes, saves)
 *? existence of a (user_id, photo_id) row is the boolean state
 *? toggle = conditional delete, then insert guarded by the UNIQUE
 *? constraint, so a pair never ends up with more than one row
 *========================================================================**/

export class RelationModel {
    constructor(private db: Database, private table: RelationTable) {}

    // returns the state after the toggle: true = now active
    async toggle(user_id: number, photo_id: number): Promise<boolean> {
        const deleted = await this.db.query(
            `DELETE FROM ${this.table} WHERE user_id = $1 AND photo_id = $2 RETURNING id`,
            [user_id, photo_id]
        );
        if (deleted.length > 0) {
            return false;
        }

        await this.db.query(
            `INSERT INTO ${this.table} (user_id, photo_id, created_at)
             VALUES ($1, $2, $3)
             ON CONFLICT (user_id, photo_id) DO NOTHING`,
            [user_id, photo_id, new Date().toISOString()]
        );
        return true;
    }

    async count(user_id: number, photo_id: number): Promise<number> {
        const rows = await this.db.query(
            `SELECT CAST(COUNT(*) AS INTEGER) AS total FROM ${this.table} WHERE user_id = $1 AND photo_id = $2`,
            [user_id, photo_id]
        );
        return rows.length > 0 ? readNumber(rows[0], 'total') : 0;
    }
}
