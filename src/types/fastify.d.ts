/**========================================================================
 * *                      TYPE DECLARATIONS: FASTIFY
 * 
 *   - extends fastify to include custom definitions
 *========================================================================**/

import type { AppConfig } from '../config.js';
import type { Database } from '../db/database.js';
import type { User } from './models.js';

declare module 'fastify' {
    interface FastifyInstance {
        config: AppConfig;
        db: Database;
    }

    interface FastifyReply {
        sendError(error: unknown, status?: number): FastifyReply;
    }

    interface FastifyRequest {
        // resolved from the session cookie; null when logged out
        user: User | null;
    }
}
