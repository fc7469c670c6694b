/**========================================================================
 * *                      TYPE DECLARATIONS: FASTIFY
 *
 *   - extends fastify to include custom definitions
 *========================================================================**/

import type { Pool } from 'pg';
import type { User } from '@/types/models.js';

declare module 'fastify' {
    interface FastifyInstance {
        db: Pool;
    }

    interface FastifyReply {
        sendError(error: unknown): FastifyReply;
    }

    // set by the auth context on protected routes
    interface FastifyRequest {
        user: User;
        token: string;
    }
}
