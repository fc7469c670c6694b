import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { AuthService } from '@/services/auth.service.js';
import { AuthError } from '@/utils/errors.js';

type AuthContextOptions = {
    auth: AuthService;
};

export function extractBearerToken(header: string | undefined): string | null {
    if (!header) return null;

    const [scheme, token] = header.split(' ');
    if (scheme?.toLowerCase() !== 'bearer' || !token) return null;
    return token;
}

// resolve the bearer token to a live, unbanned user before the route runs
export default fp<AuthContextOptions>(async function authContext(app: FastifyInstance, opts) {
    app.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
        const token = extractBearerToken(request.headers.authorization);
        if (!token) {
            return reply.sendError(new AuthError('MISSING_TOKEN', 'Not authenticated'));
        }

        try {
            request.user = await opts.auth.authenticate(token);
            request.token = token;
        } catch (err) {
            return reply.sendError(err);
        }
    });
});
