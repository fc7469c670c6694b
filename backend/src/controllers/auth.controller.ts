import type { FastifyReply, FastifyRequest } from 'fastify';
import type { AuthService, SignupInput } from '@/services/auth.service.js';
import { toUserProfile } from '@/services/user.service.js';
import { ValidationError } from '@/utils/errors.js';

type LogoutBody = { refresh_token?: unknown } | undefined;

export class AuthController {
    constructor(private auth: AuthService) {}

    // POST /auth/signup
    async signup(request: FastifyRequest<{ Body: SignupInput }>, reply: FastifyReply) {
        try {
            const user = await this.auth.signup(request.body);
            request.log.info({ user_id: user.id, role: user.role }, 'user signed up');

            return reply.status(201).send({ user: toUserProfile(user) });
        } catch (err) {
            return reply.sendError(err);
        }
    }

    // POST /auth/login
    async login(
        request: FastifyRequest<{ Body: { email: string; password: string } }>,
        reply: FastifyReply
    ) {
        const { email, password } = request.body;

        try {
            const tokens = await this.auth.login(email, password);
            return reply.status(200).send(tokens);
        } catch (err) {
            return reply.sendError(err);
        }
    }

    // POST /auth/refresh
    async refresh(
        request: FastifyRequest<{ Body: { refresh_token: string } }>,
        reply: FastifyReply
    ) {
        try {
            const tokens = await this.auth.refresh(request.body.refresh_token);
            return reply.status(200).send(tokens);
        } catch (err) {
            return reply.sendError(err);
        }
    }

    // POST /auth/logout - body is optional
    async logout(request: FastifyRequest<{ Body: LogoutBody }>, reply: FastifyReply) {
        const refreshToken = request.body?.refresh_token;

        try {
            if (refreshToken !== undefined && typeof refreshToken !== 'string') {
                throw new ValidationError('VALIDATION_ERROR', 'refresh_token must be a string');
            }
            await this.auth.logout(request.token, refreshToken);

            return reply.status(204).send();
        } catch (err) {
            return reply.sendError(err);
        }
    }
}
