import type { FastifyReply, FastifyRequest } from 'fastify';
import type { UserChanges } from '@/types/repositories.js';
import type { UserService } from '@/services/user.service.js';
import type { SearchService } from '@/services/search.service.js';
import type { PageRequest } from '@/services/paginate.utils.js';

export class UserController {
    constructor(
        private users: UserService,
        private search: SearchService
    ) {}

    // GET /users/me
    async getMe(request: FastifyRequest, reply: FastifyReply) {
        try {
            const profile = await this.users.getProfile(request.user.id);
            return reply.status(200).send(profile);
        } catch (err) {
            return reply.sendError(err);
        }
    }

    // PUT /users/me
    async updateMe(request: FastifyRequest<{ Body: UserChanges }>, reply: FastifyReply) {
        try {
            const profile = await this.users.updateProfile(request.user.id, request.body);
            return reply.status(200).send(profile);
        } catch (err) {
            return reply.sendError(err);
        }
    }

    // GET /users/:username
    async getByUsername(
        request: FastifyRequest<{ Params: { username: string } }>,
        reply: FastifyReply
    ) {
        try {
            const profile = await this.users.getPublicProfile(request.params.username);
            return reply.status(200).send(profile);
        } catch (err) {
            return reply.sendError(err);
        }
    }

    // GET /users/:userId/photos
    async listPhotos(
        request: FastifyRequest<{ Params: { userId: number }; Querystring: PageRequest }>,
        reply: FastifyReply
    ) {
        try {
            const page = await this.search.listUserPhotos(request.params.userId, request.query);
            return reply.status(200).send(page);
        } catch (err) {
            return reply.sendError(err);
        }
    }
}
