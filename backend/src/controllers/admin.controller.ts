import type { FastifyReply, FastifyRequest } from 'fastify';
import type { Role } from '@/types/models.js';
import type { UserService } from '@/services/user.service.js';

type IdentifierParams = { identifier: string };

export class AdminController {
    constructor(private users: UserService) {}

    // PUT /admin/users/:identifier/ban
    async ban(request: FastifyRequest<{ Params: IdentifierParams }>, reply: FastifyReply) {
        return this.setBanned(request, reply, true);
    }

    // PUT /admin/users/:identifier/unban
    async unban(request: FastifyRequest<{ Params: IdentifierParams }>, reply: FastifyReply) {
        return this.setBanned(request, reply, false);
    }

    // PUT /admin/users/:identifier/role
    async setRole(
        request: FastifyRequest<{ Params: IdentifierParams; Body: { role: Role } }>,
        reply: FastifyReply
    ) {
        try {
            const user = await this.users.setRole(request.user, request.params.identifier, request.body.role);
            request.log.info({ admin_id: request.user.id, user_id: user.id, role: user.role }, 'role changed');

            return reply.status(200).send(user);
        } catch (err) {
            return reply.sendError(err);
        }
    }

    private async setBanned(
        request: FastifyRequest<{ Params: IdentifierParams }>,
        reply: FastifyReply,
        banned: boolean
    ) {
        try {
            const user = await this.users.setBanned(request.user, request.params.identifier, banned);
            request.log.info({ admin_id: request.user.id, user_id: user.id, banned }, 'ban status changed');

            return reply.status(200).send(user);
        } catch (err) {
            return reply.sendError(err);
        }
    }
}
