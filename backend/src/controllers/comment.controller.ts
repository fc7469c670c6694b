import type { FastifyReply, FastifyRequest } from 'fastify';
import type { CommentService } from '@/services/comment.service.js';

type IdParams = { id: number };
type CommentBody = { body: string };

export class CommentController {
    constructor(private comments: CommentService) {}

    // GET /photos/:id/comments
    async list(request: FastifyRequest<{ Params: IdParams }>, reply: FastifyReply) {
        try {
            const comments = await this.comments.listForPhoto(request.params.id);
            return reply.status(200).send({ comments });
        } catch (err) {
            return reply.sendError(err);
        }
    }

    // POST /photos/:id/comments
    async create(request: FastifyRequest<{ Params: IdParams; Body: CommentBody }>, reply: FastifyReply) {
        try {
            const comment = await this.comments.create(request.params.id, request.user, request.body.body);
            return reply.status(201).send(comment);
        } catch (err) {
            return reply.sendError(err);
        }
    }

    // PATCH /comments/:id
    async edit(request: FastifyRequest<{ Params: IdParams; Body: CommentBody }>, reply: FastifyReply) {
        try {
            const comment = await this.comments.edit(request.params.id, request.user, request.body.body);
            return reply.status(200).send(comment);
        } catch (err) {
            return reply.sendError(err);
        }
    }

    // DELETE /comments/:id
    async delete(request: FastifyRequest<{ Params: IdParams }>, reply: FastifyReply) {
        try {
            await this.comments.delete(request.params.id, request.user);
            return reply.status(204).send();
        } catch (err) {
            return reply.sendError(err);
        }
    }
}
