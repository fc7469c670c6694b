import type { FastifyReply, FastifyRequest } from 'fastify';
import type { RatingService } from '@/services/rating.service.js';

type IdParams = { id: number };

export class RatingController {
    constructor(private ratings: RatingService) {}

    // GET /photos/:id/ratings
    async list(request: FastifyRequest<{ Params: IdParams }>, reply: FastifyReply) {
        try {
            const ratings = await this.ratings.listRatings(request.params.id);
            return reply.status(200).send({ ratings });
        } catch (err) {
            return reply.sendError(err);
        }
    }

    // POST /photos/:id/ratings
    async create(request: FastifyRequest<{ Params: IdParams; Body: { score: number } }>, reply: FastifyReply) {
        try {
            const rating = await this.ratings.submitRating(request.params.id, request.user, request.body.score);
            return reply.status(201).send(rating);
        } catch (err) {
            return reply.sendError(err);
        }
    }

    // GET /photos/:id/rating
    async summary(request: FastifyRequest<{ Params: IdParams }>, reply: FastifyReply) {
        try {
            const { average, count } = await this.ratings.average(request.params.id);
            return reply.status(200).send({
                photo_id: request.params.id,
                average_rating: average,
                ratings_count: count,
            });
        } catch (err) {
            return reply.sendError(err);
        }
    }

    // DELETE /ratings/:id
    async delete(request: FastifyRequest<{ Params: IdParams }>, reply: FastifyReply) {
        try {
            await this.ratings.deleteRating(request.params.id, request.user);
            return reply.status(204).send();
        } catch (err) {
            return reply.sendError(err);
        }
    }
}
