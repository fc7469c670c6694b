import type { FastifyInstance } from 'fastify';
import type { RouteOptions } from '@/types/services.js';
import { RatingController } from '@/controllers/rating.controller.js';
import authContext from '@/plugins/auth.context.js';
import {
    createRatingSchema,
    deleteRatingSchema,
    listRatingsSchema,
    ratingSummarySchema,
} from './schemas/rating.schema.js';

type IdParams = { id: number };

export async function ratingRoutes(app: FastifyInstance, { services }: RouteOptions) {
    const ratingController = new RatingController(services.ratings);

    // protected
    app.register(async function protectedRatingRoutes(app) {
        app.register(authContext, { auth: services.auth });

        app.get<{ Params: IdParams }>('/photos/:id/ratings',
            { schema: listRatingsSchema },
            ratingController.list.bind(ratingController)
        );

        app.post<{ Params: IdParams; Body: { score: number } }>('/photos/:id/ratings',
            { schema: createRatingSchema },
            ratingController.create.bind(ratingController)
        );

        // average (one decimal) + count
        app.get<{ Params: IdParams }>('/photos/:id/rating',
            { schema: ratingSummarySchema },
            ratingController.summary.bind(ratingController)
        );

        // moderator / admin
        app.delete<{ Params: IdParams }>('/ratings/:id',
            { schema: deleteRatingSchema },
            ratingController.delete.bind(ratingController)
        );
    });
}
