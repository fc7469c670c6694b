import type { FastifyInstance } from 'fastify';
import type { RouteOptions } from '@/types/services.js';
import { CommentController } from '@/controllers/comment.controller.js';
import authContext from '@/plugins/auth.context.js';
import {
    createCommentSchema,
    deleteCommentSchema,
    editCommentSchema,
    listCommentsSchema,
} from './schemas/comment.schema.js';

type IdParams = { id: number };

export async function commentRoutes(app: FastifyInstance, { services }: RouteOptions) {
    const commentController = new CommentController(services.comments);

    // protected
    app.register(async function protectedCommentRoutes(app) {
        app.register(authContext, { auth: services.auth });

        app.get<{ Params: IdParams }>('/photos/:id/comments',
            { schema: listCommentsSchema },
            commentController.list.bind(commentController)
        );

        app.post<{ Params: IdParams; Body: { body: string } }>('/photos/:id/comments',
            { schema: createCommentSchema },
            commentController.create.bind(commentController)
        );

        app.patch<{ Params: IdParams; Body: { body: string } }>('/comments/:id',
            { schema: editCommentSchema },
            commentController.edit.bind(commentController)
        );

        app.delete<{ Params: IdParams }>('/comments/:id',
            { schema: deleteCommentSchema },
            commentController.delete.bind(commentController)
        );
    });
}
