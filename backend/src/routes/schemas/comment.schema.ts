import { bearerSecurity, idParamSchema, noContentSchema, timestampSchema } from './common.schema.js';

const commentSchema = {
    type: 'object',
    properties: {
        id: { type: 'integer' },
        photo_id: { type: 'integer' },
        author_id: { type: 'integer' },
        body: { type: 'string' },
        edited: { type: 'boolean' },
        created_at: timestampSchema,
        updated_at: timestampSchema,
    },
    required: ['id', 'photo_id', 'author_id', 'body', 'edited'],
};

const commentBodySchema = {
    type: 'object',
    properties: {
        body: { type: 'string', minLength: 1, maxLength: 2000 },
    },
    required: ['body'],
    additionalProperties: false,
};

/**============================================
 *         GET /photos/:id/comments
 *=============================================**/
export const listCommentsSchema = {
    tags: ['Comments'],
    summary: 'Comments on a photo, oldest first',
    security: bearerSecurity,
    ...idParamSchema,
    response: {
        200: {
            type: 'object',
            properties: {
                comments: { type: 'array', items: commentSchema },
            },
            required: ['comments'],
        },
    },
};

/**============================================
 *         POST /photos/:id/comments
 *=============================================**/
export const createCommentSchema = {
    tags: ['Comments'],
    summary: 'Comment on a photo',
    security: bearerSecurity,
    ...idParamSchema,
    body: commentBodySchema,
    response: {
        201: commentSchema,
    },
};

/**============================================
 *            PATCH /comments/:id
 *=============================================**/
export const editCommentSchema = {
    tags: ['Comments'],
    summary: 'Edit own comment',
    security: bearerSecurity,
    ...idParamSchema,
    body: commentBodySchema,
    response: {
        200: commentSchema,
    },
};

/**============================================
 *            DELETE /comments/:id
 *=============================================**/
export const deleteCommentSchema = {
    tags: ['Comments'],
    summary: 'Delete a comment (author, moderator or admin)',
    security: bearerSecurity,
    ...idParamSchema,
    response: {
        204: noContentSchema,
    },
};
