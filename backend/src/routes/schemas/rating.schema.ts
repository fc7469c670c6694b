import { bearerSecurity, idParamSchema, noContentSchema, timestampSchema } from './common.schema.js';

const ratingSchema = {
    type: 'object',
    properties: {
        id: { type: 'integer' },
        photo_id: { type: 'integer' },
        rater_id: { type: 'integer' },
        score: { type: 'integer' },
        created_at: timestampSchema,
    },
    required: ['id', 'photo_id', 'rater_id', 'score'],
};

/**============================================
 *          GET /photos/:id/ratings
 *=============================================**/
export const listRatingsSchema = {
    tags: ['Ratings'],
    summary: 'Every rating of a photo',
    security: bearerSecurity,
    ...idParamSchema,
    response: {
        200: {
            type: 'object',
            properties: {
                ratings: { type: 'array', items: ratingSchema },
            },
            required: ['ratings'],
        },
    },
};

/**============================================
 *          POST /photos/:id/ratings
 *=============================================**/
// score range is checked by the rating service (INVALID_SCORE)
export const createRatingSchema = {
    tags: ['Ratings'],
    summary: 'Rate a photo (1-5, once, not your own)',
    security: bearerSecurity,
    ...idParamSchema,
    body: {
        type: 'object',
        properties: {
            score: { type: 'number' },
        },
        required: ['score'],
        additionalProperties: false,
    },
    response: {
        201: ratingSchema,
    },
};

/**============================================
 *           GET /photos/:id/rating
 *=============================================**/
export const ratingSummarySchema = {
    tags: ['Ratings'],
    summary: 'Average rating (one decimal) and count',
    security: bearerSecurity,
    ...idParamSchema,
    response: {
        200: {
            type: 'object',
            properties: {
                photo_id: { type: 'integer' },
                average_rating: { anyOf: [{ type: 'number' }, { type: 'null' }] },
                ratings_count: { type: 'integer' },
            },
            required: ['photo_id', 'average_rating', 'ratings_count'],
        },
    },
};

/**============================================
 *            DELETE /ratings/:id
 *=============================================**/
export const deleteRatingSchema = {
    tags: ['Ratings'],
    summary: 'Delete a rating (moderator or admin)',
    security: bearerSecurity,
    ...idParamSchema,
    response: {
        204: noContentSchema,
    },
};
