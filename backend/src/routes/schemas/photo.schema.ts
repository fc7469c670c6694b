import { bearerSecurity, idParamSchema, noContentSchema, pageQueryProperties, pageSchema, timestampSchema } from './common.schema.js';
import { MAX_ID } from '@/utils/numbers.js';

const tagListSchema = {
    type: 'array',
    items: { type: 'string', maxLength: 50 },
    maxItems: 20,
};

export const photoPayloadSchema = {
    type: 'object',
    properties: {
        id: { type: 'integer' },
        owner_id: { type: 'integer' },
        owner_username: { type: 'string' },
        description: { anyOf: [{ type: 'string' }, { type: 'null' }] },
        url: { type: 'string' },
        public_id: { type: 'string' },
        tags: { type: 'array', items: { type: 'string' } },
        average_rating: { anyOf: [{ type: 'number' }, { type: 'null' }] },
        ratings_count: { type: 'integer' },
        created_at: timestampSchema,
        updated_at: timestampSchema,
    },
    required: ['id', 'owner_id', 'url', 'tags', 'average_rating', 'ratings_count'],
};

const transformationSchema = {
    type: 'object',
    properties: {
        id: { type: 'integer' },
        photo_id: { type: 'integer' },
        url: { type: 'string' },
        params: {
            type: 'object',
            properties: {
                type: { type: 'string' },
                size: { type: 'integer' },
                radius: { type: 'integer' },
                strength: { type: 'integer' },
            },
        },
        qr_code: { type: 'string', description: 'PNG data URI' },
        created_at: timestampSchema,
    },
    required: ['id', 'photo_id', 'url', 'params', 'qr_code'],
};

/**============================================
 *               POST /photos
 *=============================================**/
// multipart bodies are parsed by the controller, so no body schema here
export const uploadPhotoSchema = {
    tags: ['Photos'],
    summary: 'Upload a photo',
    description: `
        multipart/form-data with fields:
        - file: jpeg, png, webp or gif, max 10MB
        - description: optional, max 1000 characters
        - tags: optional comma-separated list, max 5 tags
    `.trim(),
    security: bearerSecurity,
    consumes: ['multipart/form-data'],
    response: {
        201: photoPayloadSchema,
    },
};

/**============================================
 *                GET /photos
 *=============================================**/
/* filters compose with AND
eg.
    /photos?keyword=sunset
    /photos?tag=beach&min_rating=4
    /photos?uploader=alice&sort_by=rating&sort_order=desc
 */
export const searchPhotosSchema = {
    tags: ['Photos'],
    summary: 'Search and filter photos',
    security: bearerSecurity,
    querystring: {
        type: 'object',
        properties: {
            keyword: { type: 'string', maxLength: 100, description: 'Substring of the description' },
            tag: { type: 'string', maxLength: 50 },
            min_rating: { type: 'number', minimum: 1, maximum: 5 },
            max_rating: { type: 'number', minimum: 1, maximum: 5 },
            date_from: { type: 'string', description: 'ISO 8601 date or date-time' },
            date_to: { type: 'string', description: 'ISO 8601 date or date-time (inclusive)' },
            uploader: { type: 'string', maxLength: 50, description: 'Owner username' },
            user_id: { type: 'integer', minimum: 1, maximum: MAX_ID },
            sort_by: { type: 'string', enum: ['created_at', 'rating'], default: 'created_at' },
            sort_order: { type: 'string', enum: ['asc', 'desc'], default: 'desc' },
            ...pageQueryProperties,
        },
        additionalProperties: false,
    },
    response: {
        200: pageSchema(photoPayloadSchema),
    },
};

/**============================================
 *               GET /photos/:id
 *=============================================**/
export const getPhotoSchema = {
    tags: ['Photos'],
    summary: 'Photo with tags, owner and rating',
    security: bearerSecurity,
    ...idParamSchema,
    response: {
        200: photoPayloadSchema,
    },
};

/**============================================
 *         PATCH /photos/:id/description
 *=============================================**/
export const updateDescriptionSchema = {
    tags: ['Photos'],
    summary: 'Update photo description',
    security: bearerSecurity,
    ...idParamSchema,
    body: {
        type: 'object',
        properties: {
            description: { anyOf: [{ type: 'string', maxLength: 1000 }, { type: 'null' }] },
        },
        required: ['description'],
        additionalProperties: false,
    },
    response: {
        200: photoPayloadSchema,
    },
};

/**============================================
 *            PATCH /photos/:id/tags
 *=============================================**/
export const updateTagsSchema = {
    tags: ['Photos'],
    summary: 'Add and/or remove tags',
    security: bearerSecurity,
    ...idParamSchema,
    body: {
        type: 'object',
        properties: {
            tags_to_insert: tagListSchema,
            tags_to_remove: tagListSchema,
        },
        additionalProperties: false,
        anyOf: [
            { required: ['tags_to_insert'] },
            { required: ['tags_to_remove'] },
        ],
    },
    response: {
        200: {
            type: 'object',
            properties: {
                tags: { type: 'array', items: { type: 'string' } },
            },
            required: ['tags'],
        },
    },
};

/**============================================
 *             POST /photos/:id/tags
 *=============================================**/
export const attachTagsSchema = {
    tags: ['Photos'],
    summary: 'Attach tags (existing ones are kept)',
    security: bearerSecurity,
    ...idParamSchema,
    body: {
        type: 'object',
        properties: {
            tags: { ...tagListSchema, minItems: 1 },
        },
        required: ['tags'],
        additionalProperties: false,
    },
    response: updateTagsSchema.response,
};

/**============================================
 *              DELETE /photos/:id
 *=============================================**/
export const deletePhotoSchema = {
    tags: ['Photos'],
    summary: 'Delete photo',
    security: bearerSecurity,
    ...idParamSchema,
    response: {
        204: noContentSchema,
    },
};

/**============================================
 *          POST /photos/:id/transform
 *=============================================**/
export const transformPhotoSchema = {
    tags: ['Transformations'],
    summary: 'Create a transformed variant + QR code',
    security: bearerSecurity,
    ...idParamSchema,
    body: {
        type: 'object',
        properties: {
            type: { type: 'string', enum: ['circle', 'rounded', 'grayscale', 'sepia', 'blur'] },
            size: { type: 'integer', minimum: 50, maximum: 2000, description: 'circle only (default 200)' },
            radius: { type: 'integer', minimum: 1, maximum: 100, description: 'rounded only (default 20)' },
            strength: { type: 'integer', minimum: 1, maximum: 2000, description: 'blur only (default 500)' },
        },
        required: ['type'],
        additionalProperties: false,
    },
    response: {
        201: transformationSchema,
    },
};

/**============================================
 *        GET /photos/:id/transformations
 *=============================================**/
export const listTransformationsSchema = {
    tags: ['Transformations'],
    summary: 'Transformations of a photo, newest first',
    security: bearerSecurity,
    ...idParamSchema,
    response: {
        200: {
            type: 'object',
            properties: {
                transformations: { type: 'array', items: transformationSchema },
            },
            required: ['transformations'],
        },
    },
};

/**============================================
 *             GET /photos/:id/qr
 *=============================================**/
export const photoQrSchema = {
    tags: ['Transformations'],
    summary: 'QR code (PNG) linking to the photo',
    security: bearerSecurity,
    produces: ['image/png'],
    ...idParamSchema,
};
