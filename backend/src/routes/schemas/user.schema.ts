import { bearerSecurity, pageQueryProperties, pageSchema, timestampSchema } from './common.schema.js';
import { MAX_ID } from '@/utils/numbers.js';
import { photoPayloadSchema } from './photo.schema.js';

const roleSchema = { type: 'string', enum: ['user', 'moderator', 'admin'] };

export const userProfileSchema = {
    type: 'object',
    properties: {
        id: { type: 'integer' },
        username: { type: 'string' },
        email: { type: 'string' },
        role: roleSchema,
        banned: { type: 'boolean' },
        created_at: timestampSchema,
        updated_at: timestampSchema,
    },
    required: ['id', 'username', 'email', 'role', 'banned'],
};

const ownProfileSchema = {
    type: 'object',
    properties: {
        ...userProfileSchema.properties,
        photo_count: { type: 'integer' },
    },
    required: [...userProfileSchema.required, 'photo_count'],
};

const publicProfileSchema = {
    type: 'object',
    properties: {
        id: { type: 'integer' },
        username: { type: 'string' },
        role: roleSchema,
        created_at: timestampSchema,
        photo_count: { type: 'integer' },
    },
    required: ['id', 'username', 'role', 'photo_count'],
};

/**============================================
 *               GET /users/me
 *=============================================**/
export const getMeSchema = {
    tags: ['Users'],
    summary: 'Current user profile',
    security: bearerSecurity,
    response: {
        200: ownProfileSchema,
    },
};

/**============================================
 *               PUT /users/me
 *=============================================**/
export const updateMeSchema = {
    tags: ['Users'],
    summary: 'Update username and/or email',
    security: bearerSecurity,
    body: {
        type: 'object',
        properties: {
            username: { type: 'string', minLength: 3, maxLength: 50, pattern: '^[A-Za-z0-9_.-]+$' },
            email: { type: 'string', format: 'email', maxLength: 255 },
        },
        additionalProperties: false,
        anyOf: [
            { required: ['username'] },
            { required: ['email'] },
        ],
    },
    response: {
        200: ownProfileSchema,
    },
};

/**============================================
 *            GET /users/:username
 *=============================================**/
export const getUserSchema = {
    tags: ['Users'],
    summary: 'Public profile',
    security: bearerSecurity,
    params: {
        type: 'object',
        properties: {
            username: { type: 'string', minLength: 1, maxLength: 50 },
        },
        required: ['username'],
    },
    response: {
        200: publicProfileSchema,
    },
};

/**============================================
 *          GET /users/:userId/photos
 *=============================================**/
export const listUserPhotosSchema = {
    tags: ['Users'],
    summary: 'Photos uploaded by a user, newest first',
    security: bearerSecurity,
    params: {
        type: 'object',
        properties: {
            userId: { type: 'integer', minimum: 1, maximum: MAX_ID },
        },
        required: ['userId'],
    },
    querystring: {
        type: 'object',
        properties: pageQueryProperties,
        additionalProperties: false,
    },
    response: {
        200: pageSchema(photoPayloadSchema),
    },
};

/**============================================
 *   PUT /admin/users/:identifier/(ban|unban)
 *=============================================**/
const identifierParams = {
    type: 'object',
    properties: {
        identifier: {
            type: 'string',
            minLength: 1,
            maxLength: 50,
            description: 'Numeric user id or username',
        },
    },
    required: ['identifier'],
};

export const banUserSchema = {
    tags: ['Admin'],
    summary: 'Ban or unban a user',
    security: bearerSecurity,
    params: identifierParams,
    response: {
        200: userProfileSchema,
    },
};

/**============================================
 *       PUT /admin/users/:identifier/role
 *=============================================**/
export const setRoleSchema = {
    tags: ['Admin'],
    summary: 'Change the role of a user',
    security: bearerSecurity,
    params: identifierParams,
    body: {
        type: 'object',
        properties: {
            role: roleSchema,
        },
        required: ['role'],
        additionalProperties: false,
    },
    response: {
        200: userProfileSchema,
    },
};
