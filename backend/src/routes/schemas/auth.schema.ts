import { bearerSecurity, errorSchema, noContentSchema } from './common.schema.js';
import { userProfileSchema } from './user.schema.js';

const tokenPairSchema = {
    type: 'object',
    properties: {
        access_token: { type: 'string' },
        refresh_token: { type: 'string' },
        token_type: { type: 'string', enum: ['bearer'] },
    },
    required: ['access_token', 'refresh_token', 'token_type'],
};

/**============================================
 *             POST /auth/signup
 *=============================================**/
export const signupSchema = {
    tags: ['Auth'],
    summary: 'Create an account',
    description: 'The first account created becomes an admin.',
    security: [],
    body: {
        type: 'object',
        properties: {
            username: { type: 'string', minLength: 3, maxLength: 50, pattern: '^[A-Za-z0-9_.-]+$' },
            email: { type: 'string', format: 'email', maxLength: 255 },
            password: { type: 'string', minLength: 6, maxLength: 128 },
        },
        required: ['username', 'email', 'password'],
        additionalProperties: false,
    },
    response: {
        201: {
            type: 'object',
            properties: {
                user: userProfileSchema,
            },
            required: ['user'],
        },
        409: errorSchema,
    },
};

/**============================================
 *              POST /auth/login
 *=============================================**/
export const loginSchema = {
    tags: ['Auth'],
    summary: 'Exchange credentials for an access + refresh token pair',
    security: [],
    body: {
        type: 'object',
        properties: {
            email: { type: 'string', minLength: 1 },
            password: { type: 'string', minLength: 1 },
        },
        required: ['email', 'password'],
        additionalProperties: false,
    },
    response: {
        200: tokenPairSchema,
        401: errorSchema,
        403: errorSchema,
    },
};

/**============================================
 *             POST /auth/refresh
 *=============================================**/
export const refreshSchema = {
    tags: ['Auth'],
    summary: 'Rotate a refresh token',
    description: 'Returns a new token pair; the presented refresh token is revoked.',
    security: [],
    body: {
        type: 'object',
        properties: {
            refresh_token: { type: 'string', minLength: 1 },
        },
        required: ['refresh_token'],
        additionalProperties: false,
    },
    response: {
        200: tokenPairSchema,
        401: errorSchema,
    },
};

/**============================================
 *              POST /auth/logout
 *=============================================**/
export const logoutSchema = {
    tags: ['Auth'],
    summary: 'Revoke the current access token',
    description: 'Send `{ "refresh_token": "..." }` as body to revoke the refresh token as well.',
    security: bearerSecurity,
    response: {
        204: noContentSchema,
    },
};
