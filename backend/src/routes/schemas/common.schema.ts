import { MAX_ID } from '@/utils/numbers.js';

// applied to every route behind the auth context
export const bearerSecurity = [{ bearerAuth: [] }];

// photo / comment / rating id in the path
export const idParamSchema = {
    params: {
        type: 'object',
        properties: {
            id: { type: 'integer', minimum: 1, maximum: MAX_ID },
        },
        required: ['id'],
        additionalProperties: false,
    },
};

export const timestampSchema = { type: 'string', format: 'date-time' };

export const errorSchema = {
    type: 'object',
    properties: {
        success: { type: 'boolean' },
        error: { type: 'string' },
        code: { type: 'string' },
    },
    required: ['success', 'error', 'code'],
};

export const noContentSchema = {
    type: 'null',
    description: 'No content',
};

// offset pagination envelope around any item schema
export function pageSchema(itemSchema: object) {
    return {
        type: 'object',
        properties: {
            items: { type: 'array', items: itemSchema },
            total: { type: 'integer' },
            page: { type: 'integer' },
            size: { type: 'integer' },
            pages: { type: 'integer' },
        },
        required: ['items', 'total', 'page', 'size', 'pages'],
    };
}

export const pageQueryProperties = {
    page: { type: 'integer', minimum: 1, default: 1 },
    size: { type: 'integer', minimum: 1, maximum: 100, default: 20 },
};
