import type { FastifyRequest } from 'fastify';
import type { MultipartFile } from '@fastify/multipart';
import { ValidationError } from '@/utils/errors.js';
import { MAX_UPLOAD_BYTES } from '@/plugins/uploads.js';
import { parseTagList } from './tag.service.js';

export const validFileTypes = [
    'image/jpeg',
    'image/png',
    'image/webp',
    'image/gif'
];

export const MAX_DESCRIPTION_LENGTH = 1000;

export interface UploadInput {
    buffer: Buffer;
    filename: string;
    mimetype: string;
    description: string | null;
    tags: string[];
}

// thrown by part.toBuffer() once the fileSize limit is hit
function isFileTooLarge(err: unknown): boolean {
    return typeof err === 'object'
        && err !== null
        && 'code' in err
        && err.code === 'FST_REQ_FILE_TOO_LARGE';
}

export function normalizeDescription(value: string | null | undefined): string | null {
    const description = value?.trim() ?? '';
    if (description.length > MAX_DESCRIPTION_LENGTH) {
        throw new ValidationError(
            'INVALID_DESCRIPTION',
            `Description cannot exceed ${MAX_DESCRIPTION_LENGTH} characters`
        );
    }
    return description === '' ? null : description;
}

/**============================================
 *          MULTIPART PHOTO UPLOAD
 *  fields: file (required), description, tags
 *  tags is a comma-separated list
 *=============================================**/

async function readFile(part: MultipartFile): Promise<Buffer> {
    if (!validFileTypes.includes(part.mimetype)) {
        // drain the stream so the request can complete
        part.file.resume();
        throw new ValidationError('UNSUPPORTED_FILE_TYPE', `Unsupported file type: ${part.mimetype}`);
    }

    try {
        return await part.toBuffer();
    } catch (err) {
        if (isFileTooLarge(err)) {
            throw new ValidationError(
                'FILE_TOO_LARGE',
                `File exceeds the ${MAX_UPLOAD_BYTES / (1024 * 1024)}MB limit`
            );
        }
        throw err;
    }
}

export async function parseUpload(request: FastifyRequest): Promise<UploadInput> {
    let file: { buffer: Buffer; filename: string; mimetype: string } | null = null;
    let description: string | null = null;
    let tags: string[] = [];

    for await (const part of request.parts()) {
        if (part.type === 'file') {
            const buffer = await readFile(part);
            file = { buffer, filename: part.filename, mimetype: part.mimetype };
            continue;
        }

        if (typeof part.value !== 'string') continue;

        if (part.fieldname === 'description') {
            description = normalizeDescription(part.value);
        }
        if (part.fieldname === 'tags') {
            tags = parseTagList(part.value);
        }
    }

    if (!file) {
        throw new ValidationError('FILE_REQUIRED', 'An image file is required');
    }
    return { ...file, description, tags };
}
