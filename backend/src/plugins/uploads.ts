import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import fastifyMultipart from '@fastify/multipart';

export const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

export default fp(async function configUploads(app: FastifyInstance) {
    await app.register(fastifyMultipart, {
        limits: {
            fieldNameSize: 100,
            fieldSize: 10000, // description + tags
            fields: 10,
            fileSize: MAX_UPLOAD_BYTES, // max 10mb per file
            files: 1, // one photo per request
            headerPairs: 2000,
            parts: 20
        }
    });
});
