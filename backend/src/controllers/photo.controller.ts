import type { FastifyReply, FastifyRequest } from 'fastify';
import type { PhotoSearchParams } from '@/types/search.js';
import type { PhotoService } from '@/services/photo.service.js';
import type { TagService } from '@/services/tag.service.js';
import type { SearchService } from '@/services/search.service.js';
import type { TransformationRequest, TransformationService } from '@/services/transformation.service.js';
import { parseUpload } from '@/services/photo.upload.js';
import { debugPrint } from '@/utils/debug.print.js';

type IdParams = { id: number };

export class PhotoController {
    constructor(
        private photos: PhotoService,
        private tags: TagService,
        private search: SearchService,
        private transformations: TransformationService
    ) {}

    // POST /photos
    async upload(request: FastifyRequest, reply: FastifyReply) {
        try {
            const input = await parseUpload(request);
            debugPrint({
                filename: input.filename,
                mimetype: input.mimetype,
                bytes: input.buffer.length,
                description: input.description,
                tags: input.tags,
            }, 'PhotoController.upload');

            const photo = await this.photos.upload(request.user.id, input);
            request.log.info({ photo_id: photo.id, owner_id: photo.owner_id }, 'photo uploaded');

            return reply.status(201).send(photo);
        } catch (err) {
            return reply.sendError(err);
        }
    }

    // GET /photos
    async searchPhotos(request: FastifyRequest<{ Querystring: PhotoSearchParams }>, reply: FastifyReply) {
        try {
            const page = await this.search.search(request.query);
            return reply.status(200).send(page);
        } catch (err) {
            return reply.sendError(err);
        }
    }

    // GET /photos/:id
    async getById(request: FastifyRequest<{ Params: IdParams }>, reply: FastifyReply) {
        try {
            const photo = await this.photos.getPhoto(request.params.id);
            return reply.status(200).send(photo);
        } catch (err) {
            return reply.sendError(err);
        }
    }

    // PATCH /photos/:id/description
    async updateDescription(
        request: FastifyRequest<{ Params: IdParams; Body: { description: string | null } }>,
        reply: FastifyReply
    ) {
        try {
            const photo = await this.photos.updateDescription(
                request.params.id,
                request.user,
                request.body.description
            );
            return reply.status(200).send(photo);
        } catch (err) {
            return reply.sendError(err);
        }
    }

    // PATCH /photos/:id/tags
    async updateTags(
        request: FastifyRequest<{
            Params: IdParams;
            Body: { tags_to_insert?: string[]; tags_to_remove?: string[] };
        }>,
        reply: FastifyReply
    ) {
        const { tags_to_insert, tags_to_remove } = request.body;
        debugPrint({ tags_to_insert, tags_to_remove }, 'Update Photo Tags');

        try {
            const tags = await this.tags.updatePhotoTags(
                request.params.id,
                request.user,
                tags_to_insert ?? [],
                tags_to_remove ?? []
            );
            return reply.status(200).send({ tags });
        } catch (err) {
            return reply.sendError(err);
        }
    }

    // POST /photos/:id/tags
    async attachTags(
        request: FastifyRequest<{ Params: IdParams; Body: { tags: string[] } }>,
        reply: FastifyReply
    ) {
        try {
            const tags = await this.tags.attachTags(request.params.id, request.user, request.body.tags);
            return reply.status(200).send({ tags });
        } catch (err) {
            return reply.sendError(err);
        }
    }

    // DELETE /photos/:id
    async delete(request: FastifyRequest<{ Params: IdParams }>, reply: FastifyReply) {
        try {
            await this.photos.deletePhoto(request.params.id, request.user);
            request.log.info({ photo_id: request.params.id }, 'photo deleted');

            return reply.status(204).send();
        } catch (err) {
            return reply.sendError(err);
        }
    }

    // POST /photos/:id/transform
    async transform(
        request: FastifyRequest<{ Params: IdParams; Body: TransformationRequest }>,
        reply: FastifyReply
    ) {
        try {
            const transformation = await this.transformations.transform(
                request.params.id,
                request.user,
                request.body
            );
            return reply.status(201).send(transformation);
        } catch (err) {
            return reply.sendError(err);
        }
    }

    // GET /photos/:id/transformations
    async listTransformations(request: FastifyRequest<{ Params: IdParams }>, reply: FastifyReply) {
        try {
            const transformations = await this.transformations.listTransformations(request.params.id);
            return reply.status(200).send({ transformations });
        } catch (err) {
            return reply.sendError(err);
        }
    }

    // GET /photos/:id/qr
    async qrCode(request: FastifyRequest<{ Params: IdParams }>, reply: FastifyReply) {
        try {
            const png = await this.transformations.qrCode(request.params.id);
            return reply.status(200).type('image/png').send(png);
        } catch (err) {
            return reply.sendError(err);
        }
    }
}
