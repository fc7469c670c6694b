import type { FastifyBaseLogger } from 'fastify';
import type { PhotoPayload } from '@/types/models.js';
import type { PhotoRepository } from '@/types/repositories.js';
import type { ImageStorage } from './image.storage.js';
import type { UploadInput } from './photo.upload.js';
import type { Actor } from './policy.js';
import { authorize } from './policy.js';
import { assertTagLimit, normalizeTags } from './tag.service.js';
import { normalizeDescription } from './photo.upload.js';
import { NotFoundError } from '@/utils/errors.js';

export class PhotoService {
    constructor(
        private photos: PhotoRepository,
        private storage: ImageStorage,
        private log: FastifyBaseLogger
    ) {}

    /**========================================================================
     **                              UPLOAD
     *? 1. validate tags before anything leaves the process
     *? 2. push the image to the provider
     *? 3. insert photo row + tags in one transaction
     *? 4. on insert failure, destroy the uploaded asset again
     *========================================================================**/
    async upload(owner_id: number, input: UploadInput): Promise<PhotoPayload> {
        const tags = normalizeTags(input.tags);
        assertTagLimit(tags);
        const description = normalizeDescription(input.description);

        const stored = await this.storage.upload(input.buffer, {
            filename: input.filename,
            mimetype: input.mimetype,
        });

        try {
            return await this.photos.create({
                owner_id,
                description,
                url: stored.url,
                public_id: stored.public_id,
                tags,
            });
        } catch (err) {
            await this.destroyAsset(stored.public_id);
            throw err;
        }
    }

    async getPhoto(photo_id: number): Promise<PhotoPayload> {
        const photo = await this.photos.findById(photo_id);
        if (!photo) {
            throw new NotFoundError('PHOTO_NOT_FOUND', 'Photo');
        }
        return photo;
    }

    async updateDescription(
        photo_id: number,
        actor: Actor,
        description: string | null
    ): Promise<PhotoPayload> {
        const photo = await this.getPhoto(photo_id);
        authorize(actor, 'photo:update', { ownerId: photo.owner_id });

        return this.photos.updateDescription(photo_id, normalizeDescription(description));
    }

    // row first (cascades), then the provider asset
    async deletePhoto(photo_id: number, actor: Actor): Promise<void> {
        const photo = await this.getPhoto(photo_id);
        authorize(actor, 'photo:delete', { ownerId: photo.owner_id });

        await this.photos.delete(photo_id);
        await this.destroyAsset(photo.public_id);
    }

    async countByOwner(owner_id: number): Promise<number> {
        return this.photos.countByOwner(owner_id);
    }

    // a leftover asset at the provider is logged, not surfaced to the client
    private async destroyAsset(public_id: string) {
        try {
            await this.storage.destroy(public_id);
        } catch (err) {
            this.log.warn({ err, public_id }, 'failed to destroy image asset');
        }
    }
}
