import type { PhotoTransformation, TransformationSpec, TransformationType } from '@/types/models.js';
import type { PhotoRepository, TransformationRepository } from '@/types/repositories.js';
import type { ImageStorage } from './image.storage.js';
import type { Actor } from './policy.js';
import { authorize } from './policy.js';
import { toQrDataUri, toQrPng } from './qrcode.service.js';
import { NotFoundError, ValidationError } from '@/utils/errors.js';

// request body of POST /photos/:id/transform
export type TransformationRequest = {
    type: TransformationType;
    size?: number;
    radius?: number;
    strength?: number;
};

type Bounds = { min: number; max: number; fallback: number };

export const TRANSFORMATION_BOUNDS = {
    size: { min: 50, max: 2000, fallback: 200 },
    radius: { min: 1, max: 100, fallback: 20 },
    strength: { min: 1, max: 2000, fallback: 500 },
} satisfies Record<string, Bounds>;

function boundedInt(value: number | undefined, field: string, bounds: Bounds): number {
    if (value === undefined) return bounds.fallback;

    if (!Number.isInteger(value) || value < bounds.min || value > bounds.max) {
        throw new ValidationError(
            'INVALID_TRANSFORMATION',
            `${field} must be an integer between ${bounds.min} and ${bounds.max}`
        );
    }
    return value;
}

export function resolveTransformation(request: TransformationRequest): TransformationSpec {
    switch (request.type) {
        case 'circle':
            return { type: 'circle', size: boundedInt(request.size, 'size', TRANSFORMATION_BOUNDS.size) };
        case 'rounded':
            return { type: 'rounded', radius: boundedInt(request.radius, 'radius', TRANSFORMATION_BOUNDS.radius) };
        case 'grayscale':
            return { type: 'grayscale' };
        case 'sepia':
            return { type: 'sepia' };
        case 'blur':
            return { type: 'blur', strength: boundedInt(request.strength, 'strength', TRANSFORMATION_BOUNDS.strength) };
    }
}

export class TransformationService {
    constructor(
        private photos: PhotoRepository,
        private transformations: TransformationRepository,
        private storage: ImageStorage
    ) {}

    // derived provider url + a qr code pointing at it
    async transform(
        photo_id: number,
        actor: Actor,
        request: TransformationRequest
    ): Promise<PhotoTransformation> {
        const spec = resolveTransformation(request);
        const photo = await this.requirePhoto(photo_id);
        authorize(actor, 'photo:transform', { ownerId: photo.owner_id });

        const url = this.storage.transformUrl(photo.public_id, spec);
        const qr_code = await toQrDataUri(url);

        return this.transformations.create({ photo_id, url, params: spec, qr_code });
    }

    async listTransformations(photo_id: number): Promise<PhotoTransformation[]> {
        await this.requirePhoto(photo_id);
        return this.transformations.listByPhoto(photo_id);
    }

    // png qr code for the original photo url
    async qrCode(photo_id: number): Promise<Buffer> {
        const photo = await this.requirePhoto(photo_id);
        return toQrPng(photo.url);
    }

    private async requirePhoto(photo_id: number) {
        const photo = await this.photos.findById(photo_id);
        if (!photo) {
            throw new NotFoundError('PHOTO_NOT_FOUND', 'Photo');
        }
        return photo;
    }
}
