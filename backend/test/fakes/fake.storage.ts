import type { TransformationSpec } from '@/types/models.js';
import type { ImageFile, ImageStorage, StoredImage } from '@/services/image.storage.js';
import { toTransformationSteps } from '@/services/image.storage.js';

// records calls instead of talking to the image provider
export class FakeImageStorage implements ImageStorage {
    uploads: Array<ImageFile & { bytes: number; public_id: string }> = [];
    destroyed: string[] = [];
    failNextUpload = false;

    private counter = 0;

    async upload(buffer: Buffer, file: ImageFile): Promise<StoredImage> {
        if (this.failNextUpload) {
            this.failNextUpload = false;
            throw new Error('provider unavailable');
        }

        this.counter += 1;
        const public_id = `photoshare/test-${this.counter}`;
        this.uploads.push({ ...file, bytes: buffer.length, public_id });

        return {
            url: `https://images.test/${public_id}.jpg`,
            public_id,
        };
    }

    async destroy(public_id: string): Promise<void> {
        this.destroyed.push(public_id);
    }

    // e.g. https://images.test/t_effect=grayscale/photoshare/test-1.jpg
    transformUrl(public_id: string, spec: TransformationSpec): string {
        const steps = toTransformationSteps(spec)
            .map(step => Object.entries(step).map(([key, value]) => `${key}=${value}`).join(','))
            .join('/');
        return `https://images.test/t_${steps}/${public_id}.jpg`;
    }
}
