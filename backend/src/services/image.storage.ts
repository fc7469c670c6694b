import cloudinaryModule from 'cloudinary';
import type { TransformationSpec } from '@/types/models.js';

const cloudinary = cloudinaryModule.v2;

export type StoredImage = {
    url: string;
    public_id: string;
};

export type ImageFile = {
    filename: string;
    mimetype: string;
};

// the cloud image provider, as seen by the photo services
export interface ImageStorage {
    upload(buffer: Buffer, file: ImageFile): Promise<StoredImage>;
    destroy(public_id: string): Promise<void>;
    transformUrl(public_id: string, spec: TransformationSpec): string;
}

type TransformationStep = {
    width?: number;
    height?: number;
    crop?: 'fill';
    gravity?: 'face';
    radius?: number | 'max';
    effect?: string;
};

export function toTransformationSteps(spec: TransformationSpec): TransformationStep[] {
    switch (spec.type) {
        case 'circle':
            return [
                { width: spec.size, height: spec.size, crop: 'fill', gravity: 'face' },
                { radius: 'max' },
            ];
        case 'rounded':
            return [{ radius: spec.radius }];
        case 'grayscale':
            return [{ effect: 'grayscale' }];
        case 'sepia':
            return [{ effect: 'sepia' }];
        case 'blur':
            return [{ effect: `blur:${spec.strength}` }];
    }
}

export type CloudinaryOptions = {
    cloudName: string;
    apiKey: string;
    apiSecret: string;
    folder: string;
};

export class CloudinaryStorage implements ImageStorage {
    constructor(private options: CloudinaryOptions) {
        cloudinary.config({
            cloud_name: options.cloudName,
            api_key: options.apiKey,
            api_secret: options.apiSecret,
            secure: true,
        });
    }

    upload(buffer: Buffer, file: ImageFile): Promise<StoredImage> {
        return new Promise((resolve, reject) => {
            const stream = cloudinary.uploader.upload_stream(
                {
                    folder: this.options.folder,
                    resource_type: 'image',
                    filename_override: file.filename,
                },
                (error, result) => {
                    if (error || !result) {
                        reject(new Error(`Image upload failed: ${error?.message ?? 'empty response'}`));
                        return;
                    }
                    resolve({ url: result.secure_url, public_id: result.public_id });
                }
            );
            stream.end(buffer);
        });
    }

    async destroy(public_id: string): Promise<void> {
        await cloudinary.uploader.destroy(public_id, { resource_type: 'image' });
    }

    transformUrl(public_id: string, spec: TransformationSpec): string {
        return cloudinary.url(public_id, {
            secure: true,
            transformation: toTransformationSteps(spec),
        });
    }
}
