import type { PhotoRepository, TagRepository } from '@/types/repositories.js';
import type { Actor } from './policy.js';
import { authorize } from './policy.js';
import { NotFoundError, ValidationError } from '@/utils/errors.js';

export const MAX_TAGS_PER_PHOTO = 5;
export const MAX_TAG_LENGTH = 50;

// helper for trimming whitespace/removing empty tags; duplicates collapse
export function normalizeTags(tags: string[]): string[] {
    const normalizedTags = new Set<string>(
        tags
            .map(tag => tag.trim().toLowerCase())
            .filter(Boolean)
    );

    for (const tag of normalizedTags) {
        if (tag.length > MAX_TAG_LENGTH) {
            throw new ValidationError('INVALID_TAG', `Tag "${tag}" exceeds ${MAX_TAG_LENGTH} characters`);
        }
    }
    return [...normalizedTags];
}

// "beach, Sunset,,cat" -> ['beach', 'sunset', 'cat']
export function parseTagList(value: string): string[] {
    return normalizeTags(value.split(','));
}

export function assertTagLimit(tags: string[]) {
    if (tags.length > MAX_TAGS_PER_PHOTO) {
        throw new ValidationError(
            'TOO_MANY_TAGS',
            `A photo can have at most ${MAX_TAGS_PER_PHOTO} tags`
        );
    }
}

export class TagService {
    constructor(
        private photos: PhotoRepository,
        private tags: TagRepository
    ) {}

    /**========================================================================
     **                        UPDATE PHOTO TAGS
     *? 1. normalize both sets
     *? 2. drop tags that appear in both insert+remove sets
     *? 3. check the projected final set against the limit
     *? 4. apply atomically (the repository re-checks under the row lock)
     *========================================================================**/
    async updatePhotoTags(
        photo_id: number,
        actor: Actor,
        tags_to_insert: string[],
        tags_to_remove: string[]
    ): Promise<string[]> {
        const photo = await this.photos.findById(photo_id);
        if (!photo) {
            throw new NotFoundError('PHOTO_NOT_FOUND', 'Photo');
        }
        authorize(actor, 'photo:update', { ownerId: photo.owner_id });

        const removeTags = normalizeTags(tags_to_remove);
        const removeSet = new Set(removeTags);
        const insertTags = normalizeTags(tags_to_insert).filter(tag => !removeSet.has(tag));

        const projected = new Set([
            ...photo.tags.filter(tag => !removeSet.has(tag)),
            ...insertTags,
        ]);
        assertTagLimit([...projected]);

        return this.tags.updatePhotoTags(photo_id, insertTags, removeTags, MAX_TAGS_PER_PHOTO);
    }

    // attaching a tag the photo already has is a no-op
    async attachTags(photo_id: number, actor: Actor, tags: string[]): Promise<string[]> {
        return this.updatePhotoTags(photo_id, actor, tags, []);
    }
}
