import type { Comment } from '@/types/models.js';
import type { CommentRepository, PhotoRepository } from '@/types/repositories.js';
import type { Actor } from './policy.js';
import { authorize } from './policy.js';
import { NotFoundError, ValidationError } from '@/utils/errors.js';

export const MAX_COMMENT_LENGTH = 2000;

export function normalizeCommentBody(body: string): string {
    const text = body.trim();
    if (text.length === 0 || text.length > MAX_COMMENT_LENGTH) {
        throw new ValidationError(
            'INVALID_COMMENT',
            `Comment must be between 1 and ${MAX_COMMENT_LENGTH} characters`
        );
    }
    return text;
}

export class CommentService {
    constructor(
        private photos: PhotoRepository,
        private comments: CommentRepository
    ) {}

    async create(photo_id: number, author: Actor, body: string): Promise<Comment> {
        const text = normalizeCommentBody(body);

        const photo = await this.photos.findById(photo_id);
        if (!photo) {
            throw new NotFoundError('PHOTO_NOT_FOUND', 'Photo');
        }
        authorize(author, 'comment:create');

        return this.comments.create(photo_id, author.id, text);
    }

    // author only; marks the comment as edited
    async edit(comment_id: number, actor: Actor, body: string): Promise<Comment> {
        const comment = await this.requireComment(comment_id);
        authorize(actor, 'comment:edit', { ownerId: comment.author_id });

        return this.comments.update(comment_id, normalizeCommentBody(body));
    }

    // author, moderator or admin
    async delete(comment_id: number, actor: Actor): Promise<void> {
        const comment = await this.requireComment(comment_id);
        authorize(actor, 'comment:delete', { ownerId: comment.author_id });

        await this.comments.delete(comment_id);
    }

    async listForPhoto(photo_id: number): Promise<Comment[]> {
        const photo = await this.photos.findById(photo_id);
        if (!photo) {
            throw new NotFoundError('PHOTO_NOT_FOUND', 'Photo');
        }
        return this.comments.listByPhoto(photo_id);
    }

    private async requireComment(comment_id: number): Promise<Comment> {
        const comment = await this.comments.findById(comment_id);
        if (!comment) {
            throw new NotFoundError('COMMENT_NOT_FOUND', 'Comment');
        }
        return comment;
    }
}
