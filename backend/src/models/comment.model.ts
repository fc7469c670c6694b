import type { Pool } from 'pg';
import type { Comment } from '@/types/models.js';
import type { CommentRepository } from '@/types/repositories.js';
import { isForeignKeyViolation } from '@/database/errors.js';
import { NotFoundError } from '@/utils/errors.js';

const COMMENT_COLUMNS = 'id, photo_id, author_id, body, edited, created_at, updated_at';

export class CommentModel implements CommentRepository {
    constructor(private db: Pool) {}

    async create(photo_id: number, author_id: number, body: string): Promise<Comment> {
        try {
            const result = await this.db.query<Comment>(
                `INSERT INTO comments (photo_id, author_id, body)
                 VALUES ($1, $2, $3)
                 RETURNING ${COMMENT_COLUMNS}`,
                [photo_id, author_id, body]
            );
            const comment = result.rows[0];
            if (!comment) {
                throw new Error('Comment INSERT failed');
            }
            return comment;
        } catch (err) {
            if (isForeignKeyViolation(err)) {
                throw new NotFoundError('PHOTO_NOT_FOUND', 'Photo');
            }
            throw err;
        }
    }

    async findById(id: number): Promise<Comment | null> {
        const result = await this.db.query<Comment>(
            `SELECT ${COMMENT_COLUMNS} FROM comments WHERE id = $1`,
            [id]
        );
        return result.rows[0] ?? null;
    }

    async update(id: number, body: string): Promise<Comment> {
        const result = await this.db.query<Comment>(
            `UPDATE comments
             SET body = $2, edited = TRUE, updated_at = now()
             WHERE id = $1
             RETURNING ${COMMENT_COLUMNS}`,
            [id, body]
        );
        const comment = result.rows[0];
        if (!comment) {
            throw new NotFoundError('COMMENT_NOT_FOUND', 'Comment');
        }
        return comment;
    }

    async delete(id: number): Promise<void> {
        const result = await this.db.query('DELETE FROM comments WHERE id = $1', [id]);
        if (result.rowCount === 0) {
            throw new NotFoundError('COMMENT_NOT_FOUND', 'Comment');
        }
    }

    // oldest first
    async listByPhoto(photo_id: number): Promise<Comment[]> {
        const result = await this.db.query<Comment>(
            `SELECT ${COMMENT_COLUMNS} FROM comments WHERE photo_id = $1 ORDER BY created_at, id`,
            [photo_id]
        );
        return result.rows;
    }
}
