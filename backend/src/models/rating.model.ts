import type { Pool } from 'pg';
import type { Rating, RatingSummary } from '@/types/models.js';
import type { RatingRepository } from '@/types/repositories.js';
import { isForeignKeyViolation, isUniqueViolation } from '@/database/errors.js';
import { ConflictError, NotFoundError } from '@/utils/errors.js';
import { toNumberOrNull } from '@/utils/numbers.js';

const RATING_COLUMNS = 'id, photo_id, rater_id, score, created_at';

export class RatingModel implements RatingRepository {
    constructor(private db: Pool) {}

    // uniqueness of (photo_id, rater_id) is decided by the insert itself
    async create(photo_id: number, rater_id: number, score: number): Promise<Rating> {
        try {
            const result = await this.db.query<Rating>(
                `INSERT INTO ratings (photo_id, rater_id, score)
                 VALUES ($1, $2, $3)
                 RETURNING ${RATING_COLUMNS}`,
                [photo_id, rater_id, score]
            );
            const rating = result.rows[0];
            if (!rating) {
                throw new Error('Rating INSERT failed');
            }
            return rating;
        } catch (err) {
            if (isUniqueViolation(err, 'ratings_photo_rater_key')) {
                throw new ConflictError('DUPLICATE_RATING', 'You have already rated this photo');
            }
            // photo deleted between lookup and insert
            if (isForeignKeyViolation(err)) {
                throw new NotFoundError('PHOTO_NOT_FOUND', 'Photo');
            }
            throw err;
        }
    }

    async findById(id: number): Promise<Rating | null> {
        const result = await this.db.query<Rating>(
            `SELECT ${RATING_COLUMNS} FROM ratings WHERE id = $1`,
            [id]
        );
        return result.rows[0] ?? null;
    }

    async delete(id: number): Promise<void> {
        const result = await this.db.query('DELETE FROM ratings WHERE id = $1', [id]);
        if (result.rowCount === 0) {
            throw new NotFoundError('RATING_NOT_FOUND', 'Rating');
        }
    }

    // raw mean; rounding happens in the rating service
    async summarize(photo_id: number): Promise<RatingSummary> {
        const result = await this.db.query<{ average: string | null; count: string }>(
            'SELECT AVG(score) AS average, COUNT(*) AS count FROM ratings WHERE photo_id = $1',
            [photo_id]
        );
        const row = result.rows[0];

        return {
            average: toNumberOrNull(row?.average ?? null),
            count: Number(row?.count ?? 0),
        };
    }

    async listByPhoto(photo_id: number): Promise<Rating[]> {
        const result = await this.db.query<Rating>(
            `SELECT ${RATING_COLUMNS} FROM ratings WHERE photo_id = $1 ORDER BY created_at, id`,
            [photo_id]
        );
        return result.rows;
    }
}
