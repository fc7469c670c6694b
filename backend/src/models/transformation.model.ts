import type { Pool } from 'pg';
import type { PhotoTransformation } from '@/types/models.js';
import type { NewTransformation, TransformationRepository } from '@/types/repositories.js';
import { isForeignKeyViolation } from '@/database/errors.js';
import { NotFoundError } from '@/utils/errors.js';

const TRANSFORMATION_COLUMNS = 'id, photo_id, url, params, qr_code, created_at';

export class TransformationModel implements TransformationRepository {
    constructor(private db: Pool) {}

    async create(data: NewTransformation): Promise<PhotoTransformation> {
        try {
            const result = await this.db.query<PhotoTransformation>(
                `INSERT INTO photo_transformations (photo_id, url, params, qr_code)
                 VALUES ($1, $2, $3, $4)
                 RETURNING ${TRANSFORMATION_COLUMNS}`,
                [data.photo_id, data.url, JSON.stringify(data.params), data.qr_code]
            );
            const transformation = result.rows[0];
            if (!transformation) {
                throw new Error('Transformation INSERT failed');
            }
            return transformation;
        } catch (err) {
            if (isForeignKeyViolation(err)) {
                throw new NotFoundError('PHOTO_NOT_FOUND', 'Photo');
            }
            throw err;
        }
    }

    // newest first
    async listByPhoto(photo_id: number): Promise<PhotoTransformation[]> {
        const result = await this.db.query<PhotoTransformation>(
            `SELECT ${TRANSFORMATION_COLUMNS} FROM photo_transformations
             WHERE photo_id = $1
             ORDER BY created_at DESC, id DESC`,
            [photo_id]
        );
        return result.rows;
    }
}
