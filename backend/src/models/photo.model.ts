import type { Pool } from 'pg';
import type { PhotoPayload } from '@/types/models.js';
import type { NewPhoto, PhotoRepository } from '@/types/repositories.js';
import type { PhotoSearchQuery, SearchResult } from '@/types/search.js';
import { withTransaction } from '@/database/transaction.js';
import { NotFoundError } from '@/utils/errors.js';
import { roundToTenth, toNumberOrNull } from '@/utils/numbers.js';
import { insertPhotoTags } from './tag.model.js';
import { buildPhotoSearch } from './photo.search.js';

// photo joined with owner + rating aggregate (average is computed on read)
const PHOTO_FROM = `
    FROM photos p
    JOIN users u ON u.id = p.owner_id
    LEFT JOIN (
        SELECT photo_id, AVG(score) AS average, COUNT(*) AS count
        FROM ratings
        GROUP BY photo_id
    ) r ON r.photo_id = p.id
`;

const PHOTO_SELECT = `
    SELECT p.id, p.owner_id, p.description, p.url, p.public_id, p.created_at, p.updated_at,
           u.username AS owner_username,
           COALESCE((
               SELECT ARRAY_AGG(t.name::text ORDER BY t.name)
               FROM photo_tags pt
               JOIN tags t ON t.id = pt.tag_id
               WHERE pt.photo_id = p.id
           ), '{}') AS tags,
           r.average AS average_rating,
           COALESCE(r.count, 0) AS ratings_count
    ${PHOTO_FROM}
`;

// raw row: pg returns NUMERIC / BIGINT aggregates as strings
type PhotoRow = Omit<PhotoPayload, 'average_rating' | 'ratings_count'> & {
    average_rating: string | null;
    ratings_count: string | number;
};

export function toPhotoPayload(row: PhotoRow): PhotoPayload {
    const average = toNumberOrNull(row.average_rating);

    return {
        ...row,
        average_rating: average === null ? null : roundToTenth(average),
        ratings_count: Number(row.ratings_count),
    };
}

export class PhotoModel implements PhotoRepository {
    constructor(private db: Pool) {}

    // photo row + tags in one transaction
    async create(data: NewPhoto): Promise<PhotoPayload> {
        const photo_id = await withTransaction(this.db, async (client) => {
            const result = await client.query<{ id: number }>(
                `INSERT INTO photos (owner_id, description, url, public_id)
                 VALUES ($1, $2, $3, $4)
                 RETURNING id`,
                [data.owner_id, data.description, data.url, data.public_id]
            );
            const inserted = result.rows[0];
            if (!inserted) {
                throw new Error('Photo INSERT failed');
            }

            await insertPhotoTags(client, inserted.id, data.tags);
            return inserted.id;
        });

        return this.require(photo_id);
    }

    async findById(id: number): Promise<PhotoPayload | null> {
        const result = await this.db.query<PhotoRow>(`${PHOTO_SELECT} WHERE p.id = $1`, [id]);
        const row = result.rows[0];
        return row ? toPhotoPayload(row) : null;
    }

    async updateDescription(id: number, description: string | null): Promise<PhotoPayload> {
        const result = await this.db.query(
            'UPDATE photos SET description = $2, updated_at = now() WHERE id = $1',
            [id, description]
        );
        if (result.rowCount === 0) {
            throw new NotFoundError('PHOTO_NOT_FOUND', 'Photo');
        }
        return this.require(id);
    }

    // comments, ratings, tag links and transformations cascade
    async delete(id: number): Promise<void> {
        const result = await this.db.query('DELETE FROM photos WHERE id = $1', [id]);
        if (result.rowCount === 0) {
            throw new NotFoundError('PHOTO_NOT_FOUND', 'Photo');
        }
    }

    async countByOwner(owner_id: number): Promise<number> {
        const result = await this.db.query<{ count: string }>(
            'SELECT COUNT(*) AS count FROM photos WHERE owner_id = $1',
            [owner_id]
        );
        return Number(result.rows[0]?.count ?? 0);
    }

    async search(query: PhotoSearchQuery): Promise<SearchResult<PhotoPayload>> {
        const { where, orderBy, values } = buildPhotoSearch(query);

        const countResult = await this.db.query<{ count: string }>(
            `SELECT COUNT(*) AS count ${PHOTO_FROM} ${where}`,
            values
        );
        const total = Number(countResult.rows[0]?.count ?? 0);
        if (total === 0) {
            return { items: [], total };
        }

        const limitIndex = values.length + 1;
        const result = await this.db.query<PhotoRow>(
            `${PHOTO_SELECT} ${where} ${orderBy} LIMIT $${limitIndex} OFFSET $${limitIndex + 1}`,
            [...values, query.limit, query.offset]
        );

        return { items: result.rows.map(toPhotoPayload), total };
    }

    private async require(id: number): Promise<PhotoPayload> {
        const photo = await this.findById(id);
        if (!photo) {
            throw new NotFoundError('PHOTO_NOT_FOUND', 'Photo');
        }
        return photo;
    }
}
