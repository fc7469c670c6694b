import type { Pool, PoolClient } from 'pg';
import type { TagRepository } from '@/types/repositories.js';
import { withTransaction } from '@/database/transaction.js';
import { NotFoundError, ValidationError } from '@/utils/errors.js';

/**============================================
 *     HELPERS (run on a transaction client)
 *=============================================**/

// create missing tags and link every name to the photo; existing links are kept
export async function insertPhotoTags(client: PoolClient, photo_id: number, names: string[]) {
    if (names.length === 0) return;

    await client.query(
        `INSERT INTO tags (name)
         SELECT unnest($1::text[])
         ON CONFLICT (name) DO NOTHING`,
        [names]
    );

    await client.query(
        `INSERT INTO photo_tags (photo_id, tag_id)
         SELECT $1, t.id FROM tags t WHERE t.name = ANY($2::text[])
         ON CONFLICT DO NOTHING`,
        [photo_id, names]
    );
}

export async function deletePhotoTags(client: PoolClient, photo_id: number, names: string[]) {
    if (names.length === 0) return;

    await client.query(
        `DELETE FROM photo_tags pt
         USING tags t
         WHERE pt.tag_id = t.id AND pt.photo_id = $1 AND t.name = ANY($2::text[])`,
        [photo_id, names]
    );
}

export async function selectPhotoTags(client: PoolClient, photo_id: number): Promise<string[]> {
    const result = await client.query<{ name: string }>(
        `SELECT t.name FROM photo_tags pt
         JOIN tags t ON t.id = pt.tag_id
         WHERE pt.photo_id = $1
         ORDER BY t.name`,
        [photo_id]
    );
    return result.rows.map(row => row.name);
}

export class TagModel implements TagRepository {
    constructor(private db: Pool) {}

    /**========================================================================
     **                        UPDATE PHOTO TAGS
     *? 1. lock the photo row so concurrent tag edits serialize
     *? 2. delete photo_tags for removed tags
     *? 3. ensure inserted tags exist + link them (duplicates ignored)
     *? 4. re-check the limit on the final set; rollback if exceeded
     *========================================================================**/
    async updatePhotoTags(
        photo_id: number,
        tags_to_insert: string[],
        tags_to_remove: string[],
        maxTags: number
    ): Promise<string[]> {
        return withTransaction(this.db, async (client) => {
            const locked = await client.query(
                'SELECT id FROM photos WHERE id = $1 FOR UPDATE',
                [photo_id]
            );
            if (locked.rowCount === 0) {
                throw new NotFoundError('PHOTO_NOT_FOUND', 'Photo');
            }

            await deletePhotoTags(client, photo_id, tags_to_remove);
            await insertPhotoTags(client, photo_id, tags_to_insert);

            const finalTags = await selectPhotoTags(client, photo_id);
            if (finalTags.length > maxTags) {
                throw new ValidationError('TOO_MANY_TAGS', `A photo can have at most ${maxTags} tags`);
            }
            return finalTags;
        });
    }
}
