import type { PhotoSearchQuery } from '@/types/search.js';

/**========================================================================
 **                       PHOTO SEARCH: SQL BUILDER
 *? turns a normalized search query into a WHERE clause + ORDER BY
 *? column aliases match PHOTO_FROM in photo.model.ts:
 *?   p = photos, u = users (owner), r = rating aggregate
 *========================================================================**/

export type SqlFilter = {
    conditions: string[];
    values: unknown[];
};

export type PhotoSearchSql = SqlFilter & {
    where: string;
    orderBy: string;
};

// LIKE wildcards in user input match literally
export function escapeLike(value: string): string {
    return value.replace(/[\\%_]/g, match => `\\${match}`);
}

export function buildPhotoFilter(query: PhotoSearchQuery): SqlFilter {
    const conditions: string[] = [];
    const values: unknown[] = [];

    // push a value and return its $n placeholder
    const param = (value: unknown) => {
        values.push(value);
        return `$${values.length}`;
    };

    if (query.keyword !== undefined) {
        conditions.push(`p.description ILIKE ${param(`%${escapeLike(query.keyword)}%`)}`);
    }
    if (query.tag !== undefined) {
        conditions.push(
            'EXISTS (SELECT 1 FROM photo_tags pt JOIN tags t ON t.id = pt.tag_id'
            + ` WHERE pt.photo_id = p.id AND t.name = ${param(query.tag)})`
        );
    }
    // bounds apply to the average as reported (one decimal); unrated photos fail both
    if (query.minRating !== undefined) {
        conditions.push(`ROUND(r.average, 1) >= ${param(query.minRating)}`);
    }
    if (query.maxRating !== undefined) {
        conditions.push(`ROUND(r.average, 1) <= ${param(query.maxRating)}`);
    }
    if (query.dateFrom !== undefined) {
        conditions.push(`p.created_at >= ${param(query.dateFrom)}`);
    }
    if (query.dateTo !== undefined) {
        conditions.push(`p.created_at <= ${param(query.dateTo)}`);
    }
    if (query.uploader !== undefined) {
        conditions.push(`u.username = ${param(query.uploader)}`);
    }
    if (query.userId !== undefined) {
        conditions.push(`p.owner_id = ${param(query.userId)}`);
    }

    return { conditions, values };
}

export function buildPhotoOrder(query: Pick<PhotoSearchQuery, 'sortBy' | 'order'>): string {
    const direction = query.order === 'asc' ? 'ASC' : 'DESC';

    if (query.sortBy === 'rating') {
        return `r.average ${direction} NULLS LAST, p.id ${direction}`;
    }
    return `p.created_at ${direction}, p.id ${direction}`;
}

export function buildPhotoSearch(query: PhotoSearchQuery): PhotoSearchSql {
    const { conditions, values } = buildPhotoFilter(query);

    return {
        conditions,
        values,
        where: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
        orderBy: `ORDER BY ${buildPhotoOrder(query)}`
    };
}
