import type { PhotoPayload } from '@/types/models.js';
import type { PhotoRepository, UserRepository } from '@/types/repositories.js';
import type { PhotoSearchParams, PhotoSearchQuery } from '@/types/search.js';
import { NotFoundError, ValidationError } from '@/utils/errors.js';
import { debugPrint } from '@/utils/debug.print.js';
import { normalizeTags } from './tag.service.js';
import { toLimitOffset, toPage } from './paginate.utils.js';
import type { Page, PageRequest } from './paginate.utils.js';

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

// empty strings are treated as absent filters
function optionalText(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

export function parseDateBound(value: string | undefined, field: string, endOfDay = false): Date | undefined {
    const text = optionalText(value);
    if (text === undefined) return undefined;

    const date = new Date(text);
    if (Number.isNaN(date.getTime())) {
        throw new ValidationError('INVALID_DATE', `${field} must be an ISO 8601 date`);
    }
    // a plain date as upper bound covers the whole day (UTC)
    if (endOfDay && DATE_ONLY.test(text)) {
        date.setUTCHours(23, 59, 59, 999);
    }
    return date;
}

export class SearchService {
    constructor(
        private photos: PhotoRepository,
        private users: UserRepository
    ) {}

    // raw query string -> normalized repository query
    toQuery(params: PhotoSearchParams): PhotoSearchQuery {
        const { min_rating, max_rating } = params;
        if (min_rating !== undefined && max_rating !== undefined && min_rating > max_rating) {
            throw new ValidationError('INVALID_RATING_RANGE', 'min_rating cannot exceed max_rating');
        }

        const dateFrom = parseDateBound(params.date_from, 'date_from');
        const dateTo = parseDateBound(params.date_to, 'date_to', true);
        if (dateFrom && dateTo && dateFrom > dateTo) {
            throw new ValidationError('INVALID_DATE_RANGE', 'date_from cannot be after date_to');
        }

        const tag = params.tag !== undefined ? normalizeTags([params.tag])[0] : undefined;

        return {
            keyword: optionalText(params.keyword),
            tag,
            minRating: min_rating,
            maxRating: max_rating,
            dateFrom,
            dateTo,
            uploader: optionalText(params.uploader),
            userId: params.user_id,
            sortBy: params.sort_by,
            order: params.sort_order,
            ...toLimitOffset(params),
        };
    }

    async search(params: PhotoSearchParams): Promise<Page<PhotoPayload>> {
        const query = this.toQuery(params);
        debugPrint(query, 'SearchService.search');

        const result = await this.photos.search(query);
        return toPage(result, params);
    }

    // newest first
    async listUserPhotos(user_id: number, page: PageRequest): Promise<Page<PhotoPayload>> {
        const user = await this.users.findById(user_id);
        if (!user) {
            throw new NotFoundError('USER_NOT_FOUND', 'User');
        }

        const result = await this.photos.search({
            userId: user_id,
            sortBy: 'created_at',
            order: 'desc',
            ...toLimitOffset(page),
        });
        return toPage(result, page);
    }
}
