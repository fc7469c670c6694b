export type SortField = 'created_at' | 'rating';
export type SortOrder = 'asc' | 'desc';

// raw query string accepted by GET /photos
export type PhotoSearchParams = {
    keyword?: string;
    tag?: string;
    min_rating?: number;
    max_rating?: number;
    date_from?: string;
    date_to?: string;
    uploader?: string;
    user_id?: number;
    sort_by: SortField;
    sort_order: SortOrder;
    page: number;
    size: number;
};

// normalized query handed to the photo repository
export type PhotoSearchQuery = {
    keyword?: string;
    tag?: string;
    minRating?: number;
    maxRating?: number;
    dateFrom?: Date;
    dateTo?: Date;
    uploader?: string;
    userId?: number;
    sortBy: SortField;
    order: SortOrder;
    limit: number;
    offset: number;
};

export type SearchResult<T> = {
    items: T[];
    total: number;
};
