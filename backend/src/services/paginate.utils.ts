import type { SearchResult } from '@/types/search.js';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export type PageRequest = {
    page: number;
    size: number;
};

export type Page<T> = {
    items: T[];
    total: number;
    page: number;
    size: number;
    pages: number;
};

// helper for offset pagination: page is 1-based
export function toLimitOffset({ page, size }: PageRequest): { limit: number; offset: number } {
    return {
        limit: size,
        offset: (page - 1) * size,
    };
}

export function toPage<T>(result: SearchResult<T>, { page, size }: PageRequest): Page<T> {
    return {
        items: result.items,
        total: result.total,
        page,
        size,
        pages: Math.ceil(result.total / size),
    };
}
