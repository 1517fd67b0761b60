/**
 * @fileoverview Offset pagination over in-memory lists
 */

export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

/** One page of a listing */
export interface Page<T> {
    content: T[];
    /** Zero-based page index */
    page: number;
    size: number;
    totalElements: number;
    totalPages: number;
    first: boolean;
    last: boolean;
}

/**
 * Slices an already sorted list. A page past the end is empty.
 */
export function paginate<T>(items: readonly T[], page: number, size: number): Page<T> {
    const totalElements = items.length;
    const totalPages = Math.ceil(totalElements / size);
    const start = page * size;

    return {
        content: items.slice(start, start + size),
        page,
        size,
        totalElements,
        totalPages,
        first: page === 0,
        last: page >= totalPages - 1,
    };
}

/** Applies the default and the cap to a requested size */
export function clampPageSize(size: number | undefined): number {
    return Math.min(size ?? DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE);
}
