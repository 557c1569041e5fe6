/**
 * Offset/limit pagination over an in-memory result list.
 */

export const DEFAULT_LIMIT = 100;
export const DEFAULT_OFFSET = 0;

export interface PaginationParams {
    /** Maximum number of items to return (>= 1) */
    limit: number;
    /** Number of items to skip (>= 0) */
    offset: number;
}

export interface Page<T> {
    data: T[];
    /** Length of the full list, before slicing */
    total: number;
    limit: number;
    offset: number;
}

/**
 * Returns the slice [offset, offset + limit) of the given items.
 * The input list is never mutated; an offset past the end yields an empty page.
 */
export function paginate<T>(items: readonly T[], params: PaginationParams): Page<T> {
    const { limit, offset } = params;
    return {
        data: items.slice(offset, offset + limit),
        total: items.length,
        limit,
        offset,
    };
}
