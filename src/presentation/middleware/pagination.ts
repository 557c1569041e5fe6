import { Request } from 'express';
import { DEFAULT_LIMIT, DEFAULT_OFFSET, PaginationParams } from '../../domain/entities/Pagination';
import { ValidationError } from './errorHandler';

const INTEGER_PATTERN = /^\d+$/;

/**
 * Reads `limit` and `offset` from the query string.
 * @throws ValidationError when a value is not a whole number in range
 */
export function parsePagination(query: Request['query']): PaginationParams {
    return {
        limit: readInteger(query.limit, 'limit', DEFAULT_LIMIT, 1),
        offset: readInteger(query.offset, 'offset', DEFAULT_OFFSET, 0),
    };
}

function readInteger(raw: unknown, name: string, defaultValue: number, min: number): number {
    // ?limit=5&limit=10 arrives as an array; the last value wins
    const value: unknown = Array.isArray(raw) ? raw[raw.length - 1] : raw;

    if (value === undefined) {
        return defaultValue;
    }
    if (typeof value !== 'string' || !INTEGER_PATTERN.test(value.trim())) {
        throw new ValidationError(`${name} must be an integer >= ${min}`);
    }

    // Oversized values still page correctly once clamped
    const parsed = Math.min(Number.parseInt(value.trim(), 10), Number.MAX_SAFE_INTEGER);
    if (parsed < min) {
        throw new ValidationError(`${name} must be an integer >= ${min}`);
    }
    return parsed;
}
