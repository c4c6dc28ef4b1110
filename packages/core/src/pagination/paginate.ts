/**
 * Pagination
 *
 * Shared limit/offset slicing for card listing and card search.
 *
 * @module pagination/paginate
 */

export interface PaginationOptions {
  /** Page size; an integer >= 1 */
  limit: number;

  /** Number of items to skip; an integer >= 0 */
  offset: number;
}

export interface Page<T> {
  page: T[];
  total: number;
  hasMore: boolean;
}

export class PaginationError extends RangeError {
  constructor(
    public readonly field: 'limit' | 'offset',
    public readonly value: number
  ) {
    super(
      field === 'limit'
        ? `limit must be an integer >= 1 (got ${value})`
        : `offset must be an integer >= 0 (got ${value})`
    );
    this.name = 'PaginationError';
  }
}

export function validatePagination(options: PaginationOptions): void {
  if (!Number.isInteger(options.limit) || options.limit < 1) {
    throw new PaginationError('limit', options.limit);
  }
  if (!Number.isInteger(options.offset) || options.offset < 0) {
    throw new PaginationError('offset', options.offset);
  }
}

/**
 * Slice `items[offset, offset + limit)`. `hasMore` is true while items
 * remain past the page.
 *
 * @throws PaginationError for a limit below 1 or a negative offset
 */
export function paginate<T>(items: readonly T[], options: PaginationOptions): Page<T> {
  validatePagination(options);
  const { limit, offset } = options;
  return {
    page: items.slice(offset, offset + limit),
    total: items.length,
    hasMore: offset + limit < items.length,
  };
}
