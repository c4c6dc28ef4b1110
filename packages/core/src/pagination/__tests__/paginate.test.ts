/**
 * Pagination Tests
 */

import { describe, it, expect } from 'vitest';

import { PaginationError, paginate } from '../../index.js';

const ITEMS = ['a', 'b', 'c', 'd', 'e'];

describe('paginate', () => {
  it('should return the first page and report more', () => {
    expect(paginate(ITEMS, { limit: 2, offset: 0 })).toEqual({ page: ['a', 'b'], total: 5, hasMore: true });
  });

  it('should report no more on the last full page', () => {
    expect(paginate(ITEMS, { limit: 2, offset: 3 })).toEqual({ page: ['d', 'e'], total: 5, hasMore: false });
  });

  it('should return an empty page past the end', () => {
    expect(paginate(ITEMS, { limit: 10, offset: 8 })).toEqual({ page: [], total: 5, hasMore: false });
  });

  it('should keep has_more exactly offset + limit < total', () => {
    for (let offset = 0; offset <= 6; offset++) {
      for (let limit = 1; limit <= 6; limit++) {
        const result = paginate(ITEMS, { limit, offset });
        expect(result.hasMore).toBe(offset + limit < ITEMS.length);
        expect(result.page.length).toBeLessThanOrEqual(limit);
      }
    }
  });

  it('should reject a limit below one', () => {
    expect(() => paginate(ITEMS, { limit: 0, offset: 0 })).toThrow(PaginationError);
    expect(() => paginate(ITEMS, { limit: -1, offset: 0 })).toThrow('limit must be an integer >= 1 (got -1)');
  });

  it('should reject a negative or fractional offset', () => {
    expect(() => paginate(ITEMS, { limit: 2, offset: -2 })).toThrow('offset must be an integer >= 0 (got -2)');
    expect(() => paginate(ITEMS, { limit: 2, offset: 1.5 })).toThrow(PaginationError);
  });
});
