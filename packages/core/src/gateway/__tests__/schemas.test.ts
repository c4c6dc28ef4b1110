/**
 * Upstream Payload Decoding Tests
 */

import { describe, it, expect } from 'vitest';

import { decodeCards, decodeCollections } from '../../index.js';

describe('decodeCollections', () => {
  it('should report a non-list payload as malformed', () => {
    expect(decodeCollections({ data: [] })).toEqual({ kind: 'malformed', received: 'object' });
    expect(decodeCollections(null)).toEqual({ kind: 'malformed', received: 'null' });
  });

  it('should skip null entries but count them in the total', () => {
    const decoded = decodeCollections([null, { id: 4, name: 'Ops' }, 'junk']);

    expect(decoded).toEqual({
      kind: 'list',
      total: 3,
      items: [{ id: 4, name: 'Ops', description: null, parent_id: null, archived: false }],
    });
  });

  it('should default wrongly typed fields instead of failing', () => {
    const decoded = decodeCollections([
      { id: 'root', name: 42, description: 'Top level', archived: 'yes', parent_id: '3' },
    ]);

    expect(decoded).toEqual({
      kind: 'list',
      total: 1,
      items: [{ id: 'root', name: null, description: 'Top level', parent_id: null, archived: false }],
    });
  });
});

describe('decodeCards', () => {
  it('should keep only the projected fields', () => {
    const decoded = decodeCards([
      {
        id: 1,
        name: 'Revenue YTD',
        description: null,
        collection_id: 10,
        created_at: '2023-12-01',
        updated_at: '2024-01-01',
        dataset_query: { type: 'native' },
      },
    ]);

    expect(decoded).toEqual({
      kind: 'list',
      total: 1,
      items: [
        {
          id: 1,
          name: 'Revenue YTD',
          description: null,
          collection_id: 10,
          created_at: '2023-12-01',
          updated_at: '2024-01-01',
        },
      ],
    });
  });
});
