/**
 * Search and Collection Operation Tests
 */

import { describe, it, expect } from 'vitest';

import { InMemoryMetabaseGateway, createCollection, listCollections, searchMetabase } from '../../index.js';

describe('searchMetabase', () => {
  it('should send the search parameters and summarise the result', async () => {
    const gateway = new InMemoryMetabaseGateway({
      'GET /search': { data: [{ id: 1, model: 'card' }, { id: 2, model: 'card' }], total: 2 },
    });

    const result = await searchMetabase(gateway, 'orders', { models: ['card', 'dashboard'], limit: 5 });

    expect(gateway.calls[0]?.options.query).toEqual({
      q: 'orders',
      limit: 5,
      archived: 'false',
      search_native_query: undefined,
      models: ['card', 'dashboard'],
    });
    expect(result).toEqual({
      data: [{ id: 1, model: 'card' }, { id: 2, model: 'card' }],
      total: 2,
      search_info: { query: 'orders', limit: 5, models: ['card', 'dashboard'], total_results: 2 },
    });
  });

  it('should enable native query search only when asked', async () => {
    const gateway = new InMemoryMetabaseGateway({ 'GET /search': { data: [] } });

    await searchMetabase(gateway, 'select', { searchNativeQuery: true, archived: true });

    expect(gateway.calls[0]?.options.query).toMatchObject({
      archived: 'true',
      search_native_query: 'true',
      limit: 20,
    });
  });

  it('should wrap a bare list', async () => {
    const gateway = new InMemoryMetabaseGateway({ 'GET /search': [{ id: 3 }] });

    expect(await searchMetabase(gateway, 'x')).toEqual({
      data: [{ id: 3 }],
      search_info: { query: 'x', limit: 20, models: null, total_results: 1 },
    });
  });
});

describe('collections', () => {
  it('should list collections unchanged', async () => {
    const gateway = new InMemoryMetabaseGateway({ 'GET /collection': [{ id: 'root', name: 'Our analytics' }] });

    expect(await listCollections(gateway)).toEqual([{ id: 'root', name: 'Our analytics' }]);
  });

  it('should create a nested collection with a numeric parent id', async () => {
    const gateway = new InMemoryMetabaseGateway({ 'POST /collection': { id: 40 } });

    await createCollection(gateway, { name: 'Ops', color: '#509EE3', parentId: 12 });

    expect(gateway.calls[0]?.options.body).toEqual({ name: 'Ops', color: '#509EE3', parent_id: 12 });
  });

  it('should send only the name when nothing else is given', async () => {
    const gateway = new InMemoryMetabaseGateway({ 'POST /collection': { id: 41 } });

    await createCollection(gateway, { name: 'Scratch' });

    expect(gateway.calls[0]?.options.body).toEqual({ name: 'Scratch' });
  });
});
