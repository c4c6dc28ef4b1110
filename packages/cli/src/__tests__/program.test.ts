/**
 * CLI Program Tests
 */

import { describe, it, expect, beforeAll, afterEach } from 'vitest';
import chalk from 'chalk';
import { InMemoryMetabaseGateway } from 'metabase-mcp-core';

import type { CommandContext } from '../commands/context.js';
import { createProgram } from '../program.js';

// ============================================================================
// Test Fixtures
// ============================================================================

interface Harness {
  gateway: InMemoryMetabaseGateway;
  lines: string[];
  errors: string[];
  run(...args: string[]): Promise<void>;
}

function harness(gateway: InMemoryMetabaseGateway): Harness {
  const lines: string[] = [];
  const errors: string[] = [];
  const context: CommandContext = {
    createGateway: () => gateway,
    output: {
      log: (line) => lines.push(line),
      error: (line) => errors.push(line),
    },
  };

  return {
    gateway,
    lines,
    errors,
    run: async (...args) => {
      await createProgram(context).parseAsync(args, { from: 'user' });
    },
  };
}

const pad = (value: string) => value.padStart(6);
const indent = ' '.repeat(10);

beforeAll(() => {
  chalk.level = 0;
});

afterEach(() => {
  process.exitCode = undefined;
});

// ============================================================================
// Tests
// ============================================================================

describe('collections command', () => {
  const collections = [
    { id: 1, name: 'Team Ops', description: 'Runbooks' },
    { id: 2, name: 'Sales' },
    { id: 3, name: 'Team Archive', archived: true },
  ];

  it('should print matching collections sorted by name', async () => {
    const cli = harness(new InMemoryMetabaseGateway({ 'GET /collection': collections }));

    await cli.run('collections', 'team');

    expect(cli.lines).toEqual([
      'Collections matching "team"',
      '',
      `  ${pad('3')}  Team Archive (archived)`,
      `  ${pad('1')}  Team Ops`,
      `${indent}Runbooks`,
      '',
      'Returned 2 of 2 matches (3 collections searched)',
    ]);
    expect(cli.errors).toEqual([]);
    expect(cli.gateway.isClosed).toBe(true);
  });

  it('should print JSON with --json and honour --limit', async () => {
    const cli = harness(new InMemoryMetabaseGateway({ 'GET /collection': collections }));

    await cli.run('collections', 'team', '--limit', '1', '--json');

    expect(cli.lines).toHaveLength(1);
    expect(JSON.parse(cli.lines[0] ?? '')).toMatchObject({
      query: 'team',
      collections: [{ collection_id: 3 }],
      results: { matched_collections: 2, returned_collections: 1 },
    });
  });

  it('should say when nothing matched', async () => {
    const cli = harness(new InMemoryMetabaseGateway({ 'GET /collection': collections }));

    await cli.run('collections', 'finance');

    expect(cli.lines[2]).toBe('  No collections matched.');
  });
});

describe('cards command', () => {
  const cards = [
    { id: 1, name: 'Revenue YTD', collection_id: 10, updated_at: '2024-01-01' },
    { id: 6, name: 'Net revenue', collection_id: 12, updated_at: '2024-08-20', description: 'After refunds' },
    { id: 7, name: 'Revenue (other team)', collection_id: 13, updated_at: '2024-09-01' },
  ];

  it('should print one page of cards with a hint for the next', async () => {
    const cli = harness(new InMemoryMetabaseGateway({ 'GET /card': cards }));

    await cli.run('cards', 'revenue', '--collections', '10,12', '--limit', '1');

    expect(cli.lines).toEqual([
      'Cards matching "revenue" in collections 10, 12',
      '',
      `  ${pad('6')}  Net revenue  collection 12, updated 2024-08-20`,
      `${indent}After refunds`,
      '',
      'Showing 1-1 of 2',
      'More results: --offset 1',
    ]);
  });

  it('should reject a malformed collection list', async () => {
    const cli = harness(new InMemoryMetabaseGateway({ 'GET /card': cards }));

    await cli.run('cards', 'revenue', '--collections', 'a,b');

    expect(cli.errors).toEqual(['Error: --collections must be a comma-separated list of integer ids (got a,b)']);
    expect(process.exitCode).toBe(1);
    expect(cli.gateway.calls).toHaveLength(0);
    expect(cli.gateway.isClosed).toBe(true);
  });

  it('should report invalid pagination', async () => {
    const cli = harness(new InMemoryMetabaseGateway({ 'GET /card': cards }));

    await cli.run('cards', 'revenue', '--collections', '10', '--limit', '0');

    expect(cli.errors).toEqual(['Error: limit must be an integer >= 1 (got 0)']);
    expect(process.exitCode).toBe(1);
  });

  it('should report errors as JSON with --json', async () => {
    const cli = harness(new InMemoryMetabaseGateway({ 'GET /card': cards }));

    await cli.run('cards', 'revenue', '--collections', '10', '--offset', 'x', '--json');

    expect(cli.lines).toEqual([JSON.stringify({ error: '--offset must be an integer (got x)' })]);
    expect(process.exitCode).toBe(1);
  });
});

describe('discover command', () => {
  it('should search the cards of the matching collections', async () => {
    const cli = harness(
      new InMemoryMetabaseGateway({
        'GET /collection': [
          { id: 10, name: 'Finance' },
          { id: 11, name: 'Product' },
        ],
        'GET /card': [
          { id: 1, name: 'Finance KPIs', collection_id: 10, updated_at: '2024-05-01' },
          { id: 2, name: 'Finance roadmap', collection_id: 11, updated_at: '2024-06-01' },
        ],
      })
    );

    await cli.run('discover', 'finance', '--json');

    expect(JSON.parse(cli.lines[0] ?? '')).toMatchObject({
      query: 'finance',
      collections: { results: { returned_collections: 1 } },
      search: { collections_searched: [10], cards: [{ id: 1, name: 'Finance KPIs' }] },
    });
  });

  it('should print both stages', async () => {
    const cli = harness(
      new InMemoryMetabaseGateway({
        'GET /collection': [{ id: 10, name: 'Finance' }],
        'GET /card': [],
      })
    );

    await cli.run('discover', 'finance');

    expect(cli.lines).toEqual([
      'Collections matching "finance"',
      '',
      `  ${pad('10')}  Finance`,
      '',
      'Returned 1 of 1 matches (1 collections searched)',
      '',
      'Cards matching "finance" in collections 10',
      '',
      '  No cards matched.',
      '',
      '0 matching cards',
    ]);
  });
});
