/**
 * Discover Command
 *
 * Find matching collections, then search their cards for the same query.
 *
 * Usage:
 *   metabase-cli discover revenue
 *   metabase-cli discover revenue --limit-collections 3 --limit 10
 */

import { Command } from 'commander';
import { discoverCards } from 'metabase-mcp-core';

import { parseInteger, withGateway, type CommandContext } from './context.js';
import { printCards, printCollections } from './format.js';

interface DiscoverOptions {
  limitCollections?: string;
  limit?: string;
  offset?: string;
  json?: boolean;
}

export function createDiscoverCommand(context: CommandContext): Command {
  return new Command('discover')
    .description('Find matching collections and search their cards')
    .argument('<query>', 'Text to look for')
    .option('--limit-collections <number>', 'Maximum collections to search (default: 10)')
    .option('-l, --limit <number>', 'Card page size (default: 25)')
    .option('-o, --offset <number>', 'Cards to skip (default: 0)')
    .option('-j, --json', 'Output as JSON')
    .action(async (query: string, options: DiscoverOptions) => {
      const jsonOutput = options.json ?? false;

      await withGateway(context, jsonOutput, async (gateway) => {
        const result = await discoverCards(gateway, query, {
          limitCollections: parseInteger('limit-collections', options.limitCollections),
          limit: parseInteger('limit', options.limit),
          offset: parseInteger('offset', options.offset),
        });

        if (jsonOutput) {
          context.output.log(JSON.stringify(result, null, 2));
          return;
        }

        printCollections(result.collections, context.output);
        context.output.log('');
        printCards(result.search, context.output);
      });
    });
}
