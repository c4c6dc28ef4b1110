/**
 * Cards Command
 *
 * Search cards inside specific collections.
 *
 * Usage:
 *   metabase-cli cards revenue --collections 10,12
 *   metabase-cli cards revenue --collections 10 --limit 5 --offset 5
 *   metabase-cli cards revenue --collections 10 --json
 */

import { Command } from 'commander';
import { searchCardsInCollections } from 'metabase-mcp-core';

import { parseCollectionIds, parseInteger, withGateway, type CommandContext } from './context.js';
import { printCards } from './format.js';

interface CardsOptions {
  collections: string;
  limit?: string;
  offset?: string;
  json?: boolean;
}

export function createCardsCommand(context: CommandContext): Command {
  return new Command('cards')
    .description('Search cards by name or description within collections')
    .argument('<query>', 'Text to look for')
    .requiredOption('-c, --collections <ids>', 'Comma-separated collection ids')
    .option('-l, --limit <number>', 'Page size (default: 25)')
    .option('-o, --offset <number>', 'Matches to skip (default: 0)')
    .option('-j, --json', 'Output as JSON')
    .action(async (query: string, options: CardsOptions) => {
      const jsonOutput = options.json ?? false;

      await withGateway(context, jsonOutput, async (gateway) => {
        const collectionIds = parseCollectionIds(options.collections);
        const result = await searchCardsInCollections(gateway, query, collectionIds, {
          limit: parseInteger('limit', options.limit),
          offset: parseInteger('offset', options.offset),
        });

        if (jsonOutput) {
          context.output.log(JSON.stringify(result, null, 2));
        } else {
          printCards(result, context.output);
        }
      });
    });
}
