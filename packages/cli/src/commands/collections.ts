/**
 * Collections Command
 *
 * Find collections whose name or description contains a query.
 *
 * Usage:
 *   metabase-cli collections finance              # Up to 10 matches
 *   metabase-cli collections finance --limit 3    # Fewer matches
 *   metabase-cli collections finance --json       # Output as JSON
 */

import { Command } from 'commander';
import { findCandidateCollections } from 'metabase-mcp-core';

import { parseInteger, withGateway, type CommandContext } from './context.js';
import { printCollections } from './format.js';

interface CollectionsOptions {
  limit?: string;
  json?: boolean;
}

export function createCollectionsCommand(context: CommandContext): Command {
  return new Command('collections')
    .description('Find collections whose name or description contains the query')
    .argument('<query>', 'Text to look for')
    .option('-l, --limit <number>', 'Maximum collections to show (default: 10)')
    .option('-j, --json', 'Output as JSON')
    .action(async (query: string, options: CollectionsOptions) => {
      const jsonOutput = options.json ?? false;

      await withGateway(context, jsonOutput, async (gateway) => {
        const result = await findCandidateCollections(gateway, query, {
          limitCollections: parseInteger('limit', options.limit),
        });

        if (jsonOutput) {
          context.output.log(JSON.stringify(result, null, 2));
        } else {
          printCollections(result, context.output);
        }
      });
    });
}
