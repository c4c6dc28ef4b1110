/**
 * CLI Program
 */

import { Command } from 'commander';

import { createCardsCommand } from './commands/cards.js';
import { createCollectionsCommand } from './commands/collections.js';
import { defaultCommandContext, type CommandContext } from './commands/context.js';
import { createDiscoverCommand } from './commands/discover.js';

export const CLI_VERSION = '0.1.0';

export function createProgram(context: CommandContext = defaultCommandContext()): Command {
  return new Command('metabase-cli')
    .description('Discover Metabase collections and search their cards')
    .version(CLI_VERSION)
    .addCommand(createCollectionsCommand(context))
    .addCommand(createCardsCommand(context))
    .addCommand(createDiscoverCommand(context));
}
