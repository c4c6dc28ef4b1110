export { createCollectionsCommand } from './collections.js';
export { createCardsCommand } from './cards.js';
export { createDiscoverCommand } from './discover.js';
export {
  consoleOutput,
  defaultCommandContext,
  parseCollectionIds,
  parseInteger,
  withGateway,
} from './context.js';
export type { CommandContext, CommandOutput } from './context.js';
export { printCards, printCollections } from './format.js';
