/**
 * Human-readable output for discovery results
 */

import chalk from 'chalk';
import type { CardSearchResult, CollectionDiscoveryResult } from 'metabase-mcp-core';

import type { CommandOutput } from './context.js';

const ID_WIDTH = 6;

export function printCollections(result: CollectionDiscoveryResult, output: CommandOutput): void {
  const { results } = result;

  output.log(chalk.bold(`Collections matching "${result.query}"`));
  output.log('');

  if (result.collections.length === 0) {
    output.log(chalk.yellow('  No collections matched.'));
  }

  for (const collection of result.collections) {
    const archived = collection.archived ? chalk.gray(' (archived)') : '';
    output.log(
      `  ${chalk.cyan(String(collection.collection_id).padStart(ID_WIDTH))}  ${collection.collection_name ?? '(unnamed)'}${archived}`
    );
    if (collection.description) {
      output.log(chalk.gray(`  ${' '.repeat(ID_WIDTH)}  ${collection.description}`));
    }
  }

  output.log('');
  output.log(
    chalk.gray(
      `Returned ${results.returned_collections} of ${results.matched_collections} matches ` +
        `(${results.total_collections_searched} collections searched)`
    )
  );
}

export function printCards(result: CardSearchResult, output: CommandOutput): void {
  const { pagination } = result;

  output.log(chalk.bold(`Cards matching "${result.query}" in collections ${result.collections_searched.join(', ')}`));
  output.log('');

  if (result.cards.length === 0) {
    output.log(chalk.yellow('  No cards matched.'));
  }

  for (const card of result.cards) {
    const details = `collection ${card.collection_id ?? 'none'}, updated ${card.updated_at ?? 'never'}`;
    output.log(
      `  ${chalk.cyan(String(card.id ?? '?').padStart(ID_WIDTH))}  ${card.name ?? '(unnamed)'}  ${chalk.gray(details)}`
    );
    if (card.description) {
      output.log(chalk.gray(`  ${' '.repeat(ID_WIDTH)}  ${card.description}`));
    }
  }

  output.log('');
  if (pagination.returned > 0) {
    const first = pagination.offset + 1;
    const last = pagination.offset + pagination.returned;
    output.log(chalk.gray(`Showing ${first}-${last} of ${pagination.total_found}`));
  } else {
    output.log(chalk.gray(`${pagination.total_found} matching cards`));
  }
  if (pagination.has_more) {
    output.log(chalk.gray(`More results: --offset ${pagination.offset + pagination.returned}`));
  }
}
