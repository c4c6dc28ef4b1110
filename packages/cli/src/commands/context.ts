/**
 * Shared command plumbing: where output goes, how a gateway is obtained and
 * how failures are reported.
 */

import chalk from 'chalk';
import type { IMetabaseGateway } from 'metabase-mcp-core';

import { createCLIGateway } from '../services/gateway-factory.js';

export interface CommandOutput {
  log(line: string): void;
  error(line: string): void;
}

export interface CommandContext {
  createGateway: () => IMetabaseGateway;
  output: CommandOutput;
}

export const consoleOutput: CommandOutput = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

export function defaultCommandContext(): CommandContext {
  return {
    createGateway: () => createCLIGateway(),
    output: consoleOutput,
  };
}

/**
 * Run `action` against a fresh gateway, closing it afterwards. Failures are
 * printed and set a non-zero exit code.
 */
export async function withGateway(
  context: CommandContext,
  jsonOutput: boolean,
  action: (gateway: IMetabaseGateway) => Promise<void>
): Promise<void> {
  let gateway: IMetabaseGateway | undefined;
  try {
    gateway = context.createGateway();
    await action(gateway);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (jsonOutput) {
      context.output.log(JSON.stringify({ error: message }));
    } else {
      context.output.error(chalk.red(`Error: ${message}`));
    }
    process.exitCode = 1;
  } finally {
    await gateway?.close();
  }
}

export function parseInteger(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new Error(`--${flag} must be an integer (got ${value})`);
  }
  return parsed;
}

/**
 * Parse `--collections 1,2,3`.
 */
export function parseCollectionIds(value: string): number[] {
  const parts = value.split(',').map((part) => part.trim()).filter((part) => part !== '');
  const ids = parts.map(Number);
  if (ids.length === 0 || !ids.every((id) => Number.isInteger(id))) {
    throw new Error(`--collections must be a comma-separated list of integer ids (got ${value})`);
  }
  return ids;
}
