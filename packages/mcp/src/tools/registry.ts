/**
 * Tool Registry
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';

import { AUTHORING_TOOLS } from './authoring/index.js';
import { DISCOVERY_TOOLS } from './discovery/index.js';
import { EXECUTION_TOOLS } from './execution/index.js';
import { EXPLORATION_TOOLS } from './exploration/index.js';

/**
 * All tools, in the order they are listed to clients
 */
export const ALL_TOOLS: Tool[] = [
  ...DISCOVERY_TOOLS,
  ...EXPLORATION_TOOLS,
  ...EXECUTION_TOOLS,
  ...AUTHORING_TOOLS,
];

export const TOOL_NAMES: ReadonlySet<string> = new Set(ALL_TOOLS.map((tool) => tool.name));
