#!/usr/bin/env node
/**
 * metabase-cli entry point
 *
 * Reads METABASE_URL and credentials from the environment.
 */

import { createProgram } from '../program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  });
