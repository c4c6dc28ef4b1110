/**
 * Database, Table and Query Operations
 *
 * @module catalog/databases
 */

import { z } from 'zod';

import { isRecord } from '../gateway/schemas.js';
import type { IMetabaseGateway } from '../gateway/types.js';

export const DEFAULT_FIELD_LIMIT = 20;

const TableSchema = z.object({
  id: z.number().nullable().optional().catch(null),
  display_name: z.string().nullable().optional().catch(null),
  description: z.string().nullable().optional().catch(null),
  entity_type: z.string().nullable().optional().catch(null),
});

export interface TableSummary {
  table_id: number | null;
  display_name: string | null;
  description: string;
  entity_type: string | null;
}

export interface NativeQueryInput {
  databaseId: number;
  query: string;
  parameters?: Record<string, unknown>[] | undefined;
}

export async function listDatabases(gateway: IMetabaseGateway): Promise<unknown> {
  return gateway.request('GET', '/database');
}

/**
 * Extract the table summaries from a `/database/:id/metadata` payload,
 * sorted by display name.
 */
export function summarizeTables(metadata: unknown): TableSummary[] {
  const tables = isRecord(metadata) && Array.isArray(metadata['tables']) ? metadata['tables'] : [];
  const summaries: TableSummary[] = [];

  for (const entry of tables) {
    if (!isRecord(entry)) {
      continue;
    }
    const table = TableSchema.parse(entry);
    summaries.push({
      table_id: table.id ?? null,
      display_name: table.display_name ?? null,
      description: table.description || 'No description',
      entity_type: table.entity_type ?? null,
    });
  }

  return summaries.sort((a, b) => {
    const left = a.display_name ?? '';
    const right = b.display_name ?? '';
    return left < right ? -1 : left > right ? 1 : 0;
  });
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|');
}

export function formatTablesMarkdown(databaseId: number, tables: readonly TableSummary[]): string {
  let output = `# Tables in Database ${databaseId}\n\n`;
  output += `**Total Tables:** ${tables.length}\n\n`;

  if (tables.length === 0) {
    output += '*No tables found in this database.*\n';
    return output;
  }

  output += '| Table ID | Display Name | Description | Entity Type |\n';
  output += '|----------|--------------|-------------|--------------|\n';

  for (const table of tables) {
    const id = table.table_id ?? 'N/A';
    const name = escapeCell(table.display_name ?? 'N/A');
    const description = escapeCell(table.description);
    const entityType = table.entity_type ?? 'N/A';
    output += `| ${id} | ${name} | ${description} | ${entityType} |\n`;
  }

  return output;
}

/**
 * List the tables of a database as a Markdown table.
 */
export async function listTables(gateway: IMetabaseGateway, databaseId: number): Promise<string> {
  const metadata = await gateway.request('GET', `/database/${databaseId}/metadata`);
  return formatTablesMarkdown(databaseId, summarizeTables(metadata));
}

/**
 * Fetch a table's query metadata, keeping at most `limit` fields.
 * A truncated result carries `_truncated`, `_total_fields` and
 * `_limit_applied`; `limit <= 0` disables truncation.
 */
export async function getTableFields(
  gateway: IMetabaseGateway,
  tableId: number,
  limit: number = DEFAULT_FIELD_LIMIT
): Promise<unknown> {
  const result = await gateway.request('GET', `/table/${tableId}/query_metadata`);

  if (!isRecord(result)) {
    return result;
  }

  const fields = result['fields'];
  if (limit > 0 && Array.isArray(fields) && fields.length > limit) {
    return {
      ...result,
      fields: fields.slice(0, limit),
      _truncated: true,
      _total_fields: fields.length,
      _limit_applied: limit,
    };
  }

  return result;
}

/**
 * Run a native SQL query against a database.
 */
export async function executeQuery(gateway: IMetabaseGateway, input: NativeQueryInput): Promise<unknown> {
  const native: Record<string, unknown> = { query: input.query };
  if (input.parameters && input.parameters.length > 0) {
    native['parameters'] = input.parameters;
  }

  return gateway.request('POST', '/dataset', {
    body: {
      database: input.databaseId,
      type: 'native',
      native,
    },
  });
}
