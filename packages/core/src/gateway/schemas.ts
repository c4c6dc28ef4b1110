/**
 * Upstream Payload Schemas
 *
 * Metabase responses are loosely shaped. These decoders normalise the few
 * entities the discovery pipeline reads into total, well-typed records:
 * every field has a documented default, so a missing or wrongly typed value
 * never throws.
 *
 * @module gateway/schemas
 */

import { z } from 'zod';

const nullableString = z.string().nullable().optional().catch(null).transform((v) => v ?? null);
const nullableNumber = z.number().nullable().optional().catch(null).transform((v) => v ?? null);

/**
 * Collection as listed by `GET /collection`.
 * `id` is numeric, except for the root collection (`"root"`).
 */
export const CollectionSchema = z.object({
  id: z.union([z.number(), z.string()]).nullable().optional().catch(null).transform((v) => v ?? null),
  name: nullableString,
  description: nullableString,
  parent_id: nullableNumber,
  archived: z.boolean().optional().catch(false).transform((v) => v ?? false),
});

export type Collection = z.output<typeof CollectionSchema>;

/**
 * Card (saved question) as listed by `GET /card`
 */
export const CardSchema = z.object({
  id: nullableNumber,
  name: nullableString,
  description: nullableString,
  collection_id: nullableNumber,
  created_at: nullableString,
  updated_at: nullableString,
});

export type Card = z.output<typeof CardSchema>;

/**
 * Result of decoding a payload that should be a list.
 *
 * `total` is the raw upstream length, null and non-object entries included;
 * `items` holds only the entries that decoded.
 */
export type ListDecodeResult<T> =
  | { kind: 'list'; total: number; items: T[] }
  | { kind: 'malformed'; received: string };

function describeShape(payload: unknown): string {
  if (payload === null) return 'null';
  if (Array.isArray(payload)) return 'array';
  return typeof payload;
}

export function decodeList<S extends z.ZodTypeAny>(payload: unknown, schema: S): ListDecodeResult<z.output<S>> {
  if (!Array.isArray(payload)) {
    return { kind: 'malformed', received: describeShape(payload) };
  }

  const items: z.output<S>[] = [];
  for (const entry of payload) {
    if (entry === null || typeof entry !== 'object' || Array.isArray(entry)) {
      continue;
    }
    const parsed = schema.safeParse(entry);
    if (parsed.success) {
      items.push(parsed.data);
    }
  }

  return { kind: 'list', total: payload.length, items };
}

export function decodeCollections(payload: unknown): ListDecodeResult<Collection> {
  return decodeList(payload, CollectionSchema);
}

export function decodeCards(payload: unknown): ListDecodeResult<Card> {
  return decodeList(payload, CardSchema);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
