/**
 * Collection Operations
 *
 * @module catalog/collections
 */

import type { IMetabaseGateway } from '../gateway/types.js';

export interface CreateCollectionInput {
  name: string;
  description?: string | undefined;
  /** Hex colour, e.g. `#509EE3` */
  color?: string | undefined;
  parentId?: number | undefined;
}

export async function listCollections(gateway: IMetabaseGateway): Promise<unknown> {
  return gateway.request('GET', '/collection');
}

export async function createCollection(
  gateway: IMetabaseGateway,
  input: CreateCollectionInput
): Promise<unknown> {
  const body: Record<string, unknown> = { name: input.name };

  if (input.description) {
    body['description'] = input.description;
  }
  if (input.color) {
    body['color'] = input.color;
  }
  if (input.parentId !== undefined) {
    body['parent_id'] = input.parentId;
  }

  return gateway.request('POST', '/collection', { body });
}
