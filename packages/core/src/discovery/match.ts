/**
 * Query normalisation and substring matching shared by both discovery stages.
 */

export function normalizeQuery(query: string): string {
  return query.trim().toLowerCase();
}

/**
 * True when the normalised term occurs in the name or the description,
 * ignoring case. Null fields never match a non-empty term.
 */
export function matchesTerm(term: string, name: string | null, description: string | null): boolean {
  return (name ?? '').toLowerCase().includes(term) || (description ?? '').toLowerCase().includes(term);
}

/**
 * Code-unit comparison, the same order as comparing the strings with `<`.
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
