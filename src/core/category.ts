/**
 * Canonical form of a category label: lowercased, trimmed, spaces as hyphens.
 * Category filters compare by exact match, so every filter value must go
 * through this as well.
 */
export function normalizeCategory(raw: string): string {
  return raw.trim().toLowerCase().replaceAll(' ', '-');
}
