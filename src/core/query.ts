import type { ListQuery, RecentQuery, SearchQuery } from '../types/index.js';
import { normalizeCategory } from './category.js';

export const LIST_DEFAULT_LIMIT = 50;
export const LIST_MAX_LIMIT = 200;
export const RECENT_DEFAULT_LIMIT = 20;
export const RECENT_MAX_LIMIT = 100;

/**
 * Unresolved query input as it arrives from a transport adapter.
 * Every field is optional; the resolve* helpers fill in the bounds.
 */
export interface ListQueryInput {
  category?: string;
  limit?: number;
  offset?: number;
}

export interface SearchQueryInput extends ListQueryInput {
  query?: string;
  since?: Date;
  until?: Date;
}

export interface RecentQueryInput {
  limit?: number;
  since?: Date;
}

export function clampLimit(limit: number | undefined, defaultLimit: number, maxLimit: number): number {
  if (limit === undefined || !Number.isFinite(limit)) {
    return defaultLimit;
  }
  const whole = Math.trunc(limit);
  if (whole <= 0) {
    return defaultLimit;
  }
  return Math.min(whole, maxLimit);
}

// Negative offsets are read as zero rather than left to the store's skip semantics.
export function clampOffset(offset: number | undefined): number {
  if (offset === undefined || !Number.isFinite(offset)) {
    return 0;
  }
  return Math.max(0, Math.trunc(offset));
}

function optionalCategory(raw: string | undefined): string | undefined {
  if (raw === undefined) return undefined;
  const category = normalizeCategory(raw);
  return category === '' ? undefined : category;
}

function optionalText(raw: string | undefined): string | undefined {
  if (raw === undefined) return undefined;
  return raw.trim() === '' ? undefined : raw;
}

export function resolveListQuery(input: ListQueryInput = {}): ListQuery {
  const query: ListQuery = {
    limit: clampLimit(input.limit, LIST_DEFAULT_LIMIT, LIST_MAX_LIMIT),
    offset: clampOffset(input.offset),
  };
  const category = optionalCategory(input.category);
  if (category !== undefined) query.category = category;
  return query;
}

export function resolveSearchQuery(input: SearchQueryInput = {}): SearchQuery {
  const query: SearchQuery = resolveListQuery(input);
  const text = optionalText(input.query);
  if (text !== undefined) query.query = text;
  if (input.since !== undefined) query.since = input.since;
  if (input.until !== undefined) query.until = input.until;
  return query;
}

export function resolveRecentQuery(input: RecentQueryInput = {}): RecentQuery {
  const query: RecentQuery = {
    limit: clampLimit(input.limit, RECENT_DEFAULT_LIMIT, RECENT_MAX_LIMIT),
  };
  if (input.since !== undefined) query.since = input.since;
  return query;
}

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const RFC3339 = /^\d{4}-\d{2}-\d{2}[Tt]\d{2}:\d{2}:\d{2}(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/;

/**
 * Parse a date filter given as RFC 3339 or as a plain YYYY-MM-DD day (UTC midnight).
 * Returns undefined for anything else.
 */
export function parseDateFilter(raw: string | undefined): Date | undefined {
  if (raw === undefined) return undefined;
  const value = raw.trim();

  const day = DATE_ONLY.exec(value);
  if (day) {
    const [, year, month, date] = day;
    const parsed = new Date(Date.UTC(Number(year), Number(month) - 1, Number(date)));
    // Reject rollovers such as 2024-02-31.
    if (parsed.getUTCMonth() !== Number(month) - 1 || parsed.getUTCDate() !== Number(date)) {
      return undefined;
    }
    return parsed;
  }

  if (RFC3339.test(value)) {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? undefined : parsed;
  }

  return undefined;
}
