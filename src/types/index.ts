/**
 * Core type definitions for scratchpad
 */

export interface MongoConfig {
  uri: string;
  database: string;
  connectTimeoutMs: number;
  queryTimeoutMs: number;
}

export type StoreKind = 'mongo' | 'memory';

export interface AppConfig {
  mongodb: MongoConfig;
  store: StoreKind;
  server: {
    port: number;
    host: string;
  };
  logLevel: string;
}

/**
 * A captured note. Notes are never edited in place, so
 * `updatedAt` always equals `createdAt`.
 */
export interface Note {
  id: string;
  category: string;
  content: string; // markdown
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Per-category aggregate, recomputed from the live note set on every call.
 */
export interface CategorySummary {
  name: string;
  count: number;
  lastNote: Date;
}

export interface CreateNoteInput {
  category: string;
  content: string;
}

/**
 * Resolved query descriptors. Build them with the resolve* helpers in
 * core/query.ts so limits and offsets are already clamped.
 */
export interface ListQuery {
  category?: string;
  limit: number;
  offset: number;
}

export interface SearchQuery {
  query?: string; // full-text search terms
  category?: string;
  since?: Date; // inclusive lower bound on createdAt
  until?: Date; // inclusive upper bound on createdAt
  limit: number;
  offset: number;
}

export interface RecentQuery {
  limit: number;
  since?: Date;
}
