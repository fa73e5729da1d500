import type { Types } from 'mongoose';

import type { CategorySummary, ListQuery, Note, RecentQuery, SearchQuery } from '../types/index.js';

/**
 * Persistence contract for notes.
 * Implementations may keep data in memory or in MongoDB.
 */
export interface NoteStore {
  /**
   * Create any indexes the store relies on. Safe to call repeatedly.
   */
  ensureIndexes(): Promise<void>;

  /**
   * Persist a new note. The store assigns the id and both timestamps.
   */
  insert(input: { category: string; content: string }): Promise<Note>;

  /**
   * Return a single note or throw NoteNotFoundError.
   */
  findById(id: Types.ObjectId): Promise<Note>;

  /**
   * Notes in one category (or all), newest first.
   */
  list(query: ListQuery): Promise<Note[]>;

  /**
   * Text search with optional category and inclusive createdAt range.
   * Ordered by relevance then newest first when text is given, newest first otherwise.
   */
  search(query: SearchQuery): Promise<Note[]>;

  /**
   * Newest notes across all categories.
   */
  getRecent(query: RecentQuery): Promise<Note[]>;

  /**
   * Remove exactly one note or throw NoteNotFoundError.
   */
  delete(id: Types.ObjectId): Promise<void>;

  /**
   * Per-category counts and last activity, most recent first.
   */
  listCategories(): Promise<CategorySummary[]>;

  count(category?: string): Promise<number>;
}
