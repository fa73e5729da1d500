import type { FilterQuery, PipelineStage, Types } from 'mongoose';

import { NoteNotFoundError, ScratchpadError, StoreUnavailableError } from '../core/errors.js';
import { newNoteId } from '../core/note-id.js';
import { resolveListQuery, resolveRecentQuery, resolveSearchQuery } from '../core/query.js';
import type { CategorySummary, ListQuery, Note, RecentQuery, SearchQuery } from '../types/index.js';
import logger from '../utils/logger.js';
import {
  type CategoryRow,
  type NoteDocument,
  type NoteModel,
  toCategorySummary,
  toNote,
} from './note-model.js';
import type { NoteStore } from './note-store.js';

export type NoteFilter = FilterQuery<NoteDocument>;
export type NoteSort = Record<string, 1 | -1 | { $meta: 'textScore' }>;

const NEWEST_FIRST: NoteSort = { created_at: -1 };

export function buildListFilter(query: ListQuery): NoteFilter {
  const filter: NoteFilter = {};
  if (query.category !== undefined) {
    filter.category = query.category;
  }
  return filter;
}

/**
 * Text predicate, category equality and an inclusive created_at range,
 * each added only when supplied.
 */
export function buildSearchFilter(query: SearchQuery): NoteFilter {
  const filter: NoteFilter = {};

  if (query.query !== undefined) {
    filter.$text = { $search: query.query };
  }

  if (query.category !== undefined) {
    filter.category = query.category;
  }

  if (query.since !== undefined || query.until !== undefined) {
    const range: { $gte?: Date; $lte?: Date } = {};
    if (query.since !== undefined) range.$gte = query.since;
    if (query.until !== undefined) range.$lte = query.until;
    filter.created_at = range;
  }

  return filter;
}

/**
 * Relevance first with recency as tie-break when searching text; recency alone otherwise.
 */
export function buildSearchSort(query: SearchQuery): NoteSort {
  if (query.query !== undefined) {
    return { score: { $meta: 'textScore' }, created_at: -1 };
  }
  return NEWEST_FIRST;
}

export function buildRecentFilter(query: RecentQuery): NoteFilter {
  const filter: NoteFilter = {};
  if (query.since !== undefined) {
    filter.created_at = { $gte: query.since };
  }
  return filter;
}

export const CATEGORY_PIPELINE: PipelineStage[] = [
  {
    $group: {
      _id: '$category',
      count: { $sum: 1 },
      last_note: { $max: '$created_at' },
    },
  },
  { $sort: { last_note: -1, _id: 1 } },
];

export interface MongoNoteStoreOptions {
  queryTimeoutMs: number;
}

/**
 * MongoDB-backed NoteStore using a mongoose model over the `notes` collection.
 * Every query carries maxTimeMS so a slow server fails the request instead of hanging it.
 */
export class MongoNoteStore implements NoteStore {
  private readonly queryTimeoutMs: number;

  constructor(
    private readonly model: NoteModel,
    options: MongoNoteStoreOptions
  ) {
    this.queryTimeoutMs = options.queryTimeoutMs;
  }

  async ensureIndexes(): Promise<void> {
    await this.run('create indexes', () => this.model.createIndexes());
    logger.info({ collection: this.model.collection.collectionName }, 'Note indexes ensured');
  }

  async insert(input: { category: string; content: string }): Promise<Note> {
    const now = new Date();
    const doc: NoteDocument = {
      _id: newNoteId(),
      category: input.category,
      content: input.content,
      created_at: now,
      updated_at: now,
    };
    await this.run('insert note', () => this.model.create(doc));
    return toNote(doc);
  }

  async findById(id: Types.ObjectId): Promise<Note> {
    const doc = await this.run('find note', () =>
      this.model.findById(id).maxTimeMS(this.queryTimeoutMs).lean<NoteDocument>().exec()
    );
    if (!doc) {
      throw new NoteNotFoundError(id.toHexString());
    }
    return toNote(doc);
  }

  async list(query: ListQuery): Promise<Note[]> {
    const q = resolveListQuery(query);
    const docs = await this.run('list notes', () =>
      this.model
        .find(buildListFilter(q))
        .sort(NEWEST_FIRST)
        .skip(q.offset)
        .limit(q.limit)
        .maxTimeMS(this.queryTimeoutMs)
        .lean<NoteDocument[]>()
        .exec()
    );
    return docs.map(toNote);
  }

  async search(query: SearchQuery): Promise<Note[]> {
    const q = resolveSearchQuery(query);
    const docs = await this.run('search notes', () => {
      const find = this.model.find(buildSearchFilter(q));
      if (q.query !== undefined) {
        find.select({ score: { $meta: 'textScore' } });
      }
      return find
        .sort(buildSearchSort(q))
        .skip(q.offset)
        .limit(q.limit)
        .maxTimeMS(this.queryTimeoutMs)
        .lean<NoteDocument[]>()
        .exec();
    });
    return docs.map(toNote);
  }

  async getRecent(query: RecentQuery): Promise<Note[]> {
    const q = resolveRecentQuery(query);
    const docs = await this.run('get recent notes', () =>
      this.model
        .find(buildRecentFilter(q))
        .sort(NEWEST_FIRST)
        .limit(q.limit)
        .maxTimeMS(this.queryTimeoutMs)
        .lean<NoteDocument[]>()
        .exec()
    );
    return docs.map(toNote);
  }

  async delete(id: Types.ObjectId): Promise<void> {
    const result = await this.run('delete note', () => this.model.deleteOne({ _id: id }).exec());
    if (result.deletedCount === 0) {
      throw new NoteNotFoundError(id.toHexString());
    }
  }

  async listCategories(): Promise<CategorySummary[]> {
    const rows = await this.run('aggregate categories', () =>
      this.model.aggregate<CategoryRow>(CATEGORY_PIPELINE).option({ maxTimeMS: this.queryTimeoutMs }).exec()
    );
    return rows.map(toCategorySummary);
  }

  async count(category?: string): Promise<number> {
    const filter: NoteFilter = category ? { category } : {};
    return this.run('count notes', () => this.model.countDocuments(filter).maxTimeMS(this.queryTimeoutMs).exec());
  }

  private async run<T>(operation: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      if (error instanceof ScratchpadError) {
        throw error;
      }
      logger.error({ err: error, operation }, 'Note store operation failed');
      throw new StoreUnavailableError(`${operation} failed`, { cause: error });
    }
  }
}
