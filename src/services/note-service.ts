import { Marked } from 'marked';

import { normalizeCategory } from '../core/category.js';
import { ValidationError } from '../core/errors.js';
import { parseNoteId } from '../core/note-id.js';
import {
  type ListQueryInput,
  type RecentQueryInput,
  type SearchQueryInput,
  resolveListQuery,
  resolveRecentQuery,
  resolveSearchQuery,
} from '../core/query.js';
import type { NoteStore } from '../repositories/note-store.js';
import type { CategorySummary, CreateNoteInput, Note } from '../types/index.js';
import { escapeHtml, sanitizeRenderedHtml } from '../utils/html.js';
import logger from '../utils/logger.js';

/**
 * Orchestrates note operations for every transport (REST, MCP, web pages).
 * Normalizes input, converts ids and hands resolved queries to the store.
 */
export class NoteService {
  private readonly markdown: Marked;

  constructor(
    private readonly store: NoteStore,
    markdown: Marked = new Marked()
  ) {
    this.markdown = markdown;
  }

  async create(input: CreateNoteInput): Promise<Note> {
    const category = normalizeCategory(input.category);
    if (category === '') {
      throw new ValidationError('category is required');
    }
    if (input.content.trim() === '') {
      throw new ValidationError('content is required');
    }

    const note = await this.store.insert({ category, content: input.content });
    logger.info({ id: note.id, category: note.category }, 'Note created');
    return note;
  }

  async get(id: string): Promise<Note> {
    return this.store.findById(parseNoteId(id));
  }

  async list(input: ListQueryInput = {}): Promise<Note[]> {
    return this.store.list(resolveListQuery(input));
  }

  async search(input: SearchQueryInput = {}): Promise<Note[]> {
    return this.store.search(resolveSearchQuery(input));
  }

  async recent(input: RecentQueryInput = {}): Promise<Note[]> {
    return this.store.getRecent(resolveRecentQuery(input));
  }

  async delete(id: string): Promise<void> {
    await this.store.delete(parseNoteId(id));
    logger.info({ id }, 'Note deleted');
  }

  async listCategories(): Promise<CategorySummary[]> {
    return this.store.listCategories();
  }

  async count(category?: string): Promise<number> {
    const normalized = category === undefined ? '' : normalizeCategory(category);
    return this.store.count(normalized === '' ? undefined : normalized);
  }

  /**
   * Render note markdown to sanitized HTML for display.
   * On failure the raw markdown is returned escaped so pages still show the note.
   */
  renderMarkdown(content: string): string {
    try {
      const html = this.markdown.parse(content, { async: false });
      if (typeof html === 'string') {
        return sanitizeRenderedHtml(html);
      }
      logger.warn('Markdown renderer returned a promise; showing raw content');
      return escapeHtml(content);
    } catch (error) {
      logger.warn({ error }, 'Markdown rendering failed; showing raw content');
      return escapeHtml(content);
    }
  }
}
