import { NoteNotFoundError } from '../core/errors.js';
import { newNoteId } from '../core/note-id.js';
import { resolveListQuery, resolveRecentQuery, resolveSearchQuery } from '../core/query.js';
import type { CategorySummary, ListQuery, Note, RecentQuery, SearchQuery } from '../types/index.js';
import type { Types } from 'mongoose';
import type { NoteStore } from './note-store.js';

interface StoredNote {
  note: Note;
  seq: number;
}

interface Ranked {
  entry: StoredNote;
  score: number;
}

const WORD = /[\p{L}\p{N}]+/gu;

function tokenize(text: string): string[] {
  return text.toLowerCase().match(WORD) ?? [];
}

/**
 * Term-frequency stand-in for a text index score: how many times any
 * query term occurs in the content. Zero means no match.
 */
export function scoreText(content: string, query: string): number {
  const terms = new Set(tokenize(query));
  if (terms.size === 0) return 0;
  let score = 0;
  for (const token of tokenize(content)) {
    if (terms.has(token)) score++;
  }
  return score;
}

function byNewest(a: StoredNote, b: StoredNote): number {
  return b.note.createdAt.getTime() - a.note.createdAt.getTime() || b.seq - a.seq;
}

function copy(note: Note): Note {
  return {
    ...note,
    createdAt: new Date(note.createdAt),
    updatedAt: new Date(note.updatedAt),
  };
}

/**
 * In-memory NoteStore implementation.
 * Used by tests and by NOTE_STORE=memory for local runs without MongoDB.
 */
export class MemoryNoteStore implements NoteStore {
  private notes = new Map<string, StoredNote>();
  private seq = 0;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async ensureIndexes(): Promise<void> {}

  async insert(input: { category: string; content: string }): Promise<Note> {
    const createdAt = this.now();
    const note: Note = {
      id: newNoteId().toHexString(),
      category: input.category,
      content: input.content,
      createdAt,
      updatedAt: new Date(createdAt),
    };
    this.notes.set(note.id, { note, seq: this.seq++ });
    return copy(note);
  }

  async findById(id: Types.ObjectId): Promise<Note> {
    const entry = this.notes.get(id.toHexString());
    if (!entry) {
      throw new NoteNotFoundError(id.toHexString());
    }
    return copy(entry.note);
  }

  async list(query: ListQuery): Promise<Note[]> {
    const q = resolveListQuery(query);
    const matches = this.entries().filter((entry) => q.category === undefined || entry.note.category === q.category);
    return this.page(matches.sort(byNewest), q.offset, q.limit);
  }

  async search(query: SearchQuery): Promise<Note[]> {
    const q = resolveSearchQuery(query);
    const ranked: Ranked[] = [];

    for (const entry of this.entries()) {
      const { note } = entry;
      if (q.category !== undefined && note.category !== q.category) continue;
      if (q.since && note.createdAt.getTime() < q.since.getTime()) continue;
      if (q.until && note.createdAt.getTime() > q.until.getTime()) continue;

      let score = 0;
      if (q.query !== undefined) {
        score = scoreText(note.content, q.query);
        if (score === 0) continue;
      }
      ranked.push({ entry, score });
    }

    ranked.sort((a, b) => b.score - a.score || byNewest(a.entry, b.entry));
    return this.page(
      ranked.map((r) => r.entry),
      q.offset,
      q.limit
    );
  }

  async getRecent(query: RecentQuery): Promise<Note[]> {
    const q = resolveRecentQuery(query);
    const since = q.since;
    const matches = this.entries().filter(
      (entry) => since === undefined || entry.note.createdAt.getTime() >= since.getTime()
    );
    return this.page(matches.sort(byNewest), 0, q.limit);
  }

  async delete(id: Types.ObjectId): Promise<void> {
    if (!this.notes.delete(id.toHexString())) {
      throw new NoteNotFoundError(id.toHexString());
    }
  }

  async listCategories(): Promise<CategorySummary[]> {
    const summaries = new Map<string, CategorySummary>();
    for (const { note } of this.notes.values()) {
      const summary = summaries.get(note.category);
      if (!summary) {
        summaries.set(note.category, { name: note.category, count: 1, lastNote: new Date(note.createdAt) });
        continue;
      }
      summary.count++;
      if (note.createdAt.getTime() > summary.lastNote.getTime()) {
        summary.lastNote = new Date(note.createdAt);
      }
    }
    return Array.from(summaries.values()).sort(
      (a, b) => b.lastNote.getTime() - a.lastNote.getTime() || a.name.localeCompare(b.name)
    );
  }

  async count(category?: string): Promise<number> {
    if (!category) {
      return this.notes.size;
    }
    let total = 0;
    for (const { note } of this.notes.values()) {
      if (note.category === category) total++;
    }
    return total;
  }

  private entries(): StoredNote[] {
    return Array.from(this.notes.values());
  }

  private page(entries: StoredNote[], offset: number, limit: number): Note[] {
    return entries.slice(offset, offset + limit).map((entry) => copy(entry.note));
  }
}
