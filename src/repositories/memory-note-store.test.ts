import { beforeEach, describe, expect, it } from 'vitest';

import { NoteNotFoundError } from '../core/errors.js';
import { newNoteId, parseNoteId } from '../core/note-id.js';
import { resolveListQuery, resolveRecentQuery, resolveSearchQuery } from '../core/query.js';
import { MemoryNoteStore, scoreText } from './memory-note-store.js';

function createClock(start = '2024-01-01T00:00:00Z') {
  let current = new Date(start).getTime();
  return () => {
    const value = new Date(current);
    current += 60_000;
    return value;
  };
}

describe('MemoryNoteStore', () => {
  let store: MemoryNoteStore;

  beforeEach(() => {
    store = new MemoryNoteStore(createClock());
  });

  it('assigns an id and equal timestamps on insert', async () => {
    const note = await store.insert({ category: 'ideas', content: 'first' });

    expect(note.id).toMatch(/^[0-9a-f]{24}$/);
    expect(note.createdAt.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(note.updatedAt.getTime()).toBe(note.createdAt.getTime());
  });

  it('returns the same note when fetched by id', async () => {
    const created = await store.insert({ category: 'ideas', content: 'round trip' });

    expect(await store.findById(parseNoteId(created.id))).toEqual(created);
  });

  it('throws NoteNotFoundError for unknown ids', async () => {
    await expect(store.findById(newNoteId())).rejects.toBeInstanceOf(NoteNotFoundError);
  });

  it('does not expose its internal state through returned notes', async () => {
    const created = await store.insert({ category: 'ideas', content: 'original' });
    created.content = 'changed';
    created.createdAt.setFullYear(1999);

    const fetched = await store.findById(parseNoteId(created.id));
    expect(fetched.content).toBe('original');
    expect(fetched.createdAt.toISOString()).toBe('2024-01-01T00:00:00.000Z');
  });

  describe('list', () => {
    it('returns notes newest first', async () => {
      const a = await store.insert({ category: 'ideas', content: 'A' });
      const b = await store.insert({ category: 'ideas', content: 'B' });
      const c = await store.insert({ category: 'ideas', content: 'C' });

      const notes = await store.list(resolveListQuery());
      expect(notes.map((n) => n.id)).toEqual([c.id, b.id, a.id]);
    });

    it('breaks equal timestamps by reverse insertion order', async () => {
      const frozen = new MemoryNoteStore(() => new Date('2024-01-01T00:00:00Z'));
      const a = await frozen.insert({ category: 'ideas', content: 'A' });
      const b = await frozen.insert({ category: 'ideas', content: 'B' });

      const notes = await frozen.list(resolveListQuery());
      expect(notes.map((n) => n.id)).toEqual([b.id, a.id]);
    });

    it('filters by exact category and pages with offset', async () => {
      await store.insert({ category: 'ideas', content: '1' });
      await store.insert({ category: 'other', content: '2' });
      await store.insert({ category: 'ideas', content: '3' });
      await store.insert({ category: 'ideas', content: '4' });

      const page = await store.list({ category: 'ideas', limit: 2, offset: 1 });
      expect(page.map((n) => n.content)).toEqual(['3', '1']);
    });

    it('never returns more than the maximum page size', async () => {
      for (let i = 0; i < 205; i++) {
        await store.insert({ category: 'bulk', content: `note ${i}` });
      }

      expect(await store.list({ limit: 10_000, offset: 0 })).toHaveLength(200);
      expect(await store.search({ limit: 10_000, offset: 0 })).toHaveLength(200);
      expect(await store.getRecent({ limit: 10_000 })).toHaveLength(100);
      expect(await store.getRecent({ limit: 0 })).toHaveLength(20);
    });

    it('treats a negative offset as zero', async () => {
      await store.insert({ category: 'ideas', content: 'A' });
      const b = await store.insert({ category: 'ideas', content: 'B' });

      const notes = await store.list({ limit: 1, offset: -10 });
      expect(notes.map((n) => n.id)).toEqual([b.id]);
    });
  });

  describe('search', () => {
    it('ranks by relevance and breaks ties by recency', async () => {
      const once = await store.insert({ category: 'a', content: 'growth plan' });
      const twice = await store.insert({ category: 'a', content: 'growth growth' });
      const onceLater = await store.insert({ category: 'b', content: 'Growth numbers' });
      await store.insert({ category: 'b', content: 'unrelated' });

      const notes = await store.search(resolveSearchQuery({ query: 'growth' }));
      expect(notes.map((n) => n.id)).toEqual([twice.id, onceLater.id, once.id]);
    });

    it('sorts by recency alone without a text query', async () => {
      const a = await store.insert({ category: 'a', content: 'one' });
      const b = await store.insert({ category: 'a', content: 'two' });

      const notes = await store.search(resolveSearchQuery({ category: 'a' }));
      expect(notes.map((n) => n.id)).toEqual([b.id, a.id]);
    });

    it('applies category and inclusive date bounds', async () => {
      await store.insert({ category: 'a', content: 'x 00:00' });
      const second = await store.insert({ category: 'a', content: 'x 00:01' });
      const third = await store.insert({ category: 'a', content: 'x 00:02' });
      await store.insert({ category: 'b', content: 'x 00:03' });
      await store.insert({ category: 'a', content: 'x 00:04' });

      const notes = await store.search(
        resolveSearchQuery({
          query: 'x',
          category: 'a',
          since: second.createdAt,
          until: third.createdAt,
        })
      );
      expect(notes.map((n) => n.id)).toEqual([third.id, second.id]);
    });
  });

  describe('getRecent', () => {
    it('returns notes across categories since a lower bound', async () => {
      await store.insert({ category: 'a', content: 'old' });
      const mid = await store.insert({ category: 'b', content: 'mid' });
      const last = await store.insert({ category: 'c', content: 'new' });

      const notes = await store.getRecent(resolveRecentQuery({ since: mid.createdAt }));
      expect(notes.map((n) => n.id)).toEqual([last.id, mid.id]);
    });
  });

  describe('delete', () => {
    it('removes a note and reports NotFound on every later attempt', async () => {
      const note = await store.insert({ category: 'a', content: 'bye' });
      const id = parseNoteId(note.id);

      await store.delete(id);
      await expect(store.delete(id)).rejects.toBeInstanceOf(NoteNotFoundError);
      await expect(store.findById(id)).rejects.toBeInstanceOf(NoteNotFoundError);
      expect(await store.count()).toBe(0);
    });

    it('reports NotFound for ids that never existed', async () => {
      await expect(store.delete(newNoteId())).rejects.toBeInstanceOf(NoteNotFoundError);
    });
  });

  describe('listCategories and count', () => {
    it('aggregates counts and last activity, most recent first', async () => {
      await store.insert({ category: 'a', content: '1' });
      await store.insert({ category: 'a', content: '2' });
      const lastB = await store.insert({ category: 'b', content: '3' });
      const lastA = await store.insert({ category: 'a', content: '4' });

      expect(await store.listCategories()).toEqual([
        { name: 'a', count: 3, lastNote: lastA.createdAt },
        { name: 'b', count: 1, lastNote: lastB.createdAt },
      ]);
      expect(await store.count()).toBe(4);
      expect(await store.count('a')).toBe(3);
      expect(await store.count('missing')).toBe(0);
    });

    it('returns an empty summary for an empty store', async () => {
      expect(await store.listCategories()).toEqual([]);
    });
  });
});

describe('scoreText', () => {
  it('counts case-insensitive term occurrences', () => {
    expect(scoreText('Deploy plan: deploy Friday', 'deploy')).toBe(2);
    expect(scoreText('Deploy plan: deploy Friday', 'plan friday')).toBe(2);
    expect(scoreText('nothing here', 'deploy')).toBe(0);
    expect(scoreText('anything', '  ')).toBe(0);
  });
});
