import { FastifyInstance, FastifyReply } from 'fastify';

import { lenientDate, parseIntParam } from '../api/params.js';
import { normalizeCategory } from '../core/category.js';
import { NoteService } from '../services/note-service.js';
import type { Note } from '../types/index.js';
import {
  type RenderedNotes,
  categoryPage,
  homePage,
  noteCardList,
  searchPage,
  searchResults,
} from './views.js';

type QueryParams = Record<string, string | undefined>;

const CATEGORY_PAGE_SIZE = 50;

function html(reply: FastifyReply, body: string): FastifyReply {
  return reply.type('text/html; charset=utf-8').send(body);
}

export async function registerWebRoutes(app: FastifyInstance, noteService: NoteService) {
  const renderAll = (notes: Note[]): RenderedNotes =>
    new Map(notes.map((note) => [note.id, noteService.renderMarkdown(note.content)]));

  app.get('/', async (_request, reply) => {
    const [categories, totalNotes] = await Promise.all([noteService.listCategories(), noteService.count()]);
    return html(reply, homePage(categories, totalNotes));
  });

  app.get<{ Params: { name: string } }>('/category/:name', async (request, reply) => {
    const category = normalizeCategory(request.params.name);
    if (category === '') {
      return reply.code(404).send({ error: 'category not found' });
    }
    const [notes, totalCount] = await Promise.all([
      noteService.list({ category, limit: CATEGORY_PAGE_SIZE }),
      noteService.count(category),
    ]);
    return html(reply, categoryPage(category, notes, totalCount, renderAll(notes)));
  });

  app.get('/search', async (_request, reply) => {
    return html(reply, searchPage(await noteService.listCategories()));
  });

  // htmx partials
  app.get<{ Querystring: QueryParams }>('/fragments/notes', async (request, reply) => {
    const { category, limit, offset } = request.query;
    const notes = await noteService.list({
      category,
      limit: parseIntParam(limit),
      offset: parseIntParam(offset),
    });
    return html(reply, noteCardList(notes, renderAll(notes)));
  });

  app.get<{ Querystring: QueryParams }>('/fragments/search', async (request, reply) => {
    const { q, category, since, until, limit } = request.query;
    const notes = await noteService.search({
      query: q,
      category,
      since: lenientDate('since', since),
      until: lenientDate('until', until),
      limit: parseIntParam(limit),
    });
    return html(reply, searchResults(notes, renderAll(notes), q));
  });
}
