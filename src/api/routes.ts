import { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { NoteService } from '../services/note-service.js';
import { lenientDate, parseIntParam } from './params.js';

type QueryParams = Record<string, string | undefined>;

const createNoteBody = z.object({
  category: z.string().default(''),
  content: z.string().default(''),
});

export async function registerRoutes(app: FastifyInstance, noteService: NoteService) {
  // Health check
  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // Create a note
  app.post('/api/notes', async (request, reply) => {
    const body = createNoteBody.safeParse(request.body ?? {});
    if (!body.success) {
      reply.code(400);
      return { error: 'invalid JSON body' };
    }
    const note = await noteService.create(body.data);
    reply.code(201);
    return note;
  });

  // List notes, newest first
  app.get<{ Querystring: QueryParams }>('/api/notes', async (request) => {
    const { category, limit, offset } = request.query;
    return noteService.list({
      category,
      limit: parseIntParam(limit),
      offset: parseIntParam(offset),
    });
  });

  // Full-text search with optional category and date range
  app.get<{ Querystring: QueryParams }>('/api/notes/search', async (request) => {
    const { q, category, since, until, limit, offset } = request.query;
    return noteService.search({
      query: q,
      category,
      since: lenientDate('since', since),
      until: lenientDate('until', until),
      limit: parseIntParam(limit),
      offset: parseIntParam(offset),
    });
  });

  // Most recent notes across categories
  app.get<{ Querystring: QueryParams }>('/api/notes/recent', async (request) => {
    const { limit, since } = request.query;
    return noteService.recent({
      limit: parseIntParam(limit),
      since: lenientDate('since', since),
    });
  });

  // Count notes, optionally in one category
  app.get<{ Querystring: QueryParams }>('/api/notes/count', async (request) => {
    return { count: await noteService.count(request.query.category) };
  });

  // Get specific note
  app.get<{ Params: { id: string } }>('/api/notes/:id', async (request) => {
    return noteService.get(request.params.id);
  });

  // Delete a note
  app.delete<{ Params: { id: string } }>('/api/notes/:id', async (request, reply) => {
    await noteService.delete(request.params.id);
    reply.code(204);
    return reply.send();
  });

  // Categories with counts and last activity
  app.get('/api/categories', async () => {
    return noteService.listCategories();
  });
}
