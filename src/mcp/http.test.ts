import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { MemoryNoteStore } from '../repositories/memory-note-store.js';
import { buildServer } from '../server.js';
import { NoteService } from '../services/note-service.js';

const MCP_HEADERS = {
  'content-type': 'application/json',
  accept: 'application/json, text/event-stream',
};

// Responses arrive as a single server-sent event.
function parseEvent(body: string): unknown {
  const line = body.split('\n').find((entry) => entry.startsWith('data: '));
  if (line === undefined) {
    throw new Error(`no data line in response: ${body}`);
  }
  return JSON.parse(line.slice('data: '.length));
}

describe('MCP HTTP endpoint', () => {
  let app: FastifyInstance;
  let store: MemoryNoteStore;

  beforeEach(async () => {
    store = new MemoryNoteStore(() => new Date('2024-08-01T09:00:00Z'));
    app = await buildServer({ noteService: new NoteService(store) });
  });

  afterEach(async () => {
    await app.close();
  });

  it('answers initialize over POST', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/mcp',
      headers: MCP_HEADERS,
      payload: {
        jsonrpc: '2.0',
        id: 1,
        method: 'initialize',
        params: {
          protocolVersion: '2025-03-26',
          capabilities: {},
          clientInfo: { name: 'test-client', version: '0.0.0' },
        },
      },
    });

    expect(response.statusCode).toBe(200);
    expect(parseEvent(response.body)).toMatchObject({
      jsonrpc: '2.0',
      id: 1,
      result: { serverInfo: { name: 'Scratchpad', version: '0.1.0' } },
    });
  });

  it('runs a tool call against the note store', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/mcp',
      headers: MCP_HEADERS,
      payload: {
        jsonrpc: '2.0',
        id: 2,
        method: 'tools/call',
        params: { name: 'create_note', arguments: { category: 'Field Notes', content: 'over http' } },
      },
    });

    expect(response.statusCode).toBe(200);
    const message = parseEvent(response.body);
    expect(message).toMatchObject({ jsonrpc: '2.0', id: 2, result: { content: [{ type: 'text' }] } });
    expect(await store.count()).toBe(1);
    expect(await store.listCategories()).toEqual([
      { name: 'field-notes', count: 1, lastNote: new Date('2024-08-01T09:00:00Z') },
    ]);
  });

  it.each(['GET', 'DELETE'] as const)('rejects %s in stateless mode', async (method) => {
    const response = await app.inject({ method, url: '/mcp' });

    expect(response.statusCode).toBe(405);
    expect(response.json()).toEqual({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Method not allowed.' },
      id: null,
    });
  });
});
