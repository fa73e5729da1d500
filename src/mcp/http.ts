import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { FastifyInstance, FastifyReply } from 'fastify';

import { NoteService } from '../services/note-service.js';
import logger from '../utils/logger.js';
import { createMcpServer } from './server.js';

async function methodNotAllowed(_request: unknown, reply: FastifyReply) {
  reply.code(405);
  return {
    jsonrpc: '2.0',
    error: { code: -32000, message: 'Method not allowed.' },
    id: null,
  };
}

/**
 * Serve the tool server over stateless Streamable HTTP at /mcp.
 * Every POST gets its own server and transport, closed with the response.
 */
export async function registerMcpRoutes(app: FastifyInstance, noteService: NoteService) {
  app.post('/mcp', async (request, reply) => {
    const server = createMcpServer(noteService);
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

    reply.raw.on('close', () => {
      server.close().catch((error) => {
        logger.warn({ error }, 'Failed to close MCP server');
      });
    });

    await server.connect(transport);
    reply.hijack();

    try {
      await transport.handleRequest(request.raw, reply.raw, request.body);
    } catch (error) {
      logger.error({ error }, 'MCP request failed');
      if (!reply.raw.headersSent) {
        reply.raw.writeHead(500, { 'content-type': 'application/json' });
        reply.raw.end(
          JSON.stringify({ jsonrpc: '2.0', error: { code: -32603, message: 'Internal server error' }, id: null })
        );
      }
    }
  });

  app.get('/mcp', methodNotAllowed);
  app.delete('/mcp', methodNotAllowed);
}
