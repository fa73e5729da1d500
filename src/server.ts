import Fastify, { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';

import { registerRoutes } from './api/routes.js';
import { ScratchpadError, httpStatusFor, publicMessageFor } from './core/errors.js';
import { registerMcpRoutes } from './mcp/http.js';
import { NoteService } from './services/note-service.js';
import logger from './utils/logger.js';
import { registerWebRoutes } from './web/routes.js';

export interface ServerDependencies {
  noteService: NoteService;
}

function errorResponse(error: FastifyError): { status: number; message: string } {
  if (error instanceof ScratchpadError) {
    return { status: httpStatusFor(error), message: publicMessageFor(error) };
  }
  // Fastify's own client errors (bad JSON, wrong content type) keep their status.
  if (error.statusCode !== undefined && error.statusCode < 500) {
    return { status: error.statusCode, message: error.message };
  }
  return { status: 500, message: 'internal error' };
}

/**
 * Build the HTTP application: REST API, web pages and the MCP endpoint
 * all share the one NoteService passed in.
 */
export async function buildServer({ noteService }: ServerDependencies): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // Using pino logger directly
  });

  await app.register(cors, {
    origin: true,
  });

  app.setErrorHandler((error, request, reply) => {
    const { status, message } = errorResponse(error);
    if (status >= 500) {
      logger.error({ error, method: request.method, url: request.url }, 'Request failed');
    } else {
      logger.debug({ status, message, url: request.url }, 'Request rejected');
    }
    reply.code(status).send({ error: message });
  });

  await registerRoutes(app, noteService);
  await registerWebRoutes(app, noteService);
  await registerMcpRoutes(app, noteService);

  return app;
}
