import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { ScratchpadError, publicMessageFor } from '../core/errors.js';
import { parseDateFilter } from '../core/query.js';
import { NoteService } from '../services/note-service.js';
import logger from '../utils/logger.js';

const SERVER_NAME = 'Scratchpad';
const SERVER_VERSION = '0.1.0';

function jsonResult(value: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

function errorResult(message: string): CallToolResult {
  return { content: [{ type: 'text', text: message }], isError: true };
}

class DateArgumentError extends Error {}

// Agents get told about a bad date instead of silently losing the filter.
function dateArgument(name: string, value: string | undefined): Date | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = parseDateFilter(value);
  if (!parsed) {
    throw new DateArgumentError(`invalid '${name}' date format: expected YYYY-MM-DD or RFC3339 format`);
  }
  return parsed;
}

async function runTool(action: string, task: () => Promise<unknown>): Promise<CallToolResult> {
  try {
    return jsonResult(await task());
  } catch (error) {
    if (error instanceof DateArgumentError) {
      return errorResult(error.message);
    }
    if (!(error instanceof ScratchpadError)) {
      logger.error({ error, action }, 'MCP tool failed');
    }
    return errorResult(`failed to ${action}: ${publicMessageFor(error)}`);
  }
}

const limitArg = (defaultLimit: number, maxLimit: number) =>
  z
    .number()
    .int()
    .optional()
    .describe(`Maximum number of notes to return (default: ${defaultLimit}, max: ${maxLimit})`);

const dateArg = (meaning: string) =>
  z.string().optional().describe(`Optional: Only return notes created ${meaning} this date (ISO format: YYYY-MM-DD or RFC3339)`);

/**
 * Agent-facing tool server over the note service.
 * One server instance is created per transport connection.
 */
export function createMcpServer(noteService: NoteService): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  server.registerTool(
    'list_categories',
    {
      title: 'List categories',
      description:
        'List all note categories with counts and last activity date. Use this to understand what topics are available in the scratchpad.',
    },
    async () => runTool('list categories', () => noteService.listCategories())
  );

  server.registerTool(
    'get_notes',
    {
      title: 'Get notes',
      description:
        'Get notes from a specific category, ordered by newest first. Use this to retrieve all notes in a topic.',
      inputSchema: {
        category: z.string().min(1).describe("Category name (e.g., 'twitter-analytics', 'content-ideas')"),
        limit: limitArg(50, 200),
        offset: z.number().int().optional().describe('Number of notes to skip for pagination (default: 0)'),
      },
    },
    async ({ category, limit, offset }) =>
      runTool('get notes', () => noteService.list({ category, limit, offset }))
  );

  server.registerTool(
    'search_notes',
    {
      title: 'Search notes',
      description:
        'Full-text search across notes with optional category and date filtering. Use this to find specific information across all notes or within a category.',
      inputSchema: {
        query: z.string().min(1).describe('Search query - searches note content'),
        category: z.string().optional().describe('Optional: Filter by category name'),
        since: dateArg('on or after'),
        until: dateArg('on or before'),
        limit: limitArg(50, 200),
      },
    },
    async ({ query, category, since, until, limit }) =>
      runTool('search notes', () =>
        noteService.search({
          query,
          category,
          since: dateArgument('since', since),
          until: dateArgument('until', until),
          limit,
        })
      )
  );

  server.registerTool(
    'get_recent_notes',
    {
      title: 'Get recent notes',
      description:
        "Get the most recent notes across all categories. Use this to see what's new or to get an overview of recent activity.",
      inputSchema: {
        limit: limitArg(20, 100),
        since: dateArg('on or after'),
      },
    },
    async ({ limit, since }) =>
      runTool('get recent notes', () => noteService.recent({ limit, since: dateArgument('since', since) }))
  );

  server.registerTool(
    'get_note',
    {
      title: 'Get note',
      description: 'Get a specific note by its ID. Use this when you have a note ID and need the full content.',
      inputSchema: {
        id: z.string().describe('The note ID (24-character hex string)'),
      },
    },
    async ({ id }) => runTool('get note', () => noteService.get(id))
  );

  server.registerTool(
    'create_note',
    {
      title: 'Create note',
      description:
        'Save a markdown note under a category. Categories are lowercased and spaces become hyphens, so "Content Ideas" is stored as "content-ideas".',
      inputSchema: {
        category: z.string().describe('Category name'),
        content: z.string().describe('Markdown content of the note'),
      },
    },
    async ({ category, content }) => runTool('create note', () => noteService.create({ category, content }))
  );

  server.registerTool(
    'delete_note',
    {
      title: 'Delete note',
      description: 'Permanently delete a note by its ID.',
      inputSchema: {
        id: z.string().describe('The note ID (24-character hex string)'),
      },
    },
    async ({ id }) =>
      runTool('delete note', async () => {
        await noteService.delete(id);
        return { deleted: id };
      })
  );

  return server;
}
