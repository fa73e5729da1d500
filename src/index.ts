import type { Connection } from 'mongoose';

import { connectMongo } from './core/mongo-connection.js';
import { MemoryNoteStore } from './repositories/memory-note-store.js';
import { MongoNoteStore } from './repositories/mongo-note-store.js';
import { createNoteModel } from './repositories/note-model.js';
import type { NoteStore } from './repositories/note-store.js';
import { buildServer } from './server.js';
import { NoteService } from './services/note-service.js';
import type { AppConfig } from './types/index.js';
import { loadConfig } from './utils/config.js';
import logger from './utils/logger.js';

async function createStore(config: AppConfig): Promise<{ store: NoteStore; connection?: Connection }> {
  if (config.store === 'memory') {
    logger.warn('Using in-memory note store; notes are lost on restart');
    return { store: new MemoryNoteStore() };
  }

  const connection = await connectMongo(config.mongodb);
  const store = new MongoNoteStore(createNoteModel(connection), {
    queryTimeoutMs: config.mongodb.queryTimeoutMs,
  });

  try {
    await store.ensureIndexes();
  } catch (error) {
    logger.warn({ error }, 'Failed to ensure indexes');
  }

  return { store, connection };
}

async function main() {
  // Load configuration
  const config = loadConfig();
  logger.level = config.logLevel;

  // Wire dependencies once and pass them to every surface
  const { store, connection } = await createStore(config);
  const noteService = new NoteService(store);
  const app = await buildServer({ noteService });

  // Start server
  try {
    await app.listen({
      port: config.server.port,
      host: config.server.host,
    });
    logger.info(
      { port: config.server.port, host: config.server.host, store: config.store },
      'Server started successfully'
    );
    logger.info(
      {
        web: `http://localhost:${config.server.port}`,
        api: `http://localhost:${config.server.port}/api`,
        mcp: `http://localhost:${config.server.port}/mcp`,
      },
      'Endpoints available'
    );
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async () => {
    logger.info('Shutting down...');
    await app.close();
    if (connection) {
      await connection.close();
    }
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      logger.error({ error }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error) => {
  logger.error({ error }, 'Fatal error');
  process.exit(1);
});
