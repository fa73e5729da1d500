import mongoose, { type Connection } from 'mongoose';

import { MongoConfig } from '../types/index.js';
import logger from '../utils/logger.js';

/**
 * Open a mongoose connection and verify it with a ping.
 * Commands are not buffered while disconnected, so an outage fails
 * requests immediately instead of queueing them.
 */
export async function connectMongo(config: MongoConfig): Promise<Connection> {
  logger.info({ database: config.database }, 'Connecting to MongoDB');

  const connection = mongoose.createConnection(config.uri, {
    dbName: config.database,
    bufferCommands: false,
    serverSelectionTimeoutMS: config.connectTimeoutMs,
    connectTimeoutMS: config.connectTimeoutMs,
  });

  try {
    await connection.asPromise();
    await connection.db?.admin().ping();
  } catch (error) {
    logger.error({ error, database: config.database }, 'Failed to connect to MongoDB');
    await connection.close().catch((closeError) => {
      logger.warn({ error: closeError }, 'Failed to close MongoDB connection');
    });
    throw error;
  }

  logger.info({ database: config.database }, 'MongoDB connection successful');
  return connection;
}
