import dotenv from 'dotenv';
import { AppConfig, StoreKind } from '../types/index.js';

dotenv.config();

function parseNumber(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parseStoreKind(value: string | undefined): StoreKind {
  return value === 'memory' ? 'memory' : 'mongo';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    mongodb: {
      uri: env.MONGODB_URI || 'mongodb://localhost:27017',
      database: env.MONGODB_DATABASE || 'scratchpad',
      connectTimeoutMs: parseNumber(env.MONGODB_CONNECT_TIMEOUT_MS, 10000),
      queryTimeoutMs: parseNumber(env.MONGODB_QUERY_TIMEOUT_MS, 5000),
    },
    store: parseStoreKind(env.NOTE_STORE),
    server: {
      port: parseNumber(env.PORT, 7521),
      host: env.HOST || '0.0.0.0',
    },
    logLevel: env.LOG_LEVEL || 'info',
  };
}
