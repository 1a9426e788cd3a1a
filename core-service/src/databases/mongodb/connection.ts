/**
 * MongoDB Connection
 *
 * - Connection pooling with pool-exhaustion protection (waitQueueTimeoutMS)
 * - Read preference / write concern
 * - Retryable reads and writes
 * - Health check
 */

import { MongoClient, ReadPreference, WriteConcern, type Db, type MongoClientOptions } from 'mongodb';
import { logger } from '../../common/logger.js';
import { getErrorMessage } from '../../common/errors.js';

let client: MongoClient | null = null;
let db: Db | null = null;

// ═══════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════

export interface MongoConfig {
  dbName?: string;
  maxPoolSize?: number;
  minPoolSize?: number;
  maxIdleTimeMS?: number;
  waitQueueTimeoutMS?: number;
  connectTimeoutMS?: number;
  socketTimeoutMS?: number;
  serverSelectionTimeoutMS?: number;
  readPreference?: 'primary' | 'secondary' | 'nearest';
  writeConcern?: 'majority' | number;
  retryWrites?: boolean;
  retryReads?: boolean;
}

const DEFAULT_MONGO_CONFIG: Required<Omit<MongoConfig, 'dbName'>> = {
  maxPoolSize: 100,
  minPoolSize: 10,
  maxIdleTimeMS: 30000,
  waitQueueTimeoutMS: 10000,
  connectTimeoutMS: 10000,
  socketTimeoutMS: 45000,
  serverSelectionTimeoutMS: 30000,
  // Transactions must read from the primary
  readPreference: 'primary',
  writeConcern: 'majority',
  retryWrites: true,
  retryReads: true,
};

const readPrefMap = {
  primary: ReadPreference.PRIMARY,
  secondary: ReadPreference.SECONDARY_PREFERRED,
  nearest: ReadPreference.NEAREST,
} as const;

// ═══════════════════════════════════════════════════════════════════
// Connection
// ═══════════════════════════════════════════════════════════════════

export async function connectDatabase(uri: string, config: MongoConfig = {}): Promise<{ client: MongoClient; db: Db }> {
  if (client && db) {
    return { client, db };
  }

  const cfg = { ...DEFAULT_MONGO_CONFIG, ...config };

  const clientOptions: MongoClientOptions = {
    maxPoolSize: cfg.maxPoolSize,
    minPoolSize: cfg.minPoolSize,
    maxIdleTimeMS: cfg.maxIdleTimeMS,
    waitQueueTimeoutMS: cfg.waitQueueTimeoutMS,
    connectTimeoutMS: cfg.connectTimeoutMS,
    socketTimeoutMS: cfg.socketTimeoutMS,
    serverSelectionTimeoutMS: cfg.serverSelectionTimeoutMS,
    readPreference: readPrefMap[cfg.readPreference],
    writeConcern: new WriteConcern(cfg.writeConcern),
    retryWrites: cfg.retryWrites,
    retryReads: cfg.retryReads,
  };

  const newClient = new MongoClient(uri, clientOptions);

  newClient.on('connectionCheckOutFailed', (event) => {
    if (event.reason === 'timeout') {
      logger.warn('MongoDB connection pool exhausted - checkout timeout', {
        maxPoolSize: cfg.maxPoolSize,
      });
    }
  });

  await newClient.connect();

  let dbName = cfg.dbName || new URL(uri).pathname.slice(1) || 'default';
  if (dbName.includes('?')) {
    dbName = dbName.split('?')[0];
  }
  client = newClient;
  db = newClient.db(dbName.trim());

  logger.info('Connected to MongoDB', {
    database: db.databaseName,
    maxPoolSize: cfg.maxPoolSize,
    readPreference: cfg.readPreference,
  });

  return { client, db };
}

function getClient(): MongoClient {
  if (!client) throw new Error('Database not connected');
  return client;
}

export async function closeDatabase(): Promise<void> {
  if (client) {
    await client.close();
    client = null;
    db = null;
    logger.info('MongoDB disconnected');
  }
}

export async function checkDatabaseHealth(): Promise<{ healthy: boolean; latencyMs: number; error?: string }> {
  const start = Date.now();
  try {
    await getClient().db('admin').command({ ping: 1 });
    return { healthy: true, latencyMs: Date.now() - start };
  } catch (error) {
    return { healthy: false, latencyMs: Date.now() - start, error: getErrorMessage(error) };
  }
}
