/**
 * Redis Client - connection, health check, lock adapter
 *
 * Usage:
 * - connectRedis('redis://localhost:6379')
 * - connectRedis({ url, clientName: 'loyalty-service' })
 */

import { createClient } from 'redis';
import { logger } from '../../common/logger.js';
import { getErrorMessage } from '../../common/errors.js';
import { EXTEND_SCRIPT, RELEASE_SCRIPT, type RedisLockClient } from '../../common/resilience/keyed-lock.js';

export type RedisClient = ReturnType<typeof createClient>;

let client: RedisClient | null = null;

// ═══════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════

export interface RedisConfig {
  url: string;
  /** Connection timeout in ms (default: 5000) */
  connectTimeout?: number;
  /** Max reconnect attempts before giving up (default: 10) */
  maxReconnectRetries?: number;
  /** Upper bound for the reconnect delay in ms (default: 2000) */
  reconnectDelay?: number;
  /** Client name for monitoring (shows in CLIENT LIST) */
  clientName?: string;
}

const DEFAULT_CONFIG = {
  connectTimeout: 5000,
  maxReconnectRetries: 10,
  reconnectDelay: 2000,
};

// ═══════════════════════════════════════════════════════════════════
// Connection
// ═══════════════════════════════════════════════════════════════════

export async function connectRedis(urlOrConfig: string | RedisConfig): Promise<RedisClient> {
  if (client) return client;

  const config: RedisConfig = typeof urlOrConfig === 'string' ? { url: urlOrConfig } : urlOrConfig;
  const cfg = { ...DEFAULT_CONFIG, ...config };

  const newClient = createClient({
    url: cfg.url,
    ...(cfg.clientName && { name: cfg.clientName }),
    socket: {
      connectTimeout: cfg.connectTimeout,
      keepAlive: 5000,
      noDelay: true,
      reconnectStrategy: (retries: number) => {
        if (retries > cfg.maxReconnectRetries) {
          logger.error('Redis max reconnect attempts reached');
          return new Error('Max reconnect attempts reached');
        }
        const jitter = Math.floor(Math.random() * 200);
        return Math.min(Math.pow(2, retries) * 50, cfg.reconnectDelay) + jitter;
      },
    },
  });

  newClient.on('error', (err: unknown) => logger.error('Redis error', { error: getErrorMessage(err) }));
  newClient.on('reconnecting', () => logger.warn('Redis reconnecting'));

  await newClient.connect();
  client = newClient;
  logger.info('Connected to Redis', { url: cfg.url.replace(/\/\/[^@]*@/, '//***@') });
  return newClient;
}

export async function closeRedis(): Promise<void> {
  if (client) {
    await client.quit();
    client = null;
    logger.info('Redis disconnected');
  }
}

export async function checkRedisHealth(): Promise<{ healthy: boolean; latencyMs: number; error?: string }> {
  const start = Date.now();
  if (!client) {
    return { healthy: false, latencyMs: 0, error: 'Redis not connected' };
  }
  try {
    await client.ping();
    return { healthy: true, latencyMs: Date.now() - start };
  } catch (error) {
    return { healthy: false, latencyMs: Date.now() - start, error: getErrorMessage(error) };
  }
}

// ═══════════════════════════════════════════════════════════════════
// Lock Adapter
// ═══════════════════════════════════════════════════════════════════

/**
 * Adapt a node-redis client to the commands RedisKeyedLock needs.
 */
export function createRedisLockClient(redis: RedisClient): RedisLockClient {
  return {
    async setIfAbsent(key, value, ttlMs) {
      const reply = await redis.set(key, value, { NX: true, PX: ttlMs });
      return reply === 'OK';
    },
    async deleteIfEquals(key, value) {
      const reply = await redis.eval(RELEASE_SCRIPT, { keys: [key], arguments: [value] });
      return reply === 1;
    },
    async extendIfEquals(key, value, ttlMs) {
      const reply = await redis.eval(EXTEND_SCRIPT, { keys: [key], arguments: [value, String(ttlMs)] });
      return reply === 1;
    },
  };
}
