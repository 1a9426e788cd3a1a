/**
 * Keyed Locks - serialize work per key (e.g. one player's wallet)
 *
 * Two backends:
 * 1. In-process (default) - promise chain per key, single instance only
 * 2. Redis - SET NX PX with an owner token, released by compare-and-delete;
 *    for several instances sharing one store. The lease is renewed while the
 *    work runs, so ttlMs only bounds how long a crashed holder blocks others.
 *
 * Locks are not re-entrant: code running under a key must not ask for the
 * same key again.
 */

import { randomUUID } from 'node:crypto';
import { logger } from '../logger.js';
import { getErrorMessage } from '../errors.js';

export interface KeyedLock {
  runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T>;
}

// ═══════════════════════════════════════════════════════════════════
// In-Process Lock
// ═══════════════════════════════════════════════════════════════════

export class InProcessKeyedLock implements KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with queued or running work. */
  get activeKeys(): number {
    return this.tails.size;
  }
}

// ═══════════════════════════════════════════════════════════════════
// Redis Lock
// ═══════════════════════════════════════════════════════════════════

/**
 * The commands the lock needs. Build one from a node-redis client with
 * `createRedisLockClient` (databases/redis/connection.ts).
 */
export interface RedisLockClient {
  /** SET key value NX PX ttl; resolves true when the key was set */
  setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;
  /** Delete key only when it still holds value; resolves true when deleted */
  deleteIfEquals(key: string, value: string): Promise<boolean>;
  /** Reset the key's TTL only when it still holds value; resolves true when renewed */
  extendIfEquals(key: string, value: string, ttlMs: number): Promise<boolean>;
}

export interface RedisKeyedLockOptions {
  /** Key prefix (default: 'lock:') */
  keyPrefix?: string;
  /** Lock time-to-live in ms; bounds how long a crashed holder blocks others (default: 10000) */
  ttlMs?: number;
  /** Lease renewal period while the work runs (default: ttlMs / 3) */
  renewIntervalMs?: number;
  /** Delay between acquisition attempts in ms (default: 25) */
  retryDelayMs?: number;
  /** Give up after this many ms (default: 5000) */
  acquireTimeoutMs?: number;
}

export class LockAcquisitionError extends Error {
  constructor(readonly key: string, readonly waitedMs: number) {
    super(`Could not acquire lock ${key} within ${waitedMs}ms`);
    this.name = 'LockAcquisitionError';
  }
}

export const RELEASE_SCRIPT = `if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end`;

export const EXTEND_SCRIPT = `if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("pexpire", KEYS[1], ARGV[2])
else
  return 0
end`;

export class RedisKeyedLock implements KeyedLock {
  private readonly keyPrefix: string;
  private readonly ttlMs: number;
  private readonly renewIntervalMs: number;
  private readonly retryDelayMs: number;
  private readonly acquireTimeoutMs: number;

  constructor(private readonly client: RedisLockClient, options: RedisKeyedLockOptions = {}) {
    this.keyPrefix = options.keyPrefix ?? 'lock:';
    this.ttlMs = options.ttlMs ?? 10_000;
    this.renewIntervalMs = options.renewIntervalMs ?? Math.max(1, Math.floor(this.ttlMs / 3));
    this.retryDelayMs = options.retryDelayMs ?? 25;
    this.acquireTimeoutMs = options.acquireTimeoutMs ?? 5_000;
  }

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const fullKey = `${this.keyPrefix}${key}`;
    const token = randomUUID();
    await this.acquire(fullKey, token);

    const renewal = setInterval(() => {
      void this.renew(fullKey, token);
    }, this.renewIntervalMs);
    try {
      return await fn();
    } finally {
      clearInterval(renewal);
      await this.release(fullKey, token);
    }
  }

  private async acquire(fullKey: string, token: string): Promise<void> {
    const startedAt = Date.now();
    for (;;) {
      if (await this.client.setIfAbsent(fullKey, token, this.ttlMs)) {
        return;
      }
      const waited = Date.now() - startedAt;
      if (waited >= this.acquireTimeoutMs) {
        throw new LockAcquisitionError(fullKey, waited);
      }
      await new Promise(resolve => setTimeout(resolve, this.retryDelayMs));
    }
  }

  // Never rejects: runs from a timer.
  private async renew(fullKey: string, token: string): Promise<void> {
    try {
      const renewed = await this.client.extendIfEquals(fullKey, token, this.ttlMs);
      if (!renewed) {
        logger.warn('Lock lease lost', { key: fullKey, ttlMs: this.ttlMs });
      }
    } catch (error) {
      logger.error('Failed to renew lock', { key: fullKey, error: getErrorMessage(error) });
    }
  }

  private async release(fullKey: string, token: string): Promise<void> {
    try {
      const released = await this.client.deleteIfEquals(fullKey, token);
      if (!released) {
        logger.warn('Lock expired before release', { key: fullKey, ttlMs: this.ttlMs });
      }
    } catch (error) {
      // The TTL frees the key eventually; the caller's result stands.
      logger.error('Failed to release lock', { key: fullKey, error: getErrorMessage(error) });
    }
  }
}
