// node/src/services/cache/redis-kv-store.ts: Redis-backed KeyValueStore
import Redis from 'ioredis';
import { logger, errorMessage } from '@/services/logger';
import { StoreUnavailableError } from '@/utils/errors';
import type { KeyValueStore } from './kv-store';

const log = logger.getSubLogger({ name: 'redis' });

export class RedisKeyValueStore implements KeyValueStore {
  readonly name = 'redis';
  private readonly client: Redis;

  constructor(redisUrl: string, client?: Redis) {
    this.client =
      client ??
      new Redis(redisUrl, {
        lazyConnect: true,
        maxRetriesPerRequest: 1,
        enableOfflineQueue: false,
        connectTimeout: 5000,
        retryStrategy(times) {
          // keep trying in the background, capped at 30s between attempts
          return Math.min(times * 200, 30000);
        },
      });

    this.client.on('error', (err: Error) => {
      log.warn('redis:error', { error: errorMessage(err) });
    });
    this.client.on('ready', () => {
      log.info('redis:ready');
    });
  }

  /** Connects once; a failure is logged and the store stays unavailable until Redis comes back. */
  async connect(): Promise<void> {
    try {
      await this.client.connect();
      await this.client.ping();
      log.info('redis:connected');
    } catch (err) {
      log.warn('redis:connect_failed', { error: errorMessage(err) });
    }
  }

  isAvailable(): boolean {
    return this.client.status === 'ready';
  }

  private ensureReady(op: string): void {
    if (!this.isAvailable()) {
      throw new StoreUnavailableError(`Redis not available for ${op} (status: ${this.client.status})`);
    }
  }

  private async run<T>(op: string, fn: () => Promise<T>): Promise<T> {
    this.ensureReady(op);
    try {
      return await fn();
    } catch (err) {
      throw new StoreUnavailableError(`Redis ${op} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async put(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.run('put', () => this.client.set(key, value, 'EX', Math.max(1, Math.ceil(ttlSeconds))));
  }

  async get(key: string): Promise<string | null> {
    return this.run('get', () => this.client.get(key));
  }

  async delete(key: string): Promise<void> {
    await this.run('delete', () => this.client.del(key));
  }

  async scanKeys(prefix: string): Promise<string[]> {
    return this.run('scan', async () => {
      const keys: string[] = [];
      let cursor = '0';
      do {
        const [next, batch] = await this.client.scan(cursor, 'MATCH', `${prefix}*`, 'COUNT', 200);
        cursor = next;
        keys.push(...batch);
      } while (cursor !== '0');
      // SCAN may return a key more than once
      return [...new Set(keys)];
    });
  }

  async destroy(): Promise<void> {
    try {
      await this.client.quit();
    } catch (err) {
      log.warn('redis:quit_failed', { error: errorMessage(err) });
      this.client.disconnect();
    }
  }
}
