/**
 * Redis Connection Manager
 * Owns one ioredis client; connect explicitly with initialize() before use
 */

import Redis, { RedisOptions } from 'ioredis';

export interface RedisConnectionOptions {
  url: string;
  connectTimeoutMs: number;
  maxRetries?: number;
}

export type InitializeResult = { ok: true } | { ok: false; error: string };

export type RedisClient = Pick<Redis, 'connect' | 'ping' | 'quit' | 'disconnect' | 'on' | 'status'>;

export type RedisFactory = (url: string, options: RedisOptions) => RedisClient;

const defaultFactory: RedisFactory = (url, options) => new Redis(url, options);

export class RedisConnection {
  private client: RedisClient | null = null;
  // Once the first connect succeeds, reconnects are retried without limit
  private established = false;

  constructor(
    private readonly options: RedisConnectionOptions,
    private readonly factory: RedisFactory = defaultFactory
  ) {}

  /**
   * Connect and ping once. Failures are returned, not thrown.
   */
  async initialize(): Promise<InitializeResult> {
    if (this.client) {
      return { ok: true };
    }

    const maxRetries = this.options.maxRetries ?? 5;
    const redisOptions: RedisOptions = {
      connectTimeout: this.options.connectTimeoutMs,
      retryStrategy: (times: number) => {
        if (!this.established && times > maxRetries) {
          return null;
        }
        const delay = Math.min(times * 50, 2000);
        console.log(`Redis retry attempt ${times}, waiting ${delay}ms`);
        return delay;
      },
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
      enableOfflineQueue: false,
      lazyConnect: true,
    };

    const client = this.factory(this.options.url, redisOptions);

    client.on('ready', () => {
      console.log('Redis: Connected and ready');
    });
    client.on('error', (error: Error) => {
      console.error('Redis error:', error.message);
    });
    client.on('close', () => {
      console.log('Redis: Connection closed');
    });

    try {
      await client.connect();
      const pong = await client.ping();
      if (pong !== 'PONG') {
        throw new Error(`unexpected ping reply "${pong}"`);
      }
      this.client = client;
      this.established = true;
      return { ok: true };
    } catch (error) {
      client.disconnect();
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, error: message };
    }
  }

  /**
   * Health check - ping Redis server
   */
  async healthCheck(): Promise<boolean> {
    if (!this.client) {
      return false;
    }

    try {
      const result = await this.client.ping();
      return result === 'PONG';
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error('Redis health check failed:', message);
      return false;
    }
  }

  /**
   * Check if Redis is available
   */
  isAvailable(): boolean {
    return this.client !== null && this.client.status === 'ready';
  }

  /**
   * Disconnect from Redis
   */
  async disconnect(): Promise<void> {
    if (this.client) {
      const client = this.client;
      this.client = null;
      await client.quit();
    }
  }
}
