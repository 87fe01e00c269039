import { createClient } from 'redis';
import { AppConfig } from '../config';
import { logger } from '../utils/logger';

export type SessionRedisClient = ReturnType<typeof createClient>;

/**
 * Redis connection backing the session store.
 */
export class RedisConnection {
  private readonly client: SessionRedisClient;
  private isConnected = false;

  constructor(config: AppConfig['redis']) {
    this.client = createClient({
      url: config.url,
      password: config.password,
      socket: {
        connectTimeout: 5000
      }
    });

    this.client.on('error', (error: Error) => {
      logger.error('Redis connection error', { error: error.message });
      this.isConnected = false;
    });

    this.client.on('ready', () => {
      logger.info('Redis connected');
      this.isConnected = true;
    });

    this.client.on('end', () => {
      logger.warn('Redis disconnected');
      this.isConnected = false;
    });
  }

  public async connect(): Promise<void> {
    try {
      await this.client.connect();
      this.isConnected = true;
      logger.info('Redis connection established');
    } catch (error) {
      logger.error('Failed to connect to Redis', {
        error: error instanceof Error ? error.message : String(error)
      });
      this.isConnected = false;
      throw error;
    }
  }

  public async disconnect(): Promise<void> {
    if (!this.isConnected) {
      return;
    }

    try {
      await this.client.quit();
      logger.info('Redis connection closed');
    } catch (error) {
      logger.error('Error disconnecting from Redis', {
        error: error instanceof Error ? error.message : String(error)
      });
    } finally {
      this.isConnected = false;
    }
  }

  public getClient(): SessionRedisClient {
    return this.client;
  }
}
