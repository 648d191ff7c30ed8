/**
 * Redis List Transport
 *
 * LPUSH onto a Redis list, the way the kombu Redis transport expects task
 * messages to arrive.
 */

import { Redis } from "ioredis";
import type { ListTransport } from "../interfaces/IDispatchClient.js";
import { createLogger, type Logger } from "../../../utils/logger.js";

export interface RedisListTransportOptions {
  connectTimeoutMs?: number;
  logger?: Logger;
}

export class RedisListTransport implements ListTransport {
  private readonly client: Redis;
  private readonly logger: Logger;
  private closed = false;

  constructor(brokerUrl: string, options: RedisListTransportOptions = {}) {
    this.logger = options.logger ?? createLogger("redis-transport");
    this.client = new Redis(brokerUrl, {
      lazyConnect: true,
      connectTimeout: options.connectTimeoutMs ?? 10000,
      maxRetriesPerRequest: 1,
      // Never give up reconnecting; each push still fails after one retry
      retryStrategy: (times) => Math.min(times * 200, 2000),
    });
    this.client.on("error", (error: Error) => {
      this.logger.warn({ err: error }, "Redis connection error");
    });
  }

  async push(key: string, payload: string): Promise<number> {
    if (this.client.status === "end" && !this.closed) {
      this.logger.info("Redis connection ended; reconnecting");
      await this.client.connect();
    }
    return this.client.lpush(key, payload);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.client.status === "ready") {
      await this.client.quit();
    } else {
      this.client.disconnect();
    }
  }
}
