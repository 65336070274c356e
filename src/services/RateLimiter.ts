import PQueue from 'p-queue';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('RateLimiter');

export interface RateLimiterOptions {
  requestsPerMinute: number;
  concurrency?: number;
}

// FIFO queue capping both concurrent and per-minute work
export class RateLimiter {
  private queue: PQueue;

  constructor(name: string, options: RateLimiterOptions) {
    this.queue = new PQueue({
      concurrency: options.concurrency ?? 1,
      intervalCap: options.requestsPerMinute,
      interval: 60000, // 1 minute
    });

    logger.debug(
      `RateLimiter ${name} initialized: ${options.requestsPerMinute} req/min, concurrency ${options.concurrency ?? 1}`
    );
  }

  // Execute a function with rate limiting
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    return this.queue.add(fn, { throwOnTimeout: true });
  }

  // Tasks waiting to start
  getQueueSize(): number {
    return this.queue.size;
  }

  // Resolves once nothing is queued or running
  onIdle(): Promise<void> {
    return this.queue.onIdle();
  }
}

export default RateLimiter;
