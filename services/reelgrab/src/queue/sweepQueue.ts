import { Queue } from 'bullmq';
import { Redis } from 'ioredis';
import { createRedisConnectionOptions } from './connection.js';
import { SWEEP_QUEUE_NAME, SWEEP_SCHEDULER_ID, type SweepJobPayload } from './constants.js';

export class SweepQueue {
  private readonly queue: Queue<SweepJobPayload, void, string>;
  // Separate client for health pings.
  private readonly pingClient: Redis;

  constructor(redisUrl: string) {
    this.queue = new Queue<SweepJobPayload, void, string>(SWEEP_QUEUE_NAME, {
      connection: createRedisConnectionOptions(redisUrl, 'api'),
      defaultJobOptions: {
        attempts: 1,
        removeOnComplete: { age: 3600, count: 200 },
        removeOnFail: { age: 24 * 3600, count: 500 },
      },
    });
    this.pingClient = new Redis(redisUrl, { lazyConnect: true, maxRetriesPerRequest: 1 });
  }

  /** Installs (or updates) the repeating sweep; safe to call on every start. */
  async schedule(everyMs: number): Promise<void> {
    await this.queue.upsertJobScheduler(
      SWEEP_SCHEDULER_ID,
      { every: everyMs },
      { name: 'sweep', data: { trigger: 'schedule' } },
    );
  }

  async requestSweep(): Promise<string> {
    const job = await this.queue.add('sweep', { trigger: 'manual' });
    return job.id ?? 'unknown';
  }

  async ping(): Promise<string> {
    return this.pingClient.ping();
  }

  async close(): Promise<void> {
    this.pingClient.disconnect();
    await this.queue.close();
  }
}
