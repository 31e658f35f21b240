import 'dotenv/config';
import { Worker } from 'bullmq';
import { mkdir } from 'fs/promises';
import { loadConfig } from './config.js';
import { QuotaLedger } from './core/quotaLedger.js';
import { DownloadRecordStore } from './core/recordStore.js';
import { RetentionSweeper, type SweepReport } from './core/sweeper.js';
import { connectDatabase } from './db/client.js';
import { initializeSchema } from './db/schema.js';
import { createRedisConnectionOptions } from './queue/connection.js';
import { SWEEP_QUEUE_NAME, type SweepJobPayload } from './queue/constants.js';
import { SweepQueue } from './queue/sweepQueue.js';

async function main() {
  const config = loadConfig();
  await mkdir(config.storageRoot, { recursive: true });

  const db = connectDatabase(config);
  await initializeSchema(db);

  const ledger = new QuotaLedger(db, { dailyLimit: config.dailyDownloadLimit });
  const records = new DownloadRecordStore(db, ledger);
  const sweeper = new RetentionSweeper(records, {
    storageRoot: config.storageRoot,
    retentionHours: config.retentionHours,
  });

  const scheduler = new SweepQueue(config.redisUrl);
  await scheduler.schedule(config.sweepIntervalMs);

  // One sweep at a time: two passes over the same records would race on unlink.
  const worker = new Worker<SweepJobPayload, SweepReport>(
    SWEEP_QUEUE_NAME,
    async () => sweeper.sweep(),
    {
      connection: createRedisConnectionOptions(config.redisUrl, 'worker'),
      concurrency: 1,
    },
  );

  worker.on('ready', () => {
    console.log(
      `[reelgrab-worker] ready queue=${SWEEP_QUEUE_NAME} every_ms=${config.sweepIntervalMs} retention_hours=${config.retentionHours}`,
    );
  });
  worker.on('failed', (job, error) => {
    console.error(
      `[reelgrab-worker] sweep failed job_id=${job?.id || 'unknown'} trigger=${job?.data.trigger || 'unknown'} error=${error.message}`,
    );
  });

  const shutdown = async () => {
    await worker.close();
    await scheduler.close();
    await db.close();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown();
  });
  process.on('SIGTERM', () => {
    void shutdown();
  });
}

main().catch((error) => {
  console.error('[reelgrab-worker] fatal startup error', error);
  process.exit(1);
});
