import 'dotenv/config';
import { mkdir } from 'fs/promises';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { DownloadOrchestrator } from './core/orchestrator.js';
import { QuotaLedger } from './core/quotaLedger.js';
import { DownloadRecordStore } from './core/recordStore.js';
import { SelectionStore } from './core/selectionStore.js';
import { connectDatabase } from './db/client.js';
import { initializeSchema } from './db/schema.js';
import { createExtractionEngine } from './providers/engine/index.js';
import { SweepQueue } from './queue/sweepQueue.js';

async function main() {
  const config = loadConfig();
  await mkdir(config.storageRoot, { recursive: true });

  const db = connectDatabase(config);
  await initializeSchema(db);

  const engine = createExtractionEngine(config);
  const ledger = new QuotaLedger(db, { dailyLimit: config.dailyDownloadLimit });
  const records = new DownloadRecordStore(db, ledger);
  const selections = new SelectionStore({ ttlMs: config.selectionTimeoutMs });
  const orchestrator = new DownloadOrchestrator(
    { ledger, records, engine },
    {
      storageRoot: config.storageRoot,
      maxFileSizeMb: config.maxFileSizeMb,
      retries: config.engineRetries,
      socketTimeoutSeconds: config.engineSocketTimeoutSeconds,
      timeoutMs: config.engineTimeoutMs,
      cookiesFile: config.cookiesFile,
    },
  );
  const sweepQueue = new SweepQueue(config.redisUrl);

  const app = createApp({ config, engine, ledger, records, selections, orchestrator, sweepQueue });

  const engineVersion = await engine.version().catch((error: unknown) => {
    console.warn('[reelgrab] engine version check failed', error);
    return 'unavailable';
  });

  const server = app.listen(config.port, () => {
    console.log(`[reelgrab] listening on ${config.publicBaseUrl}`);
    console.log(`[reelgrab] engine=${engine.name} version=${engineVersion}`);
    console.log(
      `[reelgrab] daily_limit=${config.dailyDownloadLimit} max_file_size_mb=${config.maxFileSizeMb} retention_hours=${config.retentionHours}`,
    );
    console.log(`[reelgrab] storage_root=${config.storageRoot} persistence=postgres`);
    console.log('[reelgrab] sweeper=external worker');
  });

  const shutdown = () => {
    server.close(async () => {
      await sweepQueue.close();
      await db.close();
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('[reelgrab] fatal startup error', error);
  process.exit(1);
});
