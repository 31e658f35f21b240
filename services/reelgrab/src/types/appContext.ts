import type { AppConfig } from '../config.js';
import type { DownloadOrchestrator } from '../core/orchestrator.js';
import type { QuotaLedger } from '../core/quotaLedger.js';
import type { DownloadRecordStore } from '../core/recordStore.js';
import type { SelectionStore } from '../core/selectionStore.js';
import type { SweepQueue } from '../queue/sweepQueue.js';
import type { ExtractionEngine } from './engine.js';

export interface AppContext {
  config: AppConfig;
  engine: ExtractionEngine;
  ledger: QuotaLedger;
  records: DownloadRecordStore;
  selections: SelectionStore;
  orchestrator: DownloadOrchestrator;
  sweepQueue: Pick<SweepQueue, 'ping' | 'requestSweep'>;
}
