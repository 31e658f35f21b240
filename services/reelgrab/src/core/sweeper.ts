import { systemClock, type Clock } from '../types/downloads.js';
import { pruneEmptyDirectories, removeFile } from './artifacts.js';
import type { DownloadRecordStore } from './recordStore.js';

export interface SweepReport {
  reclaimed: number;
  filesRemoved: number;
  directoriesPruned: number;
}

export interface RetentionSweeperOptions {
  storageRoot: string;
  retentionHours: number;
  clock?: Clock;
}

/**
 * Expires catalog records older than the retention window and reclaims their
 * disk space. Runs outside request handling and shares nothing with it except
 * the catalog.
 */
export class RetentionSweeper {
  private readonly storageRoot: string;
  private readonly retentionMs: number;
  private readonly clock: Clock;

  constructor(private readonly records: DownloadRecordStore, options: RetentionSweeperOptions) {
    this.storageRoot = options.storageRoot;
    this.retentionMs = options.retentionHours * 60 * 60 * 1000;
    this.clock = options.clock ?? systemClock;
  }

  async sweep(): Promise<SweepReport> {
    const cutoff = new Date(this.clock().getTime() - this.retentionMs);
    const expired = await this.records.listExpired(cutoff);

    let reclaimed = 0;
    let filesRemoved = 0;
    for (const record of expired) {
      try {
        if (await removeFile(record.file_path)) filesRemoved += 1;
      } catch (error) {
        // eslint-disable-next-line no-console
        console.error(`[reelgrab-worker] could not delete record_id=${record.id} path=${record.file_path}`, error);
      }
      // Marked once the attempt is made, whatever its result.
      await this.records.markDeleted(record.id);
      reclaimed += 1;
    }

    const directoriesPruned = await pruneEmptyDirectories(this.storageRoot);

    if (reclaimed > 0 || directoriesPruned > 0) {
      // eslint-disable-next-line no-console
      console.log(
        `[reelgrab-worker] sweep reclaimed=${reclaimed} files_removed=${filesRemoved} dirs_pruned=${directoriesPruned}`,
      );
    }

    return { reclaimed, filesRemoved, directoriesPruned };
  }
}
