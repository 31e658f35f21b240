import { access, mkdir, readdir, rm } from 'fs/promises';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  createMemoryDatabase,
  createTempDir,
  manualClock,
  removeTempDir,
  writeBytes,
  type ManualClock,
} from '../testing/fixtures.js';
import { QuotaLedger } from './quotaLedger.js';
import { DownloadRecordStore } from './recordStore.js';
import { RetentionSweeper } from './sweeper.js';

const fsHooks = vi.hoisted(() => {
  const hooks: { beforeRmdir?: (path: string) => Promise<void> } = {};
  return hooks;
});

vi.mock('fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs/promises')>();
  return {
    ...actual,
    rmdir: async (...args: Parameters<typeof actual.rmdir>) => {
      await fsHooks.beforeRmdir?.(String(args[0]));
      return actual.rmdir(...args);
    },
  };
});

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe('RetentionSweeper', () => {
  let root: string;
  let clock: ManualClock;
  let records: DownloadRecordStore;
  let sweeper: RetentionSweeper;

  beforeEach(async () => {
    root = await createTempDir();
    clock = manualClock('2026-10-19T10:00:00.000Z');
    const db = await createMemoryDatabase();
    const ledger = new QuotaLedger(db, { dailyLimit: 50, clock: clock.now });
    records = new DownloadRecordStore(db, ledger, clock.now);
    sweeper = new RetentionSweeper(records, { storageRoot: root, retentionHours: 1, clock: clock.now });
  });

  afterEach(async () => {
    fsHooks.beforeRmdir = undefined;
    vi.restoreAllMocks();
    await removeTempDir(root);
  });

  async function catalog(relativePath: string, withFile = true): Promise<number> {
    const path = join(root, relativePath);
    if (withFile) await writeBytes(path, 16);
    return records.createRecord({
      requester: { id: 'u1', displayName: 'Ana' },
      platform: 'TikTok',
      url: 'https://www.tiktok.com/@a/video/1',
      filename: relativePath,
      path,
    });
  }

  it('expires old records, removes their files and prunes emptied folders', async () => {
    const old = await catalog('2026-10-19/req-a/old.mp4');
    clock.set('2026-10-19T11:30:00.000Z');
    const young = await catalog('2026-10-19/req-b/young.mp4');
    clock.set('2026-10-19T11:45:00.000Z');

    const report = await sweeper.sweep();

    expect(report).toEqual({ reclaimed: 1, filesRemoved: 1, directoriesPruned: 1 });
    expect((await records.get(old))?.deleted).toBe(true);
    expect((await records.get(young))?.deleted).toBe(false);
    expect(await exists(join(root, '2026-10-19/req-a'))).toBe(false);
    expect(await exists(join(root, '2026-10-19/req-b/young.mp4'))).toBe(true);
  });

  it('marks records whose file is already gone', async () => {
    const delivered = await catalog('2026-10-19/req-a/sent.mp4', false);
    clock.advance(2 * 60 * 60 * 1000);

    const report = await sweeper.sweep();

    expect(report).toEqual({ reclaimed: 1, filesRemoved: 0, directoriesPruned: 0 });
    expect((await records.get(delivered))?.deleted).toBe(true);
  });

  it('does nothing on a second pass', async () => {
    await catalog('2026-10-19/req-a/old.mp4');
    clock.advance(2 * 60 * 60 * 1000);
    await sweeper.sweep();

    expect(await sweeper.sweep()).toEqual({ reclaimed: 0, filesRemoved: 0, directoriesPruned: 0 });
    expect(await readdir(root)).toEqual([]);
  });

  it('marks a record once the delete was attempted, even if it failed', async () => {
    const errorLog = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const stuck = await catalog('2026-10-19/req-a/stuck.mp4', false);
    await writeBytes(join(root, '2026-10-19/req-a/stuck.mp4/part.bin'), 4);
    clock.advance(2 * 60 * 60 * 1000);

    const report = await sweeper.sweep();

    expect(report).toEqual({ reclaimed: 1, filesRemoved: 0, directoriesPruned: 0 });
    expect((await records.get(stuck))?.deleted).toBe(true);
    expect(errorLog).toHaveBeenCalledTimes(1);
  });

  it('skips a scratch folder a running download writes into mid-pass', async () => {
    const old = await catalog('2026-10-19/req-a/old.mp4');
    const inFlight = join(root, '2026-10-19/in-flight-req');
    await mkdir(inFlight, { recursive: true });
    clock.advance(2 * 60 * 60 * 1000);
    fsHooks.beforeRmdir = async (path) => {
      if (path === inFlight) await writeBytes(join(inFlight, 'Clip.mp4.part'), 8);
    };

    const report = await sweeper.sweep();

    expect(report).toEqual({ reclaimed: 1, filesRemoved: 1, directoriesPruned: 1 });
    expect((await records.get(old))?.deleted).toBe(true);
    expect(await exists(join(inFlight, 'Clip.mp4.part'))).toBe(true);
    expect(await exists(join(root, '2026-10-19/req-a'))).toBe(false);
  });

  it('skips a scratch folder a failed download removes mid-pass', async () => {
    const failed = join(root, '2026-10-19/failed-req');
    await mkdir(failed, { recursive: true });
    fsHooks.beforeRmdir = async (path) => {
      if (path === failed) await rm(failed, { recursive: true, force: true });
    };

    const report = await sweeper.sweep();

    expect(report).toEqual({ reclaimed: 0, filesRemoved: 0, directoriesPruned: 1 });
    expect(await readdir(root)).toEqual([]);
  });
});
