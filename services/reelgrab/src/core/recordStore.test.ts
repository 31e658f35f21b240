import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
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

const ana = { id: 'u1', displayName: 'Ana' };

describe('DownloadRecordStore', () => {
  let dir: string;
  let clock: ManualClock;
  let ledger: QuotaLedger;
  let records: DownloadRecordStore;

  beforeEach(async () => {
    dir = await createTempDir();
    clock = manualClock('2026-10-19T10:00:00.000Z');
    const db = await createMemoryDatabase();
    ledger = new QuotaLedger(db, { dailyLimit: 50, clock: clock.now });
    records = new DownloadRecordStore(db, ledger, clock.now);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  async function catalog(name: string, size = 10): Promise<number> {
    const path = join(dir, name);
    await writeBytes(path, size);
    return records.createRecord({
      requester: ana,
      platform: 'YouTube',
      url: `https://youtu.be/${name}`,
      filename: name,
      path,
    });
  }

  it('catalogs a file as downloaded and counts it against the quota', async () => {
    const id = await catalog('clip.mp4', 1234);

    const record = await records.get(id);
    expect(record).toEqual({
      id,
      user_id: 'u1',
      user_name: 'Ana',
      platform: 'YouTube',
      url: 'https://youtu.be/clip.mp4',
      filename: 'clip.mp4',
      file_path: join(dir, 'clip.mp4'),
      file_size: 1234,
      status: 'downloaded',
      created_at: '2026-10-19T10:00:00.000Z',
      sent_at: undefined,
      deleted: false,
    });

    const stats = await records.getUserStats('u1');
    expect(stats.downloadsToday).toBe(1);
    expect(stats.totalDownloads).toBe(1);
  });

  it('moves a record to sent once and keeps the first timestamp', async () => {
    const id = await catalog('clip.mp4');

    clock.advance(1000);
    await records.markSent(id);
    clock.advance(1000);
    await records.markSent(id);

    const record = await records.get(id);
    expect(record?.status).toBe('sent');
    expect(record?.sent_at).toBe('2026-10-19T10:00:01.000Z');
  });

  it('ignores markSent for an unknown id', async () => {
    const id = await catalog('clip.mp4');

    await expect(records.markSent(999)).resolves.toBeUndefined();
    expect((await records.get(id))?.status).toBe('downloaded');
    expect(await records.stats()).toEqual({ total: 1, sent: 0, pending_sweep: 1 });
  });

  it('returns undefined for an unknown id', async () => {
    expect(await records.get(999)).toBeUndefined();
  });

  it('lists a user\'s records newest first up to the limit', async () => {
    const first = await catalog('a.mp4');
    const second = await catalog('b.mp4');
    const third = await catalog('c.mp4');

    const all = await records.listForUser('u1');
    expect(all.map((record) => record.id)).toEqual([third, second, first]);

    const limited = await records.listForUser('u1', 2);
    expect(limited.map((record) => record.id)).toEqual([third, second]);

    expect(await records.listForUser('someone-else')).toEqual([]);
  });

  it('finds only undeleted records older than the cutoff', async () => {
    const old = await catalog('old.mp4');
    clock.advance(30 * 60 * 1000);
    const middle = await catalog('middle.mp4');
    clock.advance(45 * 60 * 1000);
    await catalog('young.mp4');

    const cutoff = new Date('2026-10-19T10:40:00.000Z');
    const expired = await records.listExpired(cutoff);
    expect(expired).toEqual([
      { id: old, file_path: join(dir, 'old.mp4') },
      { id: middle, file_path: join(dir, 'middle.mp4') },
    ]);

    await records.markDeleted(old);
    expect((await records.listExpired(cutoff)).map((record) => record.id)).toEqual([middle]);
    expect((await records.get(old))?.deleted).toBe(true);
  });

  it('summarizes the catalog', async () => {
    const a = await catalog('a.mp4');
    const b = await catalog('b.mp4');
    await catalog('c.mp4');
    await records.markSent(a);
    await records.markDeleted(b);

    expect(await records.stats()).toEqual({ total: 3, sent: 1, pending_sweep: 2 });
  });
});
