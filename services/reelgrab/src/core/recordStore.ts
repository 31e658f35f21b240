import type { Database } from '../db/client.js';
import {
  systemClock,
  type Clock,
  type DownloadRecord,
  type Requester,
  type UserStats,
} from '../types/downloads.js';
import { fileSize } from './artifacts.js';
import type { QuotaLedger } from './quotaLedger.js';
import { toIso } from './time.js';

interface DownloadRow {
  id: number;
  user_id: string;
  user_name: string;
  platform: string;
  url: string;
  filename: string;
  file_path: string;
  file_size: number;
  status: string;
  created_at: Date | string;
  sent_at: Date | string | null;
  deleted: boolean;
}

export interface NewRecordInput {
  requester: Requester;
  platform: string;
  url: string;
  filename: string;
  path: string;
}

export interface ExpiredRecord {
  id: number;
  file_path: string;
}

function toStatus(value: string): DownloadRecord['status'] {
  if (value === 'pending' || value === 'downloaded' || value === 'sent') return value;
  throw new Error(`Unexpected download status "${value}" in catalog`);
}

export class DownloadRecordStore {
  private readonly clock: Clock;

  constructor(
    private readonly db: Database,
    private readonly ledger: QuotaLedger,
    clock: Clock = systemClock,
  ) {
    this.clock = clock;
  }

  private toRecord(row: DownloadRow): DownloadRecord {
    return {
      id: Number(row.id),
      user_id: row.user_id,
      user_name: row.user_name,
      platform: row.platform,
      url: row.url,
      filename: row.filename,
      file_path: row.file_path,
      file_size: Number(row.file_size),
      status: toStatus(row.status),
      created_at: toIso(row.created_at),
      sent_at: row.sent_at ? toIso(row.sent_at) : undefined,
      deleted: Boolean(row.deleted),
    };
  }

  /**
   * Catalogs a downloaded artifact and counts it against the requester's
   * quota in one transaction.
   */
  async createRecord(input: NewRecordInput): Promise<number> {
    const size = await fileSize(input.path);
    const now = this.clock().toISOString();

    return this.db.withTransaction(async (tx) => {
      const rows = await tx.query<{ id: number }>(
        `
          insert into downloads (
            user_id, user_name, platform, url, filename, file_path, file_size,
            status, created_at, sent_at, deleted
          )
          values ($1, $2, $3, $4, $5, $6, $7, 'downloaded', $8, null, false)
          returning id
        `,
        [
          input.requester.id,
          input.requester.displayName,
          input.platform,
          input.url,
          input.filename,
          input.path,
          size,
          now,
        ],
      );
      if (!rows[0]) {
        throw new Error('Catalog insert returned no id');
      }

      await this.ledger.recordDownload(input.requester.id, input.requester.displayName, tx);
      return Number(rows[0].id);
    });
  }

  async markSent(recordId: number): Promise<void> {
    await this.db.query(
      `
        update downloads
        set status = 'sent', sent_at = $2
        where id = $1
          and status = 'downloaded'
      `,
      [recordId, this.clock().toISOString()],
    );
  }

  async get(recordId: number): Promise<DownloadRecord | undefined> {
    const rows = await this.db.query<DownloadRow>(
      `
        select *
        from downloads
        where id = $1
        limit 1
      `,
      [recordId],
    );
    return rows[0] ? this.toRecord(rows[0]) : undefined;
  }

  async listForUser(userId: string, limit = 20): Promise<DownloadRecord[]> {
    const capped = Number.isFinite(limit) ? Math.min(Math.max(Math.trunc(limit), 1), 100) : 20;
    const rows = await this.db.query<DownloadRow>(
      `
        select *
        from downloads
        where user_id = $1
        order by id desc
        limit ${capped}
      `,
      [userId],
    );
    return rows.map((row) => this.toRecord(row));
  }

  getUserStats(userId: string): Promise<UserStats> {
    return this.ledger.getUserStats(userId);
  }

  async listExpired(cutoff: Date): Promise<ExpiredRecord[]> {
    const rows = await this.db.query<ExpiredRecord>(
      `
        select id, file_path
        from downloads
        where deleted = false
          and created_at < $1
        order by id
      `,
      [cutoff.toISOString()],
    );
    return rows.map((row) => ({ id: Number(row.id), file_path: row.file_path }));
  }

  async markDeleted(recordId: number): Promise<void> {
    await this.db.query(
      `
        update downloads
        set deleted = true
        where id = $1
      `,
      [recordId],
    );
  }

  async stats(): Promise<{ total: number; sent: number; pending_sweep: number }> {
    const [total] = await this.db.query<{ n: number }>(
      'select count(*)::int as n from downloads',
    );
    const [sent] = await this.db.query<{ n: number }>(
      `select count(*)::int as n from downloads where status = 'sent'`,
    );
    const [pendingSweep] = await this.db.query<{ n: number }>(
      'select count(*)::int as n from downloads where deleted = false',
    );

    return {
      total: total ? Number(total.n) : 0,
      sent: sent ? Number(sent.n) : 0,
      pending_sweep: pendingSweep ? Number(pendingSweep.n) : 0,
    };
  }
}
