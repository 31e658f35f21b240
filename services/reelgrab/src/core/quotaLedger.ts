import type { Database, Queryable } from '../db/client.js';
import {
  systemClock,
  type AdmissionDecision,
  type Clock,
  type UserStats,
} from '../types/downloads.js';
import { calendarDay, toIso } from './time.js';

interface UserStatsRow {
  total_downloads: number;
  downloads_today: number;
  last_download_date: string | null;
  joined_at: Date | string;
}

export interface QuotaLedgerOptions {
  dailyLimit: number;
  clock?: Clock;
}

export class QuotaLedger {
  private readonly dailyLimit: number;
  private readonly clock: Clock;

  constructor(private readonly db: Database, options: QuotaLedgerOptions) {
    this.dailyLimit = options.dailyLimit;
    this.clock = options.clock ?? systemClock;
  }

  async getUserStats(userId: string): Promise<UserStats> {
    const now = this.clock();
    const rows = await this.db.query<UserStatsRow>(
      `
        select total_downloads, downloads_today, last_download_date, joined_at
        from user_stats
        where user_id = $1
        limit 1
      `,
      [userId],
    );
    const row = rows[0];

    // A counter stamped with an earlier day no longer applies today.
    const downloadsToday =
      row && row.last_download_date === calendarDay(now) ? Number(row.downloads_today) : 0;

    return {
      totalDownloads: row ? Number(row.total_downloads) : 0,
      downloadsToday,
      dailyLimit: this.dailyLimit,
      remainingToday: Math.max(0, this.dailyLimit - downloadsToday),
      joinedDate: row ? toIso(row.joined_at) : now.toISOString(),
    };
  }

  async canDownload(userId: string): Promise<AdmissionDecision> {
    const stats = await this.getUserStats(userId);
    if (stats.downloadsToday >= this.dailyLimit) {
      return {
        allowed: false,
        reason: `You've reached your daily limit (${this.dailyLimit} downloads). Try again tomorrow!`,
      };
    }
    return { allowed: true, reason: '' };
  }

  /**
   * Counts one completed download. A single upsert covers both the first
   * download of a user's lifetime and every later one, so nothing is counted
   * twice. Pass the record store's transaction to keep both writes atomic.
   */
  async recordDownload(
    userId: string,
    displayName: string,
    tx: Queryable = this.db,
  ): Promise<{ totalDownloads: number; downloadsToday: number }> {
    const now = this.clock();
    const rows = await tx.query<{ total_downloads: number; downloads_today: number }>(
      `
        insert into user_stats (user_id, user_name, total_downloads, downloads_today, last_download_date, joined_at)
        values ($1, $2, 1, 1, $3, $4)
        on conflict (user_id) do update
        set
          user_name = excluded.user_name,
          total_downloads = user_stats.total_downloads + 1,
          downloads_today = case
            when user_stats.last_download_date = excluded.last_download_date
              then user_stats.downloads_today + 1
            else 1
          end,
          last_download_date = excluded.last_download_date
        returning total_downloads, downloads_today
      `,
      [userId, displayName, calendarDay(now), now.toISOString()],
    );

    return {
      totalDownloads: rows[0] ? Number(rows[0].total_downloads) : 0,
      downloadsToday: rows[0] ? Number(rows[0].downloads_today) : 0,
    };
  }

  async stats(): Promise<{ users: number; downloads_today: number }> {
    const [users] = await this.db.query<{ total: number }>(
      'select count(*)::int as total from user_stats',
    );
    const [today] = await this.db.query<{ total: number }>(
      `
        select coalesce(sum(downloads_today), 0)::int as total
        from user_stats
        where last_download_date = $1
      `,
      [calendarDay(this.clock())],
    );

    return {
      users: users ? Number(users.total) : 0,
      downloads_today: today ? Number(today.total) : 0,
    };
  }
}
