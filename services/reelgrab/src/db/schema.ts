import type { Database } from './client.js';

/**
 * Creates the catalog tables if they do not already exist.
 *
 * `downloads` is append-mostly: rows are soft-deleted by the sweeper and never
 * removed. `user_stats` holds one row per requester, updated in place.
 */
export async function initializeSchema(db: Database): Promise<{ initialized: boolean }> {
  await db.query(`
    create table if not exists downloads (
      id serial primary key,
      user_id text not null,
      user_name text not null,
      platform text not null,
      url text not null,
      filename text not null,
      file_path text not null,
      file_size integer not null default 0,
      status text not null,
      created_at timestamptz not null,
      sent_at timestamptz null,
      deleted boolean not null default false
    );
  `);
  await db.query(`
    create index if not exists idx_downloads_user_created
      on downloads (user_id, created_at);
  `);
  await db.query(`
    create index if not exists idx_downloads_deleted_created
      on downloads (deleted, created_at);
  `);

  await db.query(`
    create table if not exists user_stats (
      user_id text primary key,
      user_name text not null,
      total_downloads integer not null default 0,
      downloads_today integer not null default 0,
      last_download_date text null,
      joined_at timestamptz not null
    );
  `);

  return { initialized: true };
}
