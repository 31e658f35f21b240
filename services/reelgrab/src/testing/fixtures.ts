import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { newDb } from 'pg-mem';
import { createDatabase, type Database } from '../db/client.js';
import { initializeSchema } from '../db/schema.js';
import type { Clock } from '../types/downloads.js';

/** A catalog on an in-process PostgreSQL, schema already applied. */
export async function createMemoryDatabase(): Promise<Database> {
  const { Pool } = newDb().adapters.createPg();
  const db = createDatabase(new Pool());
  await initializeSchema(db);
  return db;
}

export interface ManualClock {
  now: Clock;
  set(iso: string): void;
  advance(ms: number): void;
}

export function manualClock(startIso: string): ManualClock {
  let current = new Date(startIso);
  return {
    now: () => new Date(current.getTime()),
    set(iso) {
      current = new Date(iso);
    },
    advance(ms) {
      current = new Date(current.getTime() + ms);
    },
  };
}

export async function createTempDir(prefix = 'reelgrab-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

export async function writeBytes(path: string, size: number): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, Buffer.alloc(size, 1));
}
