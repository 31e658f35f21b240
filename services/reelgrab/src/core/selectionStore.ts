import { randomUUID } from 'crypto';
import { systemClock, type Clock, type PlatformTag, type Requester } from '../types/downloads.js';

export interface PendingSelection {
  id: string;
  requester: Requester;
  url: string;
  platform: PlatformTag;
  createdAt: Date;
  expiresAt: Date;
}

export interface SelectionStoreOptions {
  ttlMs: number;
  clock?: Clock;
}

/**
 * Holds the URL a user sent while they pick a format. Entries expire lazily:
 * every read drops whatever is past its deadline, so no timer is kept alive.
 */
export class SelectionStore {
  private readonly entries = new Map<string, PendingSelection>();
  private readonly ttlMs: number;
  private readonly clock: Clock;

  constructor(options: SelectionStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.clock = options.clock ?? systemClock;
  }

  create(requester: Requester, url: string, platform: PlatformTag): PendingSelection {
    this.evictExpired();
    const now = this.clock();
    const selection: PendingSelection = {
      id: randomUUID(),
      requester,
      url,
      platform,
      createdAt: now,
      expiresAt: new Date(now.getTime() + this.ttlMs),
    };
    this.entries.set(selection.id, selection);
    return selection;
  }

  /** Removes and returns the selection if it exists, is live, and belongs to the user. */
  take(id: string, userId: string): PendingSelection | undefined {
    this.evictExpired();
    const selection = this.entries.get(id);
    if (!selection || selection.requester.id !== userId) {
      return undefined;
    }
    this.entries.delete(id);
    return selection;
  }

  cancel(id: string, userId: string): boolean {
    return this.take(id, userId) !== undefined;
  }

  size(): number {
    this.evictExpired();
    return this.entries.size;
  }

  private evictExpired(): void {
    const now = this.clock().getTime();
    for (const [id, selection] of this.entries) {
      if (selection.expiresAt.getTime() <= now) {
        this.entries.delete(id);
      }
    }
  }
}
