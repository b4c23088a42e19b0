/**
 * Bounded in-memory cache of research verdicts. Least recently used entries are
 * evicted past maxEntries and every entry expires after ttlMs. Nothing survives
 * a restart.
 */

import type { VerdictRecord } from '../types';
import { DEFAULT_REASON } from './responseParser';

interface CacheEntry {
  record: VerdictRecord;
  storedAt: number;
}

export interface ResultCacheOptions {
  maxEntries: number;
  ttlMs: number;
  now?: () => number;
}

export class ResultCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly now: () => number;

  constructor(private readonly options: ResultCacheOptions) {
    this.now = options.now ?? Date.now;
  }

  static keyFor(kind: 'name' | 'reference', value: string): string {
    return `${kind}:${value.trim().toLowerCase()}`;
  }

  static isCacheable(record: VerdictRecord): boolean {
    return record.verdict !== 'ERROR' && record.reason !== DEFAULT_REASON;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): VerdictRecord | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() - entry.storedAt > this.options.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    // re-insert to mark as most recently used
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.record;
  }

  /** ERROR verdicts and answers that could not be parsed are never stored. */
  set(key: string, record: VerdictRecord): void {
    if (this.options.maxEntries <= 0 || !ResultCache.isCacheable(record)) return;
    this.entries.delete(key);
    this.entries.set(key, { record, storedAt: this.now() });
    while (this.entries.size > this.options.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}
