/**
 * @netlens/assistant - ResponseCache
 *
 * Time- and size-bounded cache of provider answers keyed by
 * (tool, context fingerprint, normalized question).
 *
 *   - Lazy expiration: a stale entry is dropped by the `get` that finds it
 *   - Over capacity, exactly one entry goes: the oldest, never the newest
 *
 * Every operation is synchronous, so concurrent requests on the event loop
 * never see a half-written entry or interleave inside an eviction.
 */

import { collapseWhitespace, hash } from '@netlens/core';
import { contextFingerprint } from './context.js';
import type { AssistantContext } from './types.js';

export interface ResponseCacheOptions {
  /** Maximum entry age in ms; an entry is valid while `now - createdAt <= ttlMs`. */
  ttlMs: number;
  maxEntries: number;
  /** Clock, injectable for tests. */
  now?: () => number;
}

interface CacheEntry {
  text: string;
  createdAt: number;
}

export class ResponseCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: ResponseCacheOptions) {
    if (!Number.isInteger(options.maxEntries) || options.maxEntries <= 0) {
      throw new RangeError(`Cache maxEntries must be a positive integer (got ${options.maxEntries})`);
    }
    if (!(options.ttlMs >= 0)) {
      throw new RangeError(`Cache ttlMs must not be negative (got ${options.ttlMs})`);
    }
    this.ttlMs = options.ttlMs;
    this.maxEntries = options.maxEntries;
    this.now = options.now ?? Date.now;
  }

  /**
   * Canonical key. Questions differing only in case or whitespace share it.
   */
  static keyOf(tool: string | null, context: AssistantContext | null, question: string): string {
    return hash([tool ?? '', contextFingerprint(context), collapseWhitespace(question)].join('\n'));
  }

  get(tool: string | null, context: AssistantContext | null, question: string): string | undefined {
    const key = ResponseCache.keyOf(tool, context, question);
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() - entry.createdAt > this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.text;
  }

  set(tool: string | null, context: AssistantContext | null, question: string, text: string): void {
    const key = ResponseCache.keyOf(tool, context, question);

    // Re-insert so Map order follows creation order
    this.entries.delete(key);
    this.entries.set(key, { text, createdAt: this.now() });

    if (this.entries.size > this.maxEntries) {
      this.evictOldest(key);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  private evictOldest(keep: string): void {
    let oldestKey: string | undefined;
    let oldestAt = Number.POSITIVE_INFINITY;

    for (const [key, entry] of this.entries) {
      if (key === keep) continue;
      if (entry.createdAt < oldestAt) {
        oldestAt = entry.createdAt;
        oldestKey = key;
      }
    }

    if (oldestKey !== undefined) {
      this.entries.delete(oldestKey);
    }
  }
}
