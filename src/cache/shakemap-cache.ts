/**
 * SHAKEMAP CACHE
 *
 * Single-slot cache for the latest-event overlay.
 *
 * - at most one event fetch + overlay computation runs at a time
 * - a warm cache is read without taking the lock
 * - waiters re-check after acquiring the lock, so N concurrent misses cost
 *   one computation
 * - forced calls always recompute; concurrent forced calls run one after
 *   another and the last one to finish wins
 * - a failed computation leaves the previous state untouched
 */

import { EventMeta } from '../types/event';
import { OverlayResult } from '../types/overlay';
import { EventSource } from '../sources/event-source';
import { metrics } from '../observability/metrics';
import { Mutex } from './mutex';
import { makeEventKey } from './event-key';

export type OverlayComputer = (event: EventMeta) => OverlayResult;

// every caller shares the stored result, so nested objects are frozen too
function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Stored as one frozen record and swapped whole, so a reader sees either the
 * previous entry or the new one, never a mix.
 */
interface CacheEntry {
  readonly data: Readonly<OverlayResult>;
  readonly eventKey: string;
  /** epoch seconds */
  readonly ts: number;
}

export interface CacheStateSummary {
  has_cache: boolean;
  event_key: string | null;
  ts: number;
  ttl_sec: number | null;
}

export interface CacheOutcome {
  data: Readonly<OverlayResult>;
  eventKey: string;
}

export interface ShakemapCacheOptions {
  source: EventSource;
  computeOverlay: OverlayComputer;
  /** null or undefined: entries never expire on their own */
  ttlSec?: number | null;
  /** epoch milliseconds; Date.now by default */
  now?: () => number;
}

export class ShakemapCache {
  private entry: CacheEntry | null = null;
  private readonly mutex = new Mutex();
  private readonly source: EventSource;
  private readonly computeOverlay: OverlayComputer;
  private readonly ttlSec: number | null;
  private readonly now: () => number;

  constructor(options: ShakemapCacheOptions) {
    this.source = options.source;
    this.computeOverlay = options.computeOverlay;
    this.ttlSec = options.ttlSec ?? null;
    this.now = options.now ?? Date.now;
  }

  /**
   * cached overlay if still valid, otherwise a fresh one
   */
  async getOrCompute(force: boolean = false): Promise<Readonly<OverlayResult>> {
    const outcome = await this.getOrComputeWithState(force);
    return outcome.data;
  }

  /**
   * same as getOrCompute, also returning the event key that belongs to the
   * returned data (read from the same entry, not from whatever is stored later)
   */
  async getOrComputeWithState(force: boolean = false): Promise<CacheOutcome> {
    // fast path: no lock
    if (!force) {
      const cached = this.validEntry();
      if (cached) {
        metrics.incrementCacheHit();
        console.log(`[ShakemapCache] HIT: ${cached.eventKey}`);
        return { data: cached.data, eventKey: cached.eventKey };
      }
    }

    return this.mutex.runExclusive(async (waitMs) => {
      metrics.recordLockWait(waitMs);

      // someone refreshed while we waited
      if (!force) {
        const refreshed = this.validEntry();
        if (refreshed) {
          metrics.incrementCoalescedHit();
          console.log(`[ShakemapCache] HIT after wait (${waitMs}ms): ${refreshed.eventKey}`);
          return { data: refreshed.data, eventKey: refreshed.eventKey };
        }
      }

      if (force) {
        metrics.incrementForcedRefresh();
      } else {
        metrics.incrementCacheMiss();
      }
      console.log(`[ShakemapCache] ${force ? 'FORCED REFRESH' : 'MISS'}: computing latest event overlay`);

      const stored = await this.computeAndStore();
      return { data: stored.data, eventKey: stored.eventKey };
    });
  }

  /**
   * read-only view of the slot; never computes, never waits for the lock
   */
  peekState(): CacheStateSummary {
    const entry = this.entry;
    return {
      has_cache: entry !== null,
      event_key: entry ? entry.eventKey : null,
      ts: entry ? entry.ts : 0,
      ttl_sec: this.ttlSec,
    };
  }

  isComputing(): boolean {
    return this.mutex.isLocked();
  }

  // must run under the lock
  private async computeAndStore(): Promise<CacheEntry> {
    const startTime = Date.now();
    try {
      const event = await this.source.fetchLatestEvent();
      const data = this.computeOverlay(event);

      const entry: CacheEntry = Object.freeze({
        data: deepFreeze(data),
        eventKey: makeEventKey(data.meta),
        ts: this.now() / 1000,
      });
      this.entry = entry;

      const elapsedMs = Date.now() - startTime;
      metrics.incrementComputeSuccess();
      metrics.recordComputeLatency(elapsedMs);
      console.log(`[ShakemapCache] COMPUTED: ${entry.eventKey} (${elapsedMs}ms)`);
      return entry;
    } catch (err) {
      metrics.incrementComputeFailure();
      metrics.recordComputeLatency(Date.now() - startTime);
      console.warn(`[ShakemapCache] FAILED: ${err instanceof Error ? err.message : String(err)}`);
      throw err;
    }
  }

  private validEntry(): CacheEntry | null {
    const entry = this.entry;
    if (!entry) {
      return null;
    }
    if (this.ttlSec === null) {
      return entry;
    }
    const ageSec = this.now() / 1000 - entry.ts;
    return ageSec < this.ttlSec ? entry : null;
  }
}
