/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';

import { CollectionListUnavailableError, errorMessage } from '../lib/error.js';
import * as metrics from '../metrics.js';
import { SpanStatusCode, tracer } from '../tracing.js';
import type {
  CollectionListEntry,
  CollectionListSnapshot,
  CollectionListState,
  CollectionRecord,
  CollectionSource,
} from '../types.js';

export interface CollectionListHealth {
  state: CollectionListState;
  healthy: boolean;
  entries: number;
  lastSuccessAt?: Date;
  lastError?: string;
}

function freezeEntry(
  record: CollectionRecord,
  refreshedAt: Date,
): CollectionListEntry {
  return Object.freeze({
    key: record.key,
    url: record.url,
    properties: Object.freeze({ ...record.properties }),
    ...(record.text !== undefined && { text: record.text }),
    refreshedAt,
  });
}

/**
 * Process-wide cache of one HiPS dataset's collections.
 *
 * Readers always get a complete snapshot: refreshes build a new entry map and
 * publish it by replacing the snapshot reference. Refreshes run one at a
 * time; a stale read schedules one in the background and returns at once.
 */
export class CollectionListCache {
  readonly dataset: string;

  private log: winston.Logger;
  private source: CollectionSource;
  private ttlMs: number;
  private refreshIntervalMs: number;
  private now: () => Date;

  private snapshot: CollectionListSnapshot = Object.freeze({
    entries: new Map<string, CollectionListEntry>(),
    healthy: true,
  });
  private lastError: string | undefined;
  private inFlight: Promise<void> | undefined;
  // Tail of the serialized refresh chain
  private queue: Promise<void> = Promise.resolve();
  private refreshTimer: NodeJS.Timeout | undefined;

  constructor({
    log,
    dataset,
    source,
    ttlSeconds = 3600,
    refreshIntervalSeconds = 600,
    now = () => new Date(),
  }: {
    log: winston.Logger;
    dataset: string;
    source: CollectionSource;
    ttlSeconds?: number;
    refreshIntervalSeconds?: number;
    now?: () => Date;
  }) {
    this.log = log.child({ class: this.constructor.name, dataset });
    this.dataset = dataset;
    this.source = source;
    this.ttlMs = ttlSeconds * 1000;
    this.refreshIntervalMs = refreshIntervalSeconds * 1000;
    this.now = now;
  }

  state(): CollectionListState {
    const { lastSuccessAt } = this.snapshot;
    if (lastSuccessAt === undefined) {
      return 'empty';
    }
    if (this.inFlight !== undefined) {
      return 'refreshing';
    }
    return this.now().getTime() - lastSuccessAt.getTime() >= this.ttlMs
      ? 'stale'
      : 'fresh';
  }

  /**
   * Return the published snapshot without waiting on the source.
   *
   * @throws CollectionListUnavailableError while nothing has been fetched yet
   */
  getSnapshot(): CollectionListSnapshot {
    const state = this.state();
    if (state === 'empty') {
      throw new CollectionListUnavailableError(this.dataset);
    }
    if (state === 'stale') {
      this.log.debug('Serving stale collection list');
      this.refresh().catch((error: unknown) => {
        this.log.warn('Background refresh failed', {
          error: errorMessage(error),
        });
      });
    }
    return this.snapshot;
  }

  health(): CollectionListHealth {
    return {
      state: this.state(),
      healthy: this.snapshot.healthy,
      entries: this.snapshot.entries.size,
      lastSuccessAt: this.snapshot.lastSuccessAt,
      lastError: this.lastError,
    };
  }

  /**
   * Fetch the full collection set and publish it. Callers that arrive while a
   * refresh is running share its promise. Source failures are recorded and
   * never reject.
   */
  refresh(): Promise<void> {
    if (this.inFlight !== undefined) {
      return this.inFlight;
    }

    const refresh = this.queue
      .then(() => this.runRefresh())
      .finally(() => {
        this.inFlight = undefined;
      });
    this.inFlight = refresh;
    this.queue = refresh;
    return refresh;
  }

  /**
   * Refetch a single collection and replace only its entry. Falls back to a
   * full refresh when the cache is empty or the source cannot fetch single
   * collections.
   */
  async refreshKey(key: string): Promise<void> {
    const { getCollection } = this.source;
    if (getCollection === undefined || this.state() === 'empty') {
      return this.refresh();
    }

    const task = this.queue.then(async () => {
      const log = this.log.child({ method: 'refreshKey', key });
      const record = await getCollection.call(this.source, key);
      const entries = new Map(this.snapshot.entries);
      entries.set(key, freezeEntry(record, this.now()));
      this.publish({ ...this.snapshot, entries });
      log.debug('Refreshed collection');
    });
    this.queue = task.catch((error: unknown) => {
      this.log.debug('Single collection refresh failed', {
        key,
        error: errorMessage(error),
      });
    });
    return task;
  }

  start(): void {
    if (this.refreshTimer !== undefined) {
      this.stop();
    }

    this.refresh().catch((error: unknown) => {
      this.log.warn('Initial refresh failed', { error: errorMessage(error) });
    });

    this.refreshTimer = setInterval(() => {
      this.refresh().catch((error: unknown) => {
        this.log.warn('Scheduled refresh failed', {
          error: errorMessage(error),
        });
      });
    }, this.refreshIntervalMs);
    this.refreshTimer.unref();

    this.log.debug('Started collection list refresh', {
      intervalMs: this.refreshIntervalMs,
    });
  }

  stop(): void {
    if (this.refreshTimer !== undefined) {
      clearInterval(this.refreshTimer);
      this.refreshTimer = undefined;
      this.log.debug('Stopped collection list refresh');
    }
  }

  private async runRefresh(): Promise<void> {
    const log = this.log.child({ method: 'refresh' });
    const span = tracer.startSpan('CollectionListCache.refresh', {
      attributes: { 'hips.dataset': this.dataset },
    });
    const start = Date.now();

    try {
      const listing = await this.source.listCollections();
      const refreshedAt = this.now();
      const previous = this.snapshot.entries;

      const entries = new Map<string, CollectionListEntry>();
      for (const record of listing.collections) {
        entries.set(record.key, freezeEntry(record, refreshedAt));
      }
      for (const key of listing.unavailable) {
        const kept = previous.get(key);
        if (kept !== undefined) {
          entries.set(key, kept);
        }
      }

      this.publish({ entries, lastSuccessAt: refreshedAt, healthy: true });
      this.lastError = undefined;

      if (listing.unavailable.length > 0) {
        log.warn('Some collections could not be refreshed', {
          unavailable: listing.unavailable,
        });
        metrics.collectionRefreshCounter.inc({
          dataset: this.dataset,
          status: 'partial',
        });
      } else {
        metrics.collectionRefreshCounter.inc({
          dataset: this.dataset,
          status: 'success',
        });
      }
      span.setAttributes({
        'hips.entries': entries.size,
        'hips.unavailable': listing.unavailable.length,
      });
      log.info('Refreshed collection list', { entries: entries.size });
    } catch (error: unknown) {
      this.lastError = errorMessage(error);
      this.publish({ ...this.snapshot, healthy: false });
      span.setStatus({ code: SpanStatusCode.ERROR, message: this.lastError });
      metrics.collectionRefreshCounter.inc({
        dataset: this.dataset,
        status: 'error',
      });
      metrics.errorsCounter.inc();
      log.error('Failed to refresh collection list', {
        error: this.lastError,
      });
    } finally {
      metrics.collectionRefreshDurationSummary.observe(
        { dataset: this.dataset },
        Date.now() - start,
      );
      span.end();
    }
  }

  private publish(snapshot: CollectionListSnapshot) {
    this.snapshot = Object.freeze(snapshot);
    metrics.collectionCacheHealthyGauge.set(
      { dataset: this.dataset },
      snapshot.healthy ? 1 : 0,
    );
    metrics.collectionCacheEntriesGauge.set(
      { dataset: this.dataset },
      snapshot.entries.size,
    );
  }
}

/**
 * One collection list cache per configured HiPS dataset.
 */
export class CollectionListRegistry {
  private caches: Map<string, CollectionListCache>;

  constructor({ caches }: { caches: CollectionListCache[] }) {
    this.caches = new Map(caches.map((cache) => [cache.dataset, cache]));
  }

  get(dataset: string): CollectionListCache | undefined {
    return this.caches.get(dataset);
  }

  datasets(): string[] {
    return [...this.caches.keys()];
  }

  startAll(): void {
    for (const cache of this.caches.values()) {
      cache.start();
    }
  }

  stopAll(): void {
    for (const cache of this.caches.values()) {
      cache.stop();
    }
  }

  health(): { healthy: boolean; reasons: string[] } {
    const reasons: string[] = [];
    for (const cache of this.caches.values()) {
      const health = cache.health();
      if (health.state === 'empty') {
        reasons.push(`Collection list for ${cache.dataset} is not yet available`);
      } else if (!health.healthy) {
        reasons.push(
          `Collection list for ${cache.dataset} failed to refresh: ${health.lastError ?? 'unknown error'}`,
        );
      }
    }
    return { healthy: reasons.length === 0, reasons };
  }
}
