// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Stats cache: one snapshot per requested cache window.
 * A window of 0 is never cached.
 */

import { LOG_CONTEXT, noopLogger, type LoggerAdapter } from "@vigil/core";
import type { StatsProvider, StatsSnapshot } from "../subsystems.js";

/**
 * Collects a fresh snapshot. Implemented by the stats subsystem.
 */
export interface StatsCollector {
  collect(): Promise<StatsSnapshot>;
}

export interface CachedStatsOptions {
  /** Clock, ms since epoch (default: Date.now) */
  now?: () => number;
  logger?: LoggerAdapter;
}

interface CacheEntry {
  snapshot: StatsSnapshot;
  storedAt: number;
}

export class CachedStatsProvider implements StatsProvider {
  private readonly cache = new Map<number, CacheEntry>();
  private readonly collecting = new Map<number, Promise<StatsSnapshot>>();
  private readonly now: () => number;
  private readonly logger: LoggerAdapter;

  constructor(
    private readonly collector: StatsCollector,
    options: CachedStatsOptions = {},
  ) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Cached snapshot for this window if younger than `maxCacheAgeMs`,
   * otherwise a fresh one. Concurrent calls for one window share a single
   * collection.
   */
  async gather(maxCacheAgeMs: number): Promise<StatsSnapshot> {
    const cached = this.cache.get(maxCacheAgeMs);
    if (
      maxCacheAgeMs > 0 &&
      cached &&
      this.now() - cached.storedAt < maxCacheAgeMs
    ) {
      this.logger.debug(LOG_CONTEXT.STATS, "Serving cached stats", {
        cacheTimeMs: maxCacheAgeMs,
      });
      return cached.snapshot;
    }

    const running = this.collecting.get(maxCacheAgeMs);
    if (running) {
      return running;
    }

    const task = this.collectFor(maxCacheAgeMs);
    this.collecting.set(maxCacheAgeMs, task);
    try {
      return await task;
    } finally {
      this.collecting.delete(maxCacheAgeMs);
    }
  }

  /**
   * Drop all cached snapshots.
   */
  clear(): void {
    this.cache.clear();
  }

  private async collectFor(maxCacheAgeMs: number): Promise<StatsSnapshot> {
    const snapshot = await this.collector.collect();
    if (maxCacheAgeMs > 0) {
      this.cache.set(maxCacheAgeMs, { snapshot, storedAt: this.now() });
    }
    return snapshot;
  }
}
