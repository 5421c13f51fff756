// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Subsystem contracts consumed by handlers.
 *
 * Internals (stats collection, container runtime, disk probes) live outside
 * the dispatch core; only these call shapes are relied on.
 */

/**
 * Point-in-time system statistics. Shape is owned by the stats subsystem.
 */
export interface StatsSnapshot {
  /** Collection time, ms since epoch */
  readonly collectedAt: number;
  readonly [key: string]: unknown;
}

export interface StatsProvider {
  /**
   * Return a snapshot no older than `maxCacheAgeMs` (0 = always fresh).
   * Never fails; may return cached data.
   */
  gather(maxCacheAgeMs: number): StatsSnapshot | Promise<StatsSnapshot>;
}

/**
 * Options passed to every container call.
 */
export interface CallOptions {
  /** Aborted when the originating session closes */
  signal: AbortSignal;
}

export interface ContainerManager {
  getLogs(containerId: string, opts: CallOptions): Promise<string>;
  getInfo(containerId: string, opts: CallOptions): Promise<Uint8Array>;
  start(containerId: string, opts: CallOptions): Promise<void>;
  stop(
    containerId: string,
    timeoutSeconds: number,
    opts: CallOptions,
  ): Promise<void>;
  restart(
    containerId: string,
    timeoutSeconds: number,
    opts: CallOptions,
  ): Promise<void>;
}

export type HealthStatus = "PASSED" | "FAILED" | "UNKNOWN";

/**
 * Disk health record for one device.
 */
export interface HealthRecord {
  device: string;
  model?: string;
  serial?: string;
  status: HealthStatus;
  temperatureC?: number;
  powerOnHours?: number;
  /** Last successful probe, ms since epoch */
  updatedAt: number;
}

/** Device identifier → health record */
export type HealthData = Record<string, HealthRecord>;

export interface HealthMonitor {
  /**
   * Re-probe devices. `force` bypasses the monitor's own refresh interval.
   */
  refresh(force: boolean): Promise<void>;

  /** Best-known data, possibly stale */
  getCurrentData(): HealthData;
}

/**
 * Optional reference to a subsystem that may be absent on a host.
 *
 * Read with get() at the point of use, once per request; never cache the
 * result across requests.
 */
export class SubsystemRef<T> {
  private current: T | undefined;

  constructor(readonly name: string, initial?: T) {
    this.current = initial;
  }

  get(): T | undefined {
    return this.current;
  }

  isAvailable(): boolean {
    return this.current !== undefined;
  }

  attach(value: T): void {
    this.current = value;
  }

  detach(): void {
    this.current = undefined;
  }
}
