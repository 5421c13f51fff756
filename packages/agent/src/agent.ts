// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Shared agent state. Borrowed (never owned) by every dispatch context;
 * many contexts read it concurrently.
 */

import { noopLogger, type LoggerAdapter } from "@vigil/core";
import {
  SubsystemRef,
  type ContainerManager,
  type HealthMonitor,
  type StatsProvider,
  type StatsSnapshot,
} from "./subsystems.js";

export interface AgentOptions {
  stats: StatsProvider;
  /** Container runtime; omit on hosts without one */
  containers?: ContainerManager;
  /** Disk health probe; omit on hosts without one */
  health?: HealthMonitor;
  logger?: LoggerAdapter;
}

export class Agent {
  readonly containers: SubsystemRef<ContainerManager>;
  readonly health: SubsystemRef<HealthMonitor>;
  readonly logger: LoggerAdapter;
  private readonly stats: StatsProvider;

  constructor(options: AgentOptions) {
    this.stats = options.stats;
    this.containers = new SubsystemRef("containers", options.containers);
    this.health = new SubsystemRef("health", options.health);
    this.logger = options.logger ?? noopLogger;
  }

  async gatherStats(cacheTimeMs: number): Promise<StatsSnapshot> {
    return this.stats.gather(cacheTimeMs);
  }
}
