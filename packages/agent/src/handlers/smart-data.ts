// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { LOG_CONTEXT } from "@vigil/core";
import type { AgentHandler } from "../context.js";
import type { HealthData } from "../subsystems.js";

/**
 * Disk health data.
 *
 * Refresh failures are logged at debug and swallowed; the last known data
 * is delivered.
 */
export const getSmartDataHandler: AgentHandler = {
  async handle(ctx) {
    const health = ctx.agent.health.get();
    if (!health) {
      const empty: HealthData = {};
      await ctx.respond(empty);
      return;
    }

    try {
      await health.refresh(false);
    } catch (err) {
      ctx.agent.logger.debug(LOG_CONTEXT.HEALTH, "smart refresh failed", {
        error: err,
      });
    }

    await ctx.respond(health.getCurrentData());
  },
};
