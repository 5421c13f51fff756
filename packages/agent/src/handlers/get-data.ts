// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { AgentHandler } from "../context.js";
import { decodePayloadOrDefault } from "../payload.js";
import { DataRequestSchema } from "../schemas.js";

/**
 * System stats. A malformed payload means "no cache preference".
 */
export const getDataHandler: AgentHandler = {
  async handle(ctx) {
    const options = decodePayloadOrDefault(ctx, DataRequestSchema, {});
    const stats = await ctx.agent.gatherStats(options.cacheTimeMs ?? 0);
    await ctx.respond(stats);
  },
};
