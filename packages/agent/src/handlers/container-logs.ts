// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { AgentHandler } from "../context.js";
import { decodePayload } from "../payload.js";
import { ContainerRequestSchema } from "../schemas.js";

export const getContainerLogsHandler: AgentHandler = {
  async handle(ctx) {
    const containers = ctx.agent.containers.get();
    if (!containers) {
      await ctx.respond("");
      return;
    }

    const { containerID } = decodePayload(ctx, ContainerRequestSchema);
    const logs = await containers.getLogs(containerID, { signal: ctx.signal });
    await ctx.respond(logs);
  },
};
