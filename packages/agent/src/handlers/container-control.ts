// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Mutating container operations: start, stop, restart.
 *
 * Unlike the read-only queries these fail with UNAVAILABLE when the host has
 * no container runtime.
 */

import { DispatchError, ErrorCode } from "@vigil/core";
import type { AgentContext, AgentHandler } from "../context.js";
import { decodePayload } from "../payload.js";
import { ContainerControlRequestSchema } from "../schemas.js";
import type { ContainerManager } from "../subsystems.js";

/** Grace period used when the request omits a timeout or sends 0 */
export const DEFAULT_STOP_TIMEOUT_SECONDS = 10;

/** Acknowledgement delivered on success */
export const CONTAINER_ACK = "ok";

export function resolveStopTimeout(timeoutSeconds?: number): number {
  return timeoutSeconds || DEFAULT_STOP_TIMEOUT_SECONDS;
}

function requireContainers(ctx: AgentContext): ContainerManager {
  const containers = ctx.agent.containers.get();
  if (!containers) {
    throw DispatchError.from(ErrorCode.UNAVAILABLE, "docker not available", {
      action: ctx.request.action,
    });
  }
  return containers;
}

export const startContainerHandler: AgentHandler = {
  async handle(ctx) {
    const containers = requireContainers(ctx);
    const { containerID } = decodePayload(ctx, ContainerControlRequestSchema);
    await containers.start(containerID, { signal: ctx.signal });
    await ctx.respond(CONTAINER_ACK);
  },
};

export const stopContainerHandler: AgentHandler = {
  async handle(ctx) {
    const containers = requireContainers(ctx);
    const { containerID, timeoutSeconds } = decodePayload(
      ctx,
      ContainerControlRequestSchema,
    );
    await containers.stop(containerID, resolveStopTimeout(timeoutSeconds), {
      signal: ctx.signal,
    });
    await ctx.respond(CONTAINER_ACK);
  },
};

export const restartContainerHandler: AgentHandler = {
  async handle(ctx) {
    const containers = requireContainers(ctx);
    const { containerID, timeoutSeconds } = decodePayload(
      ctx,
      ContainerControlRequestSchema,
    );
    await containers.restart(containerID, resolveStopTimeout(timeoutSeconds), {
      signal: ctx.signal,
    });
    await ctx.respond(CONTAINER_ACK);
  },
};
