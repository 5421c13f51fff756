// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  Action,
  HandlerRegistry,
  type HandlerRegistryOptions,
} from "@vigil/core";
import type { Agent } from "./agent.js";
import type { AgentHandler, AgentSession } from "./context.js";
import {
  checkFingerprintHandler,
  getContainerInfoHandler,
  getContainerLogsHandler,
  getDataHandler,
  getSmartDataHandler,
  restartContainerHandler,
  startContainerHandler,
  stopContainerHandler,
} from "./handlers/index.js";

export type AgentRegistry = HandlerRegistry<Agent, AgentSession>;

/**
 * Default bindings, in registration order.
 */
export const DEFAULT_HANDLERS: readonly (readonly [Action, AgentHandler])[] = [
  [Action.GetData, getDataHandler],
  [Action.CheckFingerprint, checkFingerprintHandler],
  [Action.GetContainerLogs, getContainerLogsHandler],
  [Action.GetContainerInfo, getContainerInfoHandler],
  [Action.GetSmartData, getSmartDataHandler],
  [Action.StartContainer, startContainerHandler],
  [Action.StopContainer, stopContainerHandler],
  [Action.RestartContainer, restartContainerHandler],
];

export interface AgentRegistryOptions extends HandlerRegistryOptions {
  /**
   * Add or override bindings after the defaults, before sealing.
   */
  configure?: (registry: AgentRegistry) => void;
}

/**
 * Build the process-wide registry with the default bindings, then seal it.
 */
export function createAgentRegistry(
  options: AgentRegistryOptions = {},
): AgentRegistry {
  const { configure, ...registryOptions } = options;
  const registry: AgentRegistry = new HandlerRegistry(registryOptions);

  for (const [action, handler] of DEFAULT_HANDLERS) {
    registry.register(action, handler);
  }
  configure?.(registry);

  return registry.seal();
}
