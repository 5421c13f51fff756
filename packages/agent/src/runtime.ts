// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Process-level wiring: config → logger → agent → registry → sessions.
 *
 * @example
 * ```typescript
 * const runtime = createAgentRuntime(loadAgentConfig(), {
 *   stats: new CachedStatsProvider(collector),
 *   containers: dockerManager,
 * });
 *
 * const session = runtime.openSocket(socket);
 * socket.on("message", (bytes) => {
 *   void session.handleFrame(bytes);
 * });
 * ```
 */

import {
  createLogger,
  type DuplexSocket,
  type LoggerAdapter,
  type PayloadCodec,
  type ReplyStream,
} from "@vigil/core";
import { Agent, type AgentOptions } from "./agent.js";
import { FingerprintAuthenticator } from "./auth/fingerprint.js";
import type { AgentConfig } from "./config.js";
import {
  createAgentRegistry,
  type AgentRegistry,
  type AgentRegistryOptions,
} from "./registry.js";
import {
  createChannelSession,
  createSocketSession,
  type HubSession,
  type SessionDeps,
} from "./session.js";

export interface RuntimeOptions extends Omit<AgentOptions, "logger"> {
  logger?: LoggerAdapter;
  codec?: PayloadCodec;
  registry?: Omit<AgentRegistryOptions, "logger">;
}

export interface AgentRuntime {
  readonly agent: Agent;
  readonly registry: AgentRegistry;
  readonly logger: LoggerAdapter;
  openSocket(socket: DuplexSocket): HubSession;
  openChannel(stream: ReplyStream): HubSession;
}

export function createAgentRuntime(
  config: AgentConfig,
  options: RuntimeOptions,
): AgentRuntime {
  const logger = options.logger ?? createLogger({ minLevel: config.logLevel });
  const agent = new Agent({
    stats: options.stats,
    containers: options.containers,
    health: options.health,
    logger,
  });
  const registry = createAgentRegistry({ ...options.registry, logger });
  const authenticator = new FingerprintAuthenticator({
    token: config.token,
    hubKeys: config.hubKeys,
    fingerprint: config.fingerprint,
    hostname: config.hostname,
    port: config.port,
  });

  const deps: SessionDeps = {
    registry,
    agent,
    authenticator,
    codec: options.codec,
    logger,
    maxPayloadBytes: config.maxPayloadBytes,
  };

  return {
    agent,
    registry,
    logger,
    openSocket: (socket) => createSocketSession(socket, deps),
    openChannel: (stream) => createChannelSession(stream, deps),
  };
}
