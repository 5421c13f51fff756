// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * @vigil/agent: Monitoring agent request handlers and hub sessions
 *
 * Public API surface:
 * - createAgentRuntime → config + subsystems → sessions ready for frames
 * - createAgentRegistry → sealed registry with the default handlers
 * - HubSession → per-connection verification flag and cancellation scope
 * - CachedStatsProvider → per-window stats snapshots
 */

export { Agent } from "./agent.js";
export type { AgentOptions } from "./agent.js";

export {
  FingerprintAuthenticator,
  deriveFingerprint,
  parsePublicKeys,
} from "./auth/fingerprint.js";
export type { FingerprintAuthenticatorOptions } from "./auth/fingerprint.js";

export {
  DEFAULT_MAX_PAYLOAD_BYTES,
  DEFAULT_PORT,
  loadAgentConfig,
} from "./config.js";
export type { AgentConfig, Env } from "./config.js";

export type { AgentContext, AgentHandler, AgentSession } from "./context.js";

export * from "./handlers/index.js";

export { decodePayload, decodePayloadOrDefault } from "./payload.js";

export {
  DEFAULT_HANDLERS,
  createAgentRegistry,
} from "./registry.js";
export type { AgentRegistry, AgentRegistryOptions } from "./registry.js";

export { createAgentRuntime } from "./runtime.js";
export type { AgentRuntime, RuntimeOptions } from "./runtime.js";

export {
  ContainerControlRequestSchema,
  ContainerRequestSchema,
  DataRequestSchema,
  FingerprintRequestSchema,
} from "./schemas.js";
export type {
  ContainerControlRequest,
  ContainerRequest,
  DataRequest,
  FingerprintRequest,
  FingerprintResponse,
} from "./schemas.js";

export {
  HubSession,
  createChannelSession,
  createSocketSession,
} from "./session.js";
export type { HubSessionOptions, SessionDeps } from "./session.js";

export { CachedStatsProvider } from "./stats/cached-stats.js";
export type {
  CachedStatsOptions,
  StatsCollector,
} from "./stats/cached-stats.js";

export { SubsystemRef } from "./subsystems.js";
export type {
  CallOptions,
  ContainerManager,
  HealthData,
  HealthMonitor,
  HealthRecord,
  HealthStatus,
  StatsProvider,
  StatsSnapshot,
} from "./subsystems.js";
