// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * @vigil/core: Request dispatch for the monitoring agent
 *
 * Public API surface:
 * - HandlerRegistry → register/dispatch/lookup with the verification gate
 * - DispatchContext → per-request aggregate (agent, session, request, responder)
 * - Responder → transport-agnostic delivery (socket or remote-shell channel)
 * - DispatchError → coded errors with retryability metadata
 * - PayloadCodec → pluggable wire encoding (JSON default)
 */

// Registry
export { HandlerRegistry } from "./core/handler-registry.js";
export type {
  ConflictPolicy,
  HandlerRegistryOptions,
  RequestHandler,
} from "./core/types.js";

// Context
export { createDispatchContext } from "./context/dispatch-context.js";
export type {
  DispatchContext,
  DispatchContextInit,
} from "./context/dispatch-context.js";

// Protocol
export {
  Action,
  IDENTITY_CHALLENGE_ACTION,
  actionName,
  isAction,
} from "./protocol/actions.js";
export { jsonCodec } from "./protocol/codec.js";
export type { PayloadCodec } from "./protocol/codec.js";
export {
  createEnvelope,
  decodeRequestFrame,
  isRequestId,
} from "./protocol/envelope.js";
export type {
  FrameDecodeOutcome,
  RequestEnvelope,
  RequestFrame,
  RequestId,
  ResponseFrame,
} from "./protocol/envelope.js";

// Transport
export {
  FramedResponder,
  StreamResponder,
  createResponseFrame,
} from "./transport/responder.js";
export type {
  DuplexSocket,
  ReplyStream,
  Responder,
  TransportResponder,
} from "./transport/responder.js";

// Error handling
export {
  DispatchError,
  ERROR_CODE_META,
  ErrorCode,
  isStandardErrorCode,
  toErrorPayload,
} from "./error.js";
export type {
  ErrorCodeMetadata,
  ErrorCodeValue,
  ErrorPayload,
} from "./error.js";

// Utilities
export { generateSessionId } from "./utils/ids.js";

// Logging
export {
  DefaultLoggerAdapter,
  LOG_CONTEXT,
  LOG_LEVELS,
  createLogger,
  noopLogger,
} from "./logger.js";
export type { LogLevel, LoggerAdapter, LoggerOptions } from "./logger.js";
