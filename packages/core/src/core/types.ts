// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Core type definitions for the registry and handlers.
 */

import type { DispatchContext } from "../context/dispatch-context.js";
import type { LoggerAdapter } from "../logger.js";

/**
 * Handler: unit of work bound to one action code.
 *
 * Must either deliver exactly one response through `ctx.respond()` or throw.
 *
 * TAgent: shared agent state borrowed by the context.
 * TSession: originating session (owner of the verification flag).
 */
export interface RequestHandler<TAgent = unknown, TSession = unknown> {
  handle(ctx: DispatchContext<TAgent, TSession>): Promise<void> | void;
}

export type ConflictPolicy = "replace" | "error";

export interface HandlerRegistryOptions {
  logger?: LoggerAdapter;
  /**
   * What register() does when the action is already bound.
   * - "replace" (default): last write wins
   * - "error": throw
   */
  onConflict?: ConflictPolicy;
}
