// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Handler registry: stores handlers by action code and gates dispatch.
 *
 * Dispatch order: lookup → verification gate → handler → delivery check.
 * The gate lives here, not in handlers, so a newly registered handler can
 * never skip it. Only IDENTITY_CHALLENGE_ACTION is reachable unverified.
 *
 * The registry is built once at startup and then sealed; dispatch and
 * lookup only read the map.
 */

import type { DispatchContext } from "../context/dispatch-context.js";
import { DispatchError, ErrorCode } from "../error.js";
import { LOG_CONTEXT, noopLogger, type LoggerAdapter } from "../logger.js";
import { IDENTITY_CHALLENGE_ACTION, actionName } from "../protocol/actions.js";
import type {
  ConflictPolicy,
  HandlerRegistryOptions,
  RequestHandler,
} from "./types.js";

export class HandlerRegistry<TAgent = unknown, TSession = unknown> {
  private readonly handlers = new Map<
    number,
    RequestHandler<TAgent, TSession>
  >();
  private readonly logger: LoggerAdapter;
  private readonly onConflict: ConflictPolicy;
  private sealed = false;

  constructor(options: HandlerRegistryOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    this.onConflict = options.onConflict ?? "replace";
  }

  /**
   * Bind a handler to an action code.
   * With the default policy an existing binding is replaced.
   */
  register(action: number, handler: RequestHandler<TAgent, TSession>): this {
    if (this.sealed) {
      throw new Error(
        `Cannot register ${actionName(action)}: registry is sealed.`,
      );
    }

    if (this.handlers.has(action)) {
      if (this.onConflict === "error") {
        throw new Error(
          `Handler already registered for ${actionName(action)} (policy: "error").`,
        );
      }
      this.logger.debug(LOG_CONTEXT.DISPATCH, "Replacing handler", {
        action: actionName(action),
      });
    }

    this.handlers.set(action, handler);
    return this;
  }

  /**
   * Freeze the bindings. Further register() calls throw.
   */
  seal(): this {
    this.sealed = true;
    return this;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Get handler for an action code.
   */
  lookup(action: number): RequestHandler<TAgent, TSession> | undefined {
    return this.handlers.get(action);
  }

  has(action: number): boolean {
    return this.handlers.has(action);
  }

  size(): number {
    return this.handlers.size;
  }

  /**
   * List all registered [action, handler] pairs.
   */
  list(): readonly [number, RequestHandler<TAgent, TSession>][] {
    return Array.from(this.handlers.entries());
  }

  /**
   * Route a request to its handler.
   *
   * Throws:
   * - UNIMPLEMENTED when no handler is bound (handler never invoked)
   * - UNAUTHENTICATED when the peer is unverified and the action is gated
   * - INTERNAL when the handler returns without delivering a response
   * - whatever the handler throws, unchanged
   *
   * A handler error raised after a response was delivered is logged and not
   * rethrown: the caller already received its one terminal outcome.
   */
  async dispatch(ctx: DispatchContext<TAgent, TSession>): Promise<void> {
    const { action } = ctx.request;

    const handler = this.handlers.get(action);
    if (!handler) {
      throw DispatchError.from(
        ErrorCode.UNIMPLEMENTED,
        `unknown action: ${action}`,
        { action },
      );
    }

    if (action !== IDENTITY_CHALLENGE_ACTION && !ctx.verified) {
      throw DispatchError.from(ErrorCode.UNAUTHENTICATED, "hub not verified", {
        action,
      });
    }

    this.logger.debug(LOG_CONTEXT.DISPATCH, "Executing handler", {
      action: actionName(action),
      requestId: ctx.requestId,
    });

    try {
      await handler.handle(ctx);
    } catch (err) {
      if (ctx.delivered) {
        this.logger.error(
          LOG_CONTEXT.DISPATCH,
          "Handler failed after delivering a response",
          { action: actionName(action), error: err },
        );
        return;
      }
      throw err;
    }

    if (!ctx.delivered) {
      throw DispatchError.from(
        ErrorCode.INTERNAL,
        `handler for action ${action} completed without a response`,
        { action },
      );
    }
  }
}
