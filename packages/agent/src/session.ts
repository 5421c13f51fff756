// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Hub session: one per transport connection.
 *
 * Owns the verification flag, the responder and the cancellation scope.
 * Every inbound frame runs as its own promise, so a slow handler never holds
 * up the requests behind it; responses may therefore complete out of order
 * and are correlated by request id only.
 */

import {
  DispatchError,
  ErrorCode,
  FramedResponder,
  LOG_CONTEXT,
  StreamResponder,
  actionName,
  createDispatchContext,
  decodeRequestFrame,
  generateSessionId,
  jsonCodec,
  noopLogger,
  type DuplexSocket,
  type LoggerAdapter,
  type PayloadCodec,
  type ReplyStream,
  type RequestId,
  type TransportResponder,
} from "@vigil/core";
import type { Agent } from "./agent.js";
import type { FingerprintAuthenticator } from "./auth/fingerprint.js";
import type { AgentContext, AgentSession } from "./context.js";
import { decodePayloadOrDefault } from "./payload.js";
import type { AgentRegistry } from "./registry.js";
import { FingerprintRequestSchema } from "./schemas.js";

/**
 * Dependencies shared by every session of a process.
 */
export interface SessionDeps {
  registry: AgentRegistry;
  agent: Agent;
  authenticator: FingerprintAuthenticator;
  codec?: PayloadCodec;
  logger?: LoggerAdapter;
  /** Reject inbound frames larger than this */
  maxPayloadBytes?: number;
}

export interface HubSessionOptions extends SessionDeps {
  responder: TransportResponder;
  /**
   * Start verified. Only for transports that authenticate the hub at the
   * connection level before any frame arrives.
   */
  verified?: boolean;
  clientId?: string;
}

// Codes that describe a bad request rather than an agent failure
const CLIENT_ERROR_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.UNIMPLEMENTED,
  ErrorCode.UNAUTHENTICATED,
  ErrorCode.INVALID_ARGUMENT,
]);

export class HubSession implements AgentSession {
  readonly clientId: string;
  private verifiedFlag: boolean;
  private readonly controller = new AbortController();
  private readonly inflight = new Set<Promise<void>>();
  private readonly registry: AgentRegistry;
  private readonly agent: Agent;
  private readonly authenticator: FingerprintAuthenticator;
  private readonly responder: TransportResponder;
  private readonly codec: PayloadCodec;
  private readonly logger: LoggerAdapter;
  private readonly maxPayloadBytes: number | undefined;

  constructor(options: HubSessionOptions) {
    this.clientId = options.clientId ?? generateSessionId();
    this.verifiedFlag = options.verified ?? false;
    this.registry = options.registry;
    this.agent = options.agent;
    this.authenticator = options.authenticator;
    this.responder = options.responder;
    this.codec = options.codec ?? jsonCodec;
    this.logger = options.logger ?? noopLogger;
    this.maxPayloadBytes = options.maxPayloadBytes;
  }

  get verified(): boolean {
    return this.verifiedFlag;
  }

  get closed(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Number of requests still running.
   */
  pending(): number {
    return this.inflight.size;
  }

  /**
   * Accept one raw frame. Returns the request's promise, which never
   * rejects: failures are reported to the hub through the responder.
   */
  handleFrame(raw: Uint8Array): Promise<void> {
    const task: Promise<void> = this.process(raw).finally(() => {
      this.inflight.delete(task);
    });
    this.inflight.add(task);
    return task;
  }

  /**
   * Wait until every in-flight request has settled.
   */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled(Array.from(this.inflight));
    }
  }

  /**
   * Cancel outstanding subsystem calls. Frames arriving afterwards are
   * dropped.
   */
  close(reason = "session closed"): void {
    if (this.closed) {
      return;
    }
    this.controller.abort(DispatchError.from(ErrorCode.CANCELLED, reason));
    this.logger.info(LOG_CONTEXT.CONNECTION, "Session closed", {
      clientId: this.clientId,
      pending: this.inflight.size,
    });
  }

  /**
   * Verify the hub's signature and, on success, mark this connection
   * verified. A repeated challenge is checked again; a failed check is
   * reported but never clears an earlier verification.
   */
  async handleIdentityChallenge(ctx: AgentContext): Promise<void> {
    const request = decodePayloadOrDefault(ctx, FingerprintRequestSchema, {});

    if (!this.authenticator.verify(request.signature)) {
      this.logger.warn(LOG_CONTEXT.AUTH, "Fingerprint check failed", {
        clientId: this.clientId,
      });
      throw DispatchError.from(ErrorCode.UNAUTHENTICATED, "invalid signature", {
        action: ctx.request.action,
      });
    }

    if (!this.verifiedFlag) {
      this.verifiedFlag = true;
      this.logger.info(LOG_CONTEXT.AUTH, "Hub verified", {
        clientId: this.clientId,
      });
    }

    await ctx.respond(
      this.authenticator.response(request.needSysInfo ?? false),
    );
  }

  private async process(raw: Uint8Array): Promise<void> {
    if (this.closed) {
      this.logger.warn(
        LOG_CONTEXT.CONNECTION,
        "Dropping frame on closed session",
        { clientId: this.clientId },
      );
      return;
    }

    const decoded = decodeRequestFrame(raw, this.codec, this.maxPayloadBytes);
    if (!decoded.ok) {
      await this.report(decoded.error, decoded.requestId);
      return;
    }

    const ctx = createDispatchContext({
      agent: this.agent,
      session: this,
      request: decoded.envelope,
      requestId: decoded.requestId,
      verified: this.verifiedFlag,
      responder: this.responder,
      codec: this.codec,
      signal: this.controller.signal,
    });

    try {
      await this.registry.dispatch(ctx);
    } catch (err) {
      await this.report(err, decoded.requestId, decoded.envelope.action);
    }
  }

  private async report(
    error: unknown,
    requestId: RequestId | undefined,
    action?: number,
  ): Promise<void> {
    const data = {
      clientId: this.clientId,
      action: action === undefined ? undefined : actionName(action),
      requestId,
      error,
    };
    if (error instanceof DispatchError && CLIENT_ERROR_CODES.has(error.code)) {
      this.logger.warn(LOG_CONTEXT.CONNECTION, error.message, data);
    } else {
      this.logger.error(LOG_CONTEXT.HANDLER, "Request failed", data);
    }

    try {
      await this.responder.fail(error, requestId);
    } catch (sendErr) {
      this.logger.error(LOG_CONTEXT.CONNECTION, "Failed to report error", {
        clientId: this.clientId,
        requestId,
        error: sendErr,
      });
    }
  }
}

/**
 * Session over a persistent duplex socket. Starts unverified: the hub must
 * pass the identity challenge before anything else is served.
 */
export function createSocketSession(
  socket: DuplexSocket,
  deps: SessionDeps,
): HubSession {
  return new HubSession({
    ...deps,
    responder: new FramedResponder(socket, deps.codec),
    verified: false,
  });
}

/**
 * Session over a remote-shell channel. The channel's own key exchange has
 * already authenticated the hub, so the session starts verified.
 */
export function createChannelSession(
  stream: ReplyStream,
  deps: SessionDeps,
): HubSession {
  return new HubSession({
    ...deps,
    responder: new StreamResponder(stream, deps.codec),
    verified: true,
  });
}
