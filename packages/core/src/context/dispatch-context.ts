// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Per-request dispatch context.
 *
 * Created fresh for every inbound request and discarded once the handler
 * settles. Borrows the agent state and the responder; owns nothing.
 *
 * respond() is one-shot: a second call throws, so a handler can never
 * produce two terminal outcomes.
 */

import { DispatchError, ErrorCode } from "../error.js";
import { jsonCodec, type PayloadCodec } from "../protocol/codec.js";
import type { RequestEnvelope, RequestId } from "../protocol/envelope.js";
import type { Responder } from "../transport/responder.js";

export interface DispatchContext<TAgent = unknown, TSession = unknown> {
  readonly agent: TAgent;

  /**
   * Originating session. Owns the verification flag.
   */
  readonly session: TSession;

  readonly request: RequestEnvelope;

  /**
   * Correlation token; absent on fire-and-forget paths.
   */
  readonly requestId?: RequestId;

  /**
   * Verification flag captured when the request arrived. Read-only.
   */
  readonly verified: boolean;

  readonly responder: Responder;

  /**
   * Codec for lazily decoding `request.data`.
   */
  readonly codec: PayloadCodec;

  /**
   * Aborted when the originating session closes.
   */
  readonly signal: AbortSignal;

  /**
   * True once respond() completed successfully.
   */
  readonly delivered: boolean;

  /**
   * Deliver the terminal response (one-shot).
   */
  respond(data: unknown): Promise<void>;
}

export interface DispatchContextInit<TAgent, TSession> {
  agent: TAgent;
  session: TSession;
  request: RequestEnvelope;
  requestId?: RequestId;
  verified: boolean;
  responder: Responder;
  codec?: PayloadCodec;
  signal?: AbortSignal;
}

export function createDispatchContext<TAgent, TSession>(
  init: DispatchContextInit<TAgent, TSession>,
): DispatchContext<TAgent, TSession> {
  let responded = false;
  let delivered = false;
  const { responder, requestId } = init;

  return {
    agent: init.agent,
    session: init.session,
    request: init.request,
    requestId,
    verified: init.verified,
    responder,
    codec: init.codec ?? jsonCodec,
    signal: init.signal ?? new AbortController().signal,
    get delivered() {
      return delivered;
    },
    async respond(data: unknown): Promise<void> {
      if (responded) {
        throw DispatchError.from(
          ErrorCode.INTERNAL,
          "response already delivered",
          { action: init.request.action },
        );
      }
      responded = true;
      await responder.deliver(data, requestId);
      delivered = true;
    },
  };
}
