// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Responder: the single capability a handler uses to answer the hub.
 *
 * Two transport forms:
 * - FramedResponder: wraps payload + id into a frame on a duplex socket
 * - StreamResponder: writes the same frames into a remote-shell reply stream
 *
 * Handlers never see which one they hold. Sessions construct one per
 * connection and additionally use `fail()` to report errors.
 */

import { toErrorPayload } from "../error.js";
import { jsonCodec, type PayloadCodec } from "../protocol/codec.js";
import type { RequestId, ResponseFrame } from "../protocol/envelope.js";

export interface Responder {
  /**
   * Deliver a successful result correlated to `requestId`.
   */
  deliver(data: unknown, requestId?: RequestId): Promise<void>;
}

/**
 * Responder used by transport sessions: adds error reporting.
 */
export interface TransportResponder extends Responder {
  fail(error: unknown, requestId?: RequestId): Promise<void>;
}

/**
 * Persistent duplex connection (WebSocket-like). Opaque transport.
 */
export interface DuplexSocket {
  send(data: Uint8Array): void | Promise<void>;
}

/**
 * Reply stream of a remote-shell channel. Compatible with node:stream Writable.
 */
export interface ReplyStream {
  write(chunk: Uint8Array, callback: (error?: Error | null) => void): boolean;
}

/**
 * Build the response frame for either outcome. The request id is echoed
 * verbatim when present.
 */
export function createResponseFrame(
  outcome: { data: unknown } | { error: unknown },
  requestId?: RequestId,
): ResponseFrame {
  const body =
    "data" in outcome
      ? { data: outcome.data }
      : { error: toErrorPayload(outcome.error) };
  return requestId === undefined ? body : { id: requestId, ...body };
}

export class FramedResponder implements TransportResponder {
  constructor(
    private readonly socket: DuplexSocket,
    private readonly codec: PayloadCodec = jsonCodec,
  ) {}

  async deliver(data: unknown, requestId?: RequestId): Promise<void> {
    await this.socket.send(
      this.codec.encode(createResponseFrame({ data }, requestId)),
    );
  }

  async fail(error: unknown, requestId?: RequestId): Promise<void> {
    await this.socket.send(
      this.codec.encode(createResponseFrame({ error }, requestId)),
    );
  }
}

/**
 * Reply form for a remote-shell channel. Frames have the same shape as on
 * the socket; several requests may be in flight on one channel.
 */
export class StreamResponder implements TransportResponder {
  constructor(
    private readonly stream: ReplyStream,
    private readonly codec: PayloadCodec = jsonCodec,
  ) {}

  deliver(data: unknown, requestId?: RequestId): Promise<void> {
    return this.write(createResponseFrame({ data }, requestId));
  }

  fail(error: unknown, requestId?: RequestId): Promise<void> {
    return this.write(createResponseFrame({ error }, requestId));
  }

  private write(frame: ResponseFrame): Promise<void> {
    const chunk = this.codec.encode(frame);
    return new Promise((resolve, reject) => {
      this.stream.write(chunk, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}
