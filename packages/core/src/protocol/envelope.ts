// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Request/response envelopes: frame → envelope decoding.
 *
 * The envelope is what dispatch sees: an action code plus opaque bytes.
 * Frames are what travels on the wire; their `data` is re-encoded into
 * bytes so that only the owning handler ever interprets it.
 */

import { DispatchError, ErrorCode, type ErrorPayload } from "../error.js";
import type { PayloadCodec } from "./codec.js";

/**
 * Correlation token (unsigned 32-bit). Echoed verbatim by the responder.
 */
export type RequestId = number;

export interface RequestEnvelope {
  readonly action: number;
  readonly data: Uint8Array;
}

/**
 * Inbound frame shape.
 */
export interface RequestFrame {
  action: number;
  data?: unknown;
  id?: RequestId | null;
}

/**
 * Outbound frame shape: exactly one of `data` or `error`.
 */
export type ResponseFrame =
  | { id?: RequestId; data: unknown }
  | { id?: RequestId; error: ErrorPayload };

export type FrameDecodeOutcome =
  | { ok: true; envelope: RequestEnvelope; requestId?: RequestId }
  | { ok: false; error: DispatchError; requestId?: RequestId };

const MAX_REQUEST_ID = 0xffffffff;

export function isRequestId(value: unknown): value is RequestId {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_REQUEST_ID
  );
}

/**
 * Build an envelope from a payload value. `undefined` yields empty bytes.
 */
export function createEnvelope(
  action: number,
  payload: unknown,
  codec: PayloadCodec,
): RequestEnvelope {
  return {
    action,
    data: payload === undefined ? new Uint8Array(0) : codec.encode(payload),
  };
}

/**
 * Decode a raw inbound frame.
 * Returns a result object instead of throwing; the request id is reported
 * whenever it could be read, so the failure can still be correlated.
 */
export function decodeRequestFrame(
  raw: Uint8Array,
  codec: PayloadCodec,
  maxPayloadBytes?: number,
): FrameDecodeOutcome {
  let frame: unknown;
  try {
    frame = codec.decode(raw, maxPayloadBytes);
  } catch (err) {
    return {
      ok: false,
      error: DispatchError.wrap(err, ErrorCode.INVALID_ARGUMENT),
    };
  }

  if (typeof frame !== "object" || frame === null || Array.isArray(frame)) {
    return {
      ok: false,
      error: DispatchError.from(
        ErrorCode.INVALID_ARGUMENT,
        "Invalid request frame: expected an object",
      ),
    };
  }

  const action = "action" in frame ? frame.action : undefined;
  const data = "data" in frame ? frame.data : undefined;
  // null is a common encoding of "no id"
  const id = "id" in frame && frame.id !== null ? frame.id : undefined;

  let requestId: RequestId | undefined;
  if (id !== undefined) {
    if (!isRequestId(id)) {
      return {
        ok: false,
        error: DispatchError.from(
          ErrorCode.INVALID_ARGUMENT,
          "Invalid request frame: id must be an unsigned 32-bit integer",
        ),
      };
    }
    requestId = id;
  }

  const outcome: FrameDecodeOutcome =
    typeof action === "number" && Number.isInteger(action)
      ? { ok: true, envelope: createEnvelope(action, data, codec) }
      : {
          ok: false,
          error: DispatchError.from(
            ErrorCode.INVALID_ARGUMENT,
            "Invalid request frame: missing or invalid action field",
            requestId === undefined ? {} : { id: requestId },
          ),
        };
  if (requestId !== undefined) {
    outcome.requestId = requestId;
  }
  return outcome;
}
