// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe, expect, it } from "vitest";
import {
  Action,
  ErrorCode,
  actionName,
  createEnvelope,
  decodeRequestFrame,
  isAction,
  isRequestId,
  jsonCodec,
} from "../src/index.js";

const encode = (value: unknown): Uint8Array => jsonCodec.encode(value);
const raw = (text: string): Uint8Array => new TextEncoder().encode(text);

describe("decodeRequestFrame()", () => {
  it("should decode action, id and re-encoded data", () => {
    const outcome = decodeRequestFrame(
      encode({ action: Action.GetData, id: 5, data: { cacheTimeMs: 60000 } }),
      jsonCodec,
    );

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.requestId).toBe(5);
    expect(outcome.envelope.action).toBe(Action.GetData);
    expect(jsonCodec.decode(outcome.envelope.data)).toEqual({
      cacheTimeMs: 60000,
    });
  });

  it("should leave the request id out when the frame has none", () => {
    const outcome = decodeRequestFrame(
      encode({ action: Action.GetSmartData }),
      jsonCodec,
    );

    expect(outcome.ok).toBe(true);
    expect("requestId" in outcome).toBe(false);
    if (!outcome.ok) return;
    expect(outcome.envelope.data.byteLength).toBe(0);
  });

  it("should treat a null id as no id", () => {
    const outcome = decodeRequestFrame(
      encode({ action: Action.GetData, id: null }),
      jsonCodec,
    );

    expect(outcome.ok).toBe(true);
    expect("requestId" in outcome).toBe(false);
  });

  it("should reject invalid JSON", () => {
    const outcome = decodeRequestFrame(raw("{"), jsonCodec);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.code).toBe(ErrorCode.INVALID_ARGUMENT);
    expect(outcome.error.message).toMatch(/^Invalid JSON: /);
  });

  it("should reject frames that are not objects", () => {
    const outcome = decodeRequestFrame(encode([1, 2]), jsonCodec);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.message).toBe(
      "Invalid request frame: expected an object",
    );
  });

  it("should reject ids outside the unsigned 32-bit range", () => {
    const outcome = decodeRequestFrame(
      encode({ action: Action.GetData, id: -1 }),
      jsonCodec,
    );

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.message).toBe(
      "Invalid request frame: id must be an unsigned 32-bit integer",
    );
  });

  it("should keep the id when the action is missing", () => {
    const outcome = decodeRequestFrame(
      encode({ action: "GetData", id: 3 }),
      jsonCodec,
    );

    expect(outcome).toMatchObject({
      ok: false,
      requestId: 3,
      error: {
        code: ErrorCode.INVALID_ARGUMENT,
        message: "Invalid request frame: missing or invalid action field",
        details: { id: 3 },
      },
    });
  });

  it("should reject fractional action codes", () => {
    const outcome = decodeRequestFrame(encode({ action: 1.5 }), jsonCodec);
    expect(outcome.ok).toBe(false);
  });

  it("should pass unknown integer actions through to dispatch", () => {
    const outcome = decodeRequestFrame(encode({ action: 9999 }), jsonCodec);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.envelope.action).toBe(9999);
  });

  it("should enforce the payload size limit", () => {
    const bytes = encode({ action: Action.GetData, data: "x".repeat(32) });

    const outcome = decodeRequestFrame(bytes, jsonCodec, 16);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.message).toBe(
      `Message exceeds max payload size: ${bytes.byteLength} > 16`,
    );
  });
});

describe("createEnvelope()", () => {
  it("should encode an undefined payload as empty bytes", () => {
    expect(createEnvelope(Action.GetData, undefined, jsonCodec).data).toEqual(
      new Uint8Array(0),
    );
  });

  it("should encode payload values with the codec", () => {
    const envelope = createEnvelope(
      Action.GetContainerLogs,
      { containerID: "web" },
      jsonCodec,
    );

    expect(new TextDecoder().decode(envelope.data)).toBe(
      '{"containerID":"web"}',
    );
  });
});

describe("isRequestId()", () => {
  it("should accept unsigned 32-bit integers only", () => {
    expect(isRequestId(0)).toBe(true);
    expect(isRequestId(0xffffffff)).toBe(true);
    expect(isRequestId(0x100000000)).toBe(false);
    expect(isRequestId(2.5)).toBe(false);
    expect(isRequestId("1")).toBe(false);
  });
});

describe("actions", () => {
  it("should name known and unknown codes", () => {
    expect(actionName(Action.RestartContainer)).toBe("RestartContainer");
    expect(actionName(9999)).toBe("Action(9999)");
  });

  it("should recognise the fixed action set", () => {
    expect(isAction(Action.GetData)).toBe(true);
    expect(isAction(7)).toBe(true);
    expect(isAction(8)).toBe(false);
  });
});

describe("jsonCodec", () => {
  it("should encode undefined as null", () => {
    expect(new TextDecoder().decode(jsonCodec.encode(undefined))).toBe("null");
  });

  it("should throw INVALID_ARGUMENT on empty input", () => {
    expect(() => jsonCodec.decode(new Uint8Array(0))).toThrow(
      /^Invalid JSON: /,
    );
  });
});
