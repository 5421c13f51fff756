// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe, expect, it } from "vitest";
import {
  Action,
  DispatchError,
  ErrorCode,
  createDispatchContext,
  createEnvelope,
  jsonCodec,
  type Responder,
} from "../src/index.js";
import { TestResponder } from "../src/testing/index.js";
import { createTestContext } from "./helpers/context.js";

describe("createDispatchContext()", () => {
  it("should expose the request, flags and collaborators", () => {
    const responder = new TestResponder();
    const request = createEnvelope(Action.GetData, { cacheTimeMs: 0 }, jsonCodec);
    const ctx = createDispatchContext({
      agent: "agent",
      session: "session",
      request,
      requestId: 12,
      verified: false,
      responder,
    });

    expect(ctx.agent).toBe("agent");
    expect(ctx.session).toBe("session");
    expect(ctx.request).toBe(request);
    expect(ctx.requestId).toBe(12);
    expect(ctx.verified).toBe(false);
    expect(ctx.responder).toBe(responder);
    expect(ctx.codec).toBe(jsonCodec);
    expect(ctx.signal.aborted).toBe(false);
    expect(ctx.delivered).toBe(false);
  });

  it("should pass the request id through respond()", async () => {
    const responder = new TestResponder();
    const ctx = createTestContext({
      action: Action.GetData,
      requestId: 3,
      responder,
    });

    await ctx.respond({ cpu: 12.5 });

    expect(ctx.delivered).toBe(true);
    expect(responder.deliveries).toEqual([
      { data: { cpu: 12.5 }, requestId: 3 },
    ]);
  });

  it("should allow exactly one respond()", async () => {
    const responder = new TestResponder();
    const ctx = createTestContext({ action: Action.StopContainer, responder });

    await ctx.respond("ok");

    await expect(ctx.respond("again")).rejects.toThrow(
      "response already delivered",
    );
    expect(responder.deliveries).toEqual([{ data: "ok" }]);
  });

  it("should tag a second respond() as INTERNAL", async () => {
    const ctx = createTestContext({ action: Action.StopContainer });
    await ctx.respond("ok");

    const error = await ctx.respond("again").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DispatchError);
    expect(error).toMatchObject({
      code: ErrorCode.INTERNAL,
      details: { action: Action.StopContainer },
    });
  });

  it("should stay undelivered when the transport fails", async () => {
    const responder: Responder = {
      deliver: () => Promise.reject(new Error("socket closed")),
    };
    const ctx = createTestContext({ action: Action.GetData, responder });

    await expect(ctx.respond("data")).rejects.toThrow("socket closed");
    expect(ctx.delivered).toBe(false);
  });

  it("should carry the caller's abort signal", () => {
    const controller = new AbortController();
    const ctx = createTestContext({
      action: Action.GetContainerLogs,
      signal: controller.signal,
    });

    controller.abort();

    expect(ctx.signal.aborted).toBe(true);
  });
});
