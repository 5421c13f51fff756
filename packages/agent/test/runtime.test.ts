// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { Action, noopLogger } from "@vigil/core";
import { TestReplyStream, TestSocket } from "@vigil/core/testing";
import { describe, expect, it } from "vitest";
import { loadAgentConfig } from "../src/config.js";
import { createAgentRuntime } from "../src/runtime.js";
import { SNAPSHOT, createFakeStats } from "./helpers/fakes.js";

const config = loadAgentConfig({
  VIGIL_TOKEN: "test-secret",
  VIGIL_HOSTNAME: "host-a",
  VIGIL_FINGERPRINT: "fp-test",
});

describe("createAgentRuntime()", () => {
  it("should wire a sealed registry with every action", () => {
    const runtime = createAgentRuntime(config, {
      stats: createFakeStats(),
      logger: noopLogger,
    });

    expect(runtime.registry.isSealed()).toBe(true);
    expect(runtime.registry.size()).toBe(8);
    expect(runtime.logger).toBe(noopLogger);
    expect(runtime.agent.containers.isAvailable()).toBe(false);
    expect(runtime.agent.health.isAvailable()).toBe(false);
  });

  it("should open unverified socket sessions", async () => {
    const runtime = createAgentRuntime(config, {
      stats: createFakeStats(),
      logger: noopLogger,
    });
    const socket = new TestSocket();
    const session = runtime.openSocket(socket);

    await session.handleFrame(
      new TextEncoder().encode(JSON.stringify({ action: Action.GetData, id: 1 })),
    );

    expect(session.verified).toBe(false);
    expect(socket.frames()).toMatchObject([
      { id: 1, error: { code: "UNAUTHENTICATED" } },
    ]);
  });

  it("should open verified channel sessions", async () => {
    const runtime = createAgentRuntime(config, {
      stats: createFakeStats(),
      logger: noopLogger,
    });
    const stream = new TestReplyStream();
    const session = runtime.openChannel(stream);

    await session.handleFrame(
      new TextEncoder().encode(JSON.stringify({ action: Action.GetData })),
    );

    expect(stream.values()).toEqual([{ data: SNAPSHOT }]);
  });

  it("should pass registry options through", () => {
    const runtime = createAgentRuntime(config, {
      stats: createFakeStats(),
      logger: noopLogger,
      registry: {
        configure: (registry) => {
          registry.register(99, { handle: (ctx) => ctx.respond("extra") });
        },
      },
    });

    expect(runtime.registry.has(99)).toBe(true);
  });
});
