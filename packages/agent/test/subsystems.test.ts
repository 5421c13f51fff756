// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { Action, createDispatchContext, createEnvelope, jsonCodec } from "@vigil/core";
import { TestResponder } from "@vigil/core/testing";
import { describe, expect, it } from "vitest";
import { Agent } from "../src/agent.js";
import { decodePayload, decodePayloadOrDefault } from "../src/payload.js";
import { ContainerRequestSchema, DataRequestSchema } from "../src/schemas.js";
import { SubsystemRef } from "../src/subsystems.js";
import {
  TEST_SESSION,
  createFakeContainers,
  createFakeStats,
} from "./helpers/fakes.js";

describe("SubsystemRef", () => {
  it("should report presence as it is attached and detached", () => {
    const ref = new SubsystemRef<string>("containers");
    expect(ref.get()).toBeUndefined();
    expect(ref.isAvailable()).toBe(false);

    ref.attach("runtime");
    expect(ref.get()).toBe("runtime");
    expect(ref.isAvailable()).toBe(true);

    ref.detach();
    expect(ref.isAvailable()).toBe(false);
  });

  it("should let handlers see a subsystem attached after startup", () => {
    const agent = new Agent({ stats: createFakeStats() });
    expect(agent.containers.get()).toBeUndefined();

    const containers = createFakeContainers();
    agent.containers.attach(containers);

    expect(agent.containers.get()).toBe(containers);
  });
});

describe("payload decoding", () => {
  const contextFor = (bytes: Uint8Array) =>
    createDispatchContext({
      agent: null,
      session: TEST_SESSION,
      request: { action: Action.GetContainerLogs, data: bytes },
      verified: true,
      responder: new TestResponder(),
    });

  it("should decode a valid payload", () => {
    const ctx = contextFor(
      createEnvelope(Action.GetContainerLogs, { containerID: "web" }, jsonCodec)
        .data,
    );
    expect(decodePayload(ctx, ContainerRequestSchema)).toEqual({
      containerID: "web",
    });
  });

  it("should reject an empty payload in strict mode", () => {
    expect(() =>
      decodePayload(contextFor(new Uint8Array(0)), ContainerRequestSchema),
    ).toThrow(/^Invalid JSON: /);
  });

  it("should fall back on undecodable bytes in lenient mode", () => {
    const ctx = contextFor(new TextEncoder().encode("{broken"));
    expect(decodePayloadOrDefault(ctx, DataRequestSchema, {})).toEqual({});
  });

  it("should fall back on schema mismatch in lenient mode", () => {
    const ctx = contextFor(jsonCodec.encode({ cacheTimeMs: -1 }));
    expect(
      decodePayloadOrDefault(ctx, DataRequestSchema, { cacheTimeMs: 5 }),
    ).toEqual({ cacheTimeMs: 5 });
  });
});
