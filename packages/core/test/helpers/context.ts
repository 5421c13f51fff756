// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  createDispatchContext,
  createEnvelope,
  jsonCodec,
  type DispatchContext,
  type RequestId,
  type Responder,
} from "../../src/index.js";
import { TestResponder } from "../../src/testing/index.js";

export interface TestContextOptions {
  action: number;
  payload?: unknown;
  requestId?: RequestId;
  verified?: boolean;
  responder?: Responder;
  signal?: AbortSignal;
}

// Helper to build a context around an in-memory responder
export function createTestContext(
  options: TestContextOptions,
): DispatchContext<null, null> {
  return createDispatchContext({
    agent: null,
    session: null,
    request: createEnvelope(options.action, options.payload, jsonCodec),
    requestId: options.requestId,
    verified: options.verified ?? true,
    responder: options.responder ?? new TestResponder(),
    signal: options.signal,
  });
}
