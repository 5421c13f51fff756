// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { DispatchContext, RequestHandler } from "@vigil/core";
import type { Agent } from "./agent.js";

/**
 * What handlers may ask of the originating session.
 * The verification flag is read-only here; only the identity challenge
 * moves it from false to true.
 */
export interface AgentSession {
  readonly clientId: string;
  readonly verified: boolean;
  handleIdentityChallenge(ctx: AgentContext): Promise<void>;
}

export type AgentContext = DispatchContext<Agent, AgentSession>;

export type AgentHandler = RequestHandler<Agent, AgentSession>;
