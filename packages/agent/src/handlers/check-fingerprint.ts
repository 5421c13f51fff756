// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { AgentHandler } from "../context.js";

/**
 * Identity challenge. The only handler reachable before verification;
 * the session decodes the challenge and owns the flag transition.
 */
export const checkFingerprintHandler: AgentHandler = {
  handle(ctx) {
    return ctx.session.handleIdentityChallenge(ctx);
  },
};
