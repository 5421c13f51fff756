// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * ID generation: session IDs for logs.
 */

import { randomBytes } from "node:crypto";

export function generateSessionId(): string {
  return `session_${randomBytes(8).toString("hex")}`;
}
