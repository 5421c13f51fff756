// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Agent configuration from environment variables.
 */

import { hostname as osHostname } from "node:os";
import type { KeyObject } from "node:crypto";
import {
  DispatchError,
  ErrorCode,
  LOG_LEVELS,
  type LogLevel,
} from "@vigil/core";
import { z } from "zod";
import { deriveFingerprint, parsePublicKeys } from "./auth/fingerprint.js";

export const DEFAULT_PORT = 45876;
export const DEFAULT_MAX_PAYLOAD_BYTES = 1_048_576;

const EnvSchema = z.object({
  VIGIL_TOKEN: z.string().default(""),
  VIGIL_HUB_KEYS: z.string().default(""),
  VIGIL_FINGERPRINT: z.string().min(1).optional(),
  VIGIL_HOSTNAME: z.string().min(1).optional(),
  VIGIL_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
  VIGIL_MAX_PAYLOAD_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_MAX_PAYLOAD_BYTES),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export interface AgentConfig {
  /** Message the hub signs during the identity challenge */
  token: string;
  hubKeys: KeyObject[];
  fingerprint: string;
  hostname: string;
  port: number;
  maxPayloadBytes: number;
  logLevel: LogLevel;
}

export type Env = Record<string, string | undefined>;

/**
 * Parse and validate configuration.
 * Throws DispatchError(INVALID_ARGUMENT) listing every invalid variable.
 */
export function loadAgentConfig(env: Env = process.env): AgentConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw DispatchError.from(
      ErrorCode.INVALID_ARGUMENT,
      `Invalid agent configuration: ${z.prettifyError(result.error)}`,
    );
  }
  const vars = result.data;

  let hubKeys: KeyObject[];
  try {
    hubKeys = parsePublicKeys(vars.VIGIL_HUB_KEYS);
  } catch (err) {
    throw DispatchError.wrap(
      err,
      ErrorCode.INVALID_ARGUMENT,
      `Invalid VIGIL_HUB_KEYS: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const hostname = vars.VIGIL_HOSTNAME ?? osHostname();

  return {
    token: vars.VIGIL_TOKEN,
    hubKeys,
    fingerprint: vars.VIGIL_FINGERPRINT ?? deriveFingerprint(hostname),
    hostname,
    port: vars.VIGIL_PORT,
    maxPayloadBytes: vars.VIGIL_MAX_PAYLOAD_BYTES,
    logLevel: vars.LOG_LEVEL,
  };
}
