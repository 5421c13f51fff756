// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Payload schemas, one per action that takes options.
 */

import { z } from "zod";

export const DataRequestSchema = z.object({
  /** Accept a cached snapshot up to this old (ms) */
  cacheTimeMs: z.number().int().nonnegative().optional(),
});

export const FingerprintRequestSchema = z.object({
  /** Base64 signature over the agent token */
  signature: z.string().optional(),
  /** Include hostname and port in the response */
  needSysInfo: z.boolean().optional(),
});

export const ContainerRequestSchema = z.object({
  containerID: z.string().min(1),
});

export const ContainerControlRequestSchema = ContainerRequestSchema.extend({
  /** Grace period before the runtime kills the container; 0 = default */
  timeoutSeconds: z.number().int().nonnegative().optional(),
});

export type DataRequest = z.infer<typeof DataRequestSchema>;
export type FingerprintRequest = z.infer<typeof FingerprintRequestSchema>;
export type ContainerRequest = z.infer<typeof ContainerRequestSchema>;
export type ContainerControlRequest = z.infer<
  typeof ContainerControlRequestSchema
>;

export interface FingerprintResponse {
  fingerprint: string;
  hostname?: string;
  port?: number;
}
