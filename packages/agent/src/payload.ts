// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Lazy payload decoding for handlers.
 *
 * Strict: decode or validation failure aborts the request with
 * INVALID_ARGUMENT before any side effect.
 * Lenient: any failure yields the zero-valued fallback.
 */

import {
  DispatchError,
  ErrorCode,
  actionName,
  type DispatchContext,
} from "@vigil/core";
import { z } from "zod";

type PayloadSource = Pick<DispatchContext, "request" | "codec">;

export function decodePayload<T>(ctx: PayloadSource, schema: z.ZodType<T>): T {
  const { action, data } = ctx.request;
  const raw = ctx.codec.decode(data);
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw DispatchError.from(
      ErrorCode.INVALID_ARGUMENT,
      `Invalid ${actionName(action)} payload: ${z.prettifyError(result.error)}`,
      { action },
    );
  }
  return result.data;
}

export function decodePayloadOrDefault<T>(
  ctx: PayloadSource,
  schema: z.ZodType<T>,
  fallback: NoInfer<T>,
): T {
  let raw: unknown;
  try {
    raw = ctx.codec.decode(ctx.request.data);
  } catch {
    return fallback;
  }
  const result = schema.safeParse(raw);
  return result.success ? result.data : fallback;
}
