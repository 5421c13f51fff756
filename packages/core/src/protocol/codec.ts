// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Payload codec contract.
 *
 * The wire encoding is pluggable: the dispatch core only ever moves opaque
 * bytes, and handlers decode them through the codec carried on the context.
 */

import { DispatchError, ErrorCode } from "../error.js";
import { safeJsonParse, safeJsonStringify } from "../utils/json.js";

export interface PayloadCodec {
  /** Codec name, for logs */
  readonly name: string;

  encode(value: unknown): Uint8Array;

  /**
   * Decode bytes into a value.
   * Throws DispatchError(INVALID_ARGUMENT) on malformed input.
   */
  decode(bytes: Uint8Array, maxBytes?: number): unknown;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * UTF-8 JSON codec (default).
 */
export const jsonCodec: PayloadCodec = {
  name: "json",

  encode(value: unknown): Uint8Array {
    return encoder.encode(safeJsonStringify(value));
  },

  decode(bytes: Uint8Array, maxBytes?: number): unknown {
    if (maxBytes && bytes.byteLength > maxBytes) {
      throw DispatchError.from(
        ErrorCode.INVALID_ARGUMENT,
        `Message exceeds max payload size: ${bytes.byteLength} > ${maxBytes}`,
      );
    }
    const result = safeJsonParse(decoder.decode(bytes));
    if (!result.ok) {
      throw DispatchError.from(
        ErrorCode.INVALID_ARGUMENT,
        `Invalid JSON: ${result.error}`,
      );
    }
    return result.value;
  },
};
