// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * JSON utilities: parse without throwing, stringify without `undefined`.
 */

export interface ParseResult<T = unknown> {
  ok: true;
  value: T;
}

export interface ParseError {
  ok: false;
  error: string;
}

export type ParseOutcome<T = unknown> = ParseResult<T> | ParseError;

/**
 * Parse JSON safely.
 * Returns a result object instead of throwing.
 */
export function safeJsonParse(data: string): ParseOutcome {
  try {
    const value: unknown = JSON.parse(data);
    return { ok: true, value };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: message };
  }
}

/**
 * Stringify a value. `undefined` serializes as `null`.
 */
export function safeJsonStringify(obj: unknown): string {
  return JSON.stringify(obj) ?? "null";
}
