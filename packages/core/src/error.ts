// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Error codes for request dispatch, aligned with gRPC conventions.
 *
 * Terminal errors (the caller must change something before retrying):
 * - UNAUTHENTICATED: peer has not passed the identity challenge
 * - INVALID_ARGUMENT: payload or frame could not be decoded
 * - UNIMPLEMENTED: no handler is bound to the action code
 * - CANCELLED: the session was closed before the request finished
 *
 * Transient errors:
 * - UNAVAILABLE: an optional subsystem is absent on this host
 *
 * Server:
 * - INTERNAL: contract violation or unexpected failure
 */
export enum ErrorCode {
  /** Peer not verified for this connection */
  UNAUTHENTICATED = "UNAUTHENTICATED",

  /** Malformed frame or payload */
  INVALID_ARGUMENT = "INVALID_ARGUMENT",

  /** Unknown action code */
  UNIMPLEMENTED = "UNIMPLEMENTED",

  /** Session closed while the request was in flight */
  CANCELLED = "CANCELLED",

  /** Subsystem absent */
  UNAVAILABLE = "UNAVAILABLE",

  /** Unexpected failure (bug) */
  INTERNAL = "INTERNAL",
}

export type ErrorCodeValue = `${ErrorCode}`;

export interface ErrorCodeMetadata {
  /** Whether code is retryable. "maybe" = depends on the failing subsystem */
  retryable: boolean | "maybe";

  /** Human-readable description of this error code */
  description: string;
}

/**
 * Source of truth for retryability of each code.
 */
export const ERROR_CODE_META: Record<ErrorCode, ErrorCodeMetadata> = {
  [ErrorCode.UNAUTHENTICATED]: {
    retryable: false,
    description: "Identity challenge not completed on this connection",
  },
  [ErrorCode.INVALID_ARGUMENT]: {
    retryable: false,
    description: "Frame or payload could not be decoded",
  },
  [ErrorCode.UNIMPLEMENTED]: {
    retryable: false,
    description: "No handler registered for the action code",
  },
  [ErrorCode.CANCELLED]: {
    retryable: false,
    description: "Session closed before the request completed",
  },
  [ErrorCode.UNAVAILABLE]: {
    retryable: true,
    description: "Subsystem not available on this host",
  },
  [ErrorCode.INTERNAL]: {
    retryable: "maybe",
    description: "Unexpected failure; retryability is subsystem-specific",
  },
};

/**
 * Error payload written back to the hub.
 *
 * The request identifier is NOT here; it lives on the response frame.
 */
export interface ErrorPayload {
  code: string;
  message: string;
  details?: Record<string, unknown>;
  retryable?: boolean;
}

/**
 * DispatchError: coded error raised by the dispatch core and its handlers.
 *
 * Follows the WHATWG Error standard with `cause` for chaining.
 *
 * @example
 * throw DispatchError.from(ErrorCode.UNAVAILABLE, "docker not available");
 *
 * @example
 * try {
 *   schema.parse(value);
 * } catch (err) {
 *   throw DispatchError.wrap(err, ErrorCode.INVALID_ARGUMENT, "bad payload");
 * }
 */
export class DispatchError<C extends ErrorCode = ErrorCode> extends Error {
  readonly code: C;

  /** Additional details safe to send to the hub */
  readonly details: Record<string, unknown>;

  readonly retryable: boolean | "maybe";

  /** WHATWG standard: original error for debugging */
  override readonly cause: unknown;

  constructor(
    code: C,
    message: string,
    details?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(message);
    this.name = "DispatchError";
    this.code = code;
    this.details = details ?? {};
    this.retryable = ERROR_CODE_META[code].retryable;

    if (cause !== undefined) {
      this.cause = cause;
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DispatchError);
    }
  }

  static from<C extends ErrorCode>(
    code: C,
    message: string,
    details?: Record<string, unknown>,
  ): DispatchError<C> {
    return new DispatchError(code, message, details);
  }

  /**
   * Wrap an unknown error as a DispatchError, preserving it as the cause.
   *
   * Without a code, an existing DispatchError is returned unchanged and
   * anything else becomes INTERNAL.
   */
  static wrap(
    error: unknown,
    code?: ErrorCode,
    message?: string,
    details?: Record<string, unknown>,
  ): DispatchError {
    if (error instanceof DispatchError && code === undefined) {
      return error;
    }

    const originalError =
      error instanceof Error ? error : new Error(String(error));
    const c = code ?? ErrorCode.INTERNAL;

    return new DispatchError(
      c,
      message || originalError.message || String(c),
      details,
      originalError,
    );
  }

  static isDispatchError(value: unknown): value is DispatchError {
    return value instanceof DispatchError;
  }

  /**
   * Payload for transmission. Excludes cause and stack.
   */
  toPayload(): ErrorPayload {
    const payload: ErrorPayload = {
      code: this.code,
      message: this.message,
    };
    if (Object.keys(this.details).length > 0) {
      payload.details = this.details;
    }
    if (typeof this.retryable === "boolean") {
      payload.retryable = this.retryable;
    }
    return payload;
  }
}

/**
 * Convert any thrown value into a wire payload.
 *
 * Subsystem errors are reported verbatim: their message is kept as-is under
 * the INTERNAL code, without a retryability hint.
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof DispatchError) {
    return error.toPayload();
  }
  return {
    code: ErrorCode.INTERNAL,
    message: error instanceof Error ? error.message : String(error),
  };
}

export function isStandardErrorCode(value: string): value is ErrorCode {
  return value in ERROR_CODE_META;
}
