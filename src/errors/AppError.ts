// src/errors/AppError.ts
/**
 * Purpose:
 * - Application-wide error type. Every fallible operation surfaces one of
 *   these kinds at the HTTP edge, where `errorResponder` turns it into the
 *   JSON envelope `{ message, status, stacktrace? }`.
 *
 * Invariants:
 * - internal/other/assetNotFound => 500; anyhow/headerParse => 400.
 * - No Express imports: the Express adapter lives in middleware/errorResponder.
 */

import { STATUS_CODES } from "node:http";

export type AppErrorKind =
  | "internal"
  | "other"
  | "anyhow"
  | "headerParse"
  | "assetNotFound";

export type ErrorResponseBody = {
  message: string;
  status: number;
  stacktrace?: string;
};

/** Anything shaped like an HTTP response that failed upstream. */
export type HttpResponseLike = { status: number; statusText?: string };

function describe(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

function isHttpResponseLike(x: unknown): x is HttpResponseLike {
  return (
    typeof x === "object" &&
    x !== null &&
    "status" in x &&
    typeof x.status === "number" &&
    Number.isInteger(x.status)
  );
}

export class AppError extends Error {
  public readonly kind: AppErrorKind;

  private constructor(kind: AppErrorKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "AppError";
    this.kind = kind;
  }

  static internal(cause: unknown): AppError {
    return new AppError(
      "internal",
      `an unspecified internal error occurred: ${describe(cause)}`,
      cause
    );
  }

  /** Transparent wrapper: the message is the cause's own. */
  static other(cause: unknown): AppError {
    return new AppError("other", describe(cause), cause);
  }

  static anyhow(cause: unknown): AppError {
    return new AppError(
      "anyhow",
      `an error has occurred: ${describe(cause)}`,
      cause
    );
  }

  static headerParse(cause: unknown): AppError {
    return new AppError(
      "headerParse",
      `unable to parse headers: ${describe(cause)}`,
      cause
    );
  }

  static assetNotFound(path: string): AppError {
    return new AppError("assetNotFound", `Failed to find ${path}`);
  }

  /**
   * Convert any thrown value. AppErrors pass through; response-like values
   * keep only their canonical reason; everything else is wrapped as anyhow.
   */
  static from(err: unknown): AppError {
    if (err instanceof AppError) return err;
    if (err instanceof Error) return AppError.anyhow(err);
    if (isHttpResponseLike(err)) {
      const reason = STATUS_CODES[err.status] ?? "";
      return AppError.anyhow(`HTTP response error: ${reason}`);
    }
    return AppError.anyhow(err);
  }

  get statusCode(): number {
    switch (this.kind) {
      case "internal":
      case "other":
      case "assetNotFound":
        return 500;
      case "anyhow":
      case "headerParse":
        return 400;
    }
  }

  /** Stack of the wrapped error when there is one, else our own. */
  get stacktrace(): string {
    if (this.cause instanceof Error && this.cause.stack) return this.cause.stack;
    return this.stack ?? `${this.name}: ${this.message}`;
  }

  toResponseBody(includeStack: boolean): ErrorResponseBody {
    const body: ErrorResponseBody = {
      message: this.message,
      status: this.statusCode,
    };
    if (includeStack) body.stacktrace = this.stacktrace;
    return body;
  }
}
